import type {
  Audio,
  Document,
  PhotoSize,
  Video,
  VideoNote,
  Voice,
} from "grammy/types";
import type { IncomingFile } from "./types";

/**
 * The attachment fields of a Telegram message
 */
export interface AttachmentMessage {
  document?: Document;
  photo?: PhotoSize[];
  video?: Video;
  audio?: Audio;
  voice?: Voice;
  video_note?: VideoNote;
}

function toIncomingFile(
  file: { file_id: string; file_unique_id: string; file_size?: number },
  fileName: string,
  mimeType?: string,
): IncomingFile {
  return {
    fileId: file.file_id,
    fileUniqueId: file.file_unique_id,
    fileName,
    fileSize: file.file_size ?? 0,
    ...(mimeType !== undefined ? { mimeType } : {}),
  };
}

/**
 * Pick the file a message carries, naming it when Telegram gives no name.
 * Returns null when the message has no supported attachment.
 */
export function extractIncomingFile(
  message: AttachmentMessage,
): IncomingFile | null {
  const { document, photo, video, audio, voice, video_note } = message;

  if (document) {
    return toIncomingFile(
      document,
      document.file_name || `document_${document.file_unique_id}`,
      document.mime_type,
    );
  }

  if (photo && photo.length > 0) {
    // Telegram lists sizes smallest first
    const largest = photo[photo.length - 1];
    return toIncomingFile(
      largest,
      `photo_${largest.file_unique_id}.jpg`,
    );
  }

  if (video) {
    return toIncomingFile(
      video,
      video.file_name || `video_${video.file_unique_id}.mp4`,
      video.mime_type,
    );
  }

  if (audio) {
    return toIncomingFile(
      audio,
      audio.file_name || `audio_${audio.file_unique_id}.mp3`,
      audio.mime_type,
    );
  }

  if (voice) {
    return toIncomingFile(
      voice,
      `voice_${voice.file_unique_id}.ogg`,
      voice.mime_type,
    );
  }

  if (video_note) {
    return toIncomingFile(
      video_note,
      `video_note_${video_note.file_unique_id}.mp4`,
    );
  }

  return null;
}
