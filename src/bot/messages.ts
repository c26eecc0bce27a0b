import type { FileRecord } from "../db";
import { escapeMarkdown, formatDate, formatTimestamp } from "../utils/markdown";
import { effectiveUploadLimit, formatSize, type SizeLimits } from "../utils/size";
import { UNKNOWN_MIME_TYPE, type StorageStats } from "./stats";
import type { IncomingFile } from "./types";

/** Telegram's per-message text limit */
export const MAX_MESSAGE_LENGTH = 4096;

export interface Limits extends SizeLimits {
  maxFilesPerUser: number;
}

function typeOf(mimeType: string | null | undefined): string {
  return escapeMarkdown(mimeType ?? UNKNOWN_MIME_TYPE);
}

// ============================================
// Static texts
// ============================================

export function welcomeText(limits: Limits): string {
  return [
    "🚀 *Welcome to File Ledger Bot!*",
    "",
    "I keep track of the files you send me. The files stay on Telegram's servers; I remember where they are.",
    "",
    "*Available Commands:*",
    "/upload - How to upload a file",
    "/list - List your files",
    "/details <filename> - Show file details",
    "/stats - Show your storage statistics",
    "/download <filename> - Get a file back",
    "/delete <filename> - Delete a file",
    "/help - Show help",
    "",
    "*Limits:*",
    `📤 Max upload: ${formatSize(effectiveUploadLimit(limits))}`,
    `📥 Max download: ${formatSize(limits.maxDownloadSize)}`,
    `📁 Max files per user: ${limits.maxFilesPerUser}`,
  ].join("\n");
}

export function helpText(limits: Limits): string {
  return [
    "🤖 *File Ledger Bot Help*",
    "",
    "*How to use:*",
    "1. Send any document, photo, video or audio to record it",
    "2. Use /list to see your files",
    "3. Use /details filename for complete file info",
    "4. Use /stats to see your storage usage",
    "5. Use /download filename to get a file back",
    "6. Use /delete filename to remove a file",
    "",
    "*Tips:*",
    "• File names are case-sensitive",
    "• Everything after the command is the file name, spaces included",
    `• Files up to ${formatSize(effectiveUploadLimit(limits))} can be recorded`,
    `• You can keep up to ${limits.maxFilesPerUser} files`,
  ].join("\n");
}

export function uploadInfoText(limits: Limits): string {
  return [
    "📤 *Upload a File*",
    "",
    "Send any document to this chat to record it.",
    "",
    "*Supported:*",
    "• Documents",
    "• Photos",
    "• Videos",
    "• Audio and voice messages",
    "• Video notes",
    "",
    `*Maximum size:* ${formatSize(effectiveUploadLimit(limits))}`,
  ].join("\n");
}

// ============================================
// Upload
// ============================================

export function quotaExceededText(maxFilesPerUser: number): string {
  return [
    `❌ You have reached the maximum file limit (${maxFilesPerUser} files).`,
    "Please delete some files before uploading new ones.",
  ].join("\n");
}

export function duplicateNameText(fileName: string): string {
  return [
    `❌ A file named '${escapeMarkdown(fileName)}' already exists.`,
    "Please rename the file or delete the existing one first.",
  ].join("\n");
}

export const INSERT_CONFLICT_TEXT =
  "❌ Failed to save file information. The file might already exist.";

export function uploadSuccessText(file: IncomingFile): string {
  return [
    "✅ *Upload Successful!*",
    "",
    `📁 File: ${escapeMarkdown(file.fileName)}`,
    `📊 Size: ${formatSize(file.fileSize)}`,
    `🎯 Type: ${typeOf(file.mimeType)}`,
    "",
    "Use /download to get it back later.",
  ].join("\n");
}

// ============================================
// Lookups
// ============================================

export function usageText(command: string): string {
  return [
    "❌ Please specify a filename.",
    `Usage: \`/${command} filename\``,
    "Use /list to see your files.",
  ].join("\n");
}

export function notFoundText(fileName: string): string {
  return [
    `❌ File '${escapeMarkdown(fileName)}' not found.`,
    "Use /list to see your available files.",
  ].join("\n");
}

function fileCount(count: number): string {
  return `${count} ${count === 1 ? "file" : "files"}`;
}

/**
 * Join blocks with a blank line, starting a new message whenever the next
 * block would push the current one past Telegram's length limit.
 */
export function packMessages(
  blocks: readonly string[],
  limit = MAX_MESSAGE_LENGTH,
): string[] {
  const messages: string[] = [];
  let current = "";

  for (const block of blocks) {
    const candidate = current.length > 0 ? `${current}\n\n${block}` : block;
    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current.length > 0) {
      messages.push(current);
    }
    current = block;
    while (current.length > limit) {
      messages.push(current.slice(0, limit));
      current = current.slice(limit);
    }
  }

  if (current.length > 0) {
    messages.push(current);
  }
  return messages;
}

/**
 * The numbered file list, split into as many messages as needed.
 * Splits only fall between entries.
 */
export function fileListTexts(records: readonly FileRecord[]): string[] {
  if (records.length === 0) {
    return ["📂 No files found.\n\nSend me a document to record your first file!"];
  }

  const totalBytes = records.reduce((sum, record) => sum + record.fileSize, 0);
  const header = `📂 *Your Files* (${fileCount(records.length)}, ${formatSize(totalBytes)} total):`;

  const entries = records.map((record, index) =>
    [
      `${index + 1}. ${escapeMarkdown(record.fileName)}`,
      `   📊 Size: ${formatSize(record.fileSize)} | 🎯 Type: ${typeOf(record.mimeType)}`,
      `   📅 Uploaded: ${formatDate(record.uploadDate)}`,
    ].join("\n"),
  );

  const footer = [
    "*Commands:*",
    "💡 `/download filename` - Download a file",
    "💡 `/details filename` - View complete file info",
    "💡 `/stats` - View storage statistics",
    "💡 `/delete filename` - Delete a file",
  ].join("\n");

  return packMessages([header, ...entries, footer]);
}

export function fileDetailsText(record: FileRecord): string {
  return [
    `📁 *File Details:* ${escapeMarkdown(record.fileName)}`,
    "",
    `📊 *Size:* ${formatSize(record.fileSize)}`,
    `🎯 *Type:* ${typeOf(record.mimeType)}`,
    `📅 *Upload Date:* ${formatTimestamp(record.uploadDate)}`,
    `🆔 *File ID:* \`${record.fileId}\``,
    `🔑 *Unique ID:* \`${record.fileUniqueId ?? "none"}\``,
    `📋 *Database ID:* ${record.id}`,
    "",
    "*File Actions:*",
    "• Use /download to get this file",
    "• Use /delete to remove this file",
  ].join("\n");
}

export function statsText(stats: StorageStats, maxFilesPerUser: number): string {
  const remaining = Math.max(maxFilesPerUser - stats.totalFiles, 0);

  if (stats.totalFiles === 0) {
    return [
      "📊 *Your Storage Statistics*",
      "",
      "📂 No files stored yet",
      "💾 Total storage used: 0 B",
      `📁 Files remaining: ${remaining}`,
    ].join("\n");
  }

  const lines = [
    "📊 *Your Storage Statistics*",
    "",
    `📂 *Total Files:* ${stats.totalFiles}/${maxFilesPerUser}`,
    `💾 *Total Storage Used:* ${formatSize(stats.totalBytes)}`,
    `📁 *Files Remaining:* ${remaining}`,
    "",
    "*File Types:*",
    ...stats.typeCounts.map(
      ({ mimeType, count }) =>
        `• ${escapeMarkdown(mimeType)}: ${fileCount(count)}`,
    ),
    "",
    "*Largest Files:*",
    ...stats.largest.map(
      (record, index) =>
        `${index + 1}. ${escapeMarkdown(record.fileName)} (${formatSize(record.fileSize)})`,
    ),
  ];

  return lines.join("\n");
}

// ============================================
// Download / delete
// ============================================

export function downloadCaption(record: FileRecord): string {
  return `📁 ${record.fileName}\n📊 ${formatSize(record.fileSize)}`;
}

export function downloadCompleteText(record: FileRecord): string {
  return [
    "✅ *Download Complete!*",
    "",
    `📁 File: ${escapeMarkdown(record.fileName)}`,
    `📊 Size: ${formatSize(record.fileSize)}`,
  ].join("\n");
}

export const DOWNLOAD_FAILED_TEXT =
  "❌ Failed to send the file. It may no longer be available on Telegram.";

export function deletedText(record: FileRecord): string {
  return [
    "✅ *File Deleted!*",
    "",
    `📁 File: ${escapeMarkdown(record.fileName)}`,
    `📊 Size: ${formatSize(record.fileSize)}`,
    "",
    "Note: the file is removed from your list but may still exist on Telegram's servers.",
  ].join("\n");
}

// ============================================
// Failures
// ============================================

/** Sent without parse mode when Telegram refuses a formatted reply */
export const REPLY_FAILED_TEXT =
  "❌ An error occurred while sending the reply. Please try again.";

export type Action = "upload" | "list" | "details" | "stats" | "download" | "delete";

export const GENERIC_ERROR_TEXT: Record<Action, string> = {
  upload: "❌ An error occurred while processing your upload. Please try again.",
  list: "❌ An error occurred while retrieving your files.",
  details: "❌ An error occurred while retrieving file details.",
  stats: "❌ An error occurred while retrieving storage statistics.",
  download: "❌ An error occurred while processing the download.",
  delete: "❌ An error occurred while deleting the file.",
};
