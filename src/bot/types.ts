// ============================================
// Inbound events
// ============================================

/**
 * A file as announced by the platform, before it is recorded
 */
export interface IncomingFile {
  fileId: string;
  fileUniqueId: string;
  fileName: string;
  fileSize: number;
  mimeType?: string;
}

export interface CommandEvent {
  kind: "command";
  userId: number;
  /** Lower-cased command name without the leading slash */
  command: string;
  /** Raw text after the command, empty when none was given */
  args: string;
}

export interface FileEvent {
  kind: "file";
  userId: number;
  file: IncomingFile;
}

export type InboundEvent = CommandEvent | FileEvent;

// ============================================
// Replies
// ============================================

export interface TextReply {
  kind: "text";
  text: string;
  /** Send with Telegram's legacy Markdown parse mode */
  markdown: boolean;
}

/**
 * Re-send a stored file to the chat
 */
export interface DocumentReply {
  kind: "document";
  fileId: string;
  caption: string;
  /** Sent after the document went out */
  confirmation: TextReply;
  /** Sent instead when the platform refused the document */
  failure: TextReply;
}

export type Reply = TextReply | DocumentReply;

export interface Dispatcher {
  handle(event: InboundEvent): Promise<Reply[]>;
}
