import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
} from "drizzle-orm/sqlite-core";

/**
 * Files users have sent to the bot.
 * Only the platform's handle and descriptive metadata are kept; the bytes stay on Telegram.
 */
export const files = sqliteTable(
  "files",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    // Telegram user id of the owner
    userId: integer("user_id").notNull(),
    // Opaque handle used to re-send the file
    fileId: text("file_id").notNull(),
    fileName: text("file_name").notNull(),
    // Declared size in bytes, informational only
    fileSize: integer("file_size").notNull(),
    mimeType: text("mime_type"),
    uploadDate: integer("upload_date", { mode: "timestamp_ms" }).notNull(),
    // Content fingerprint issued by Telegram, unique across all users
    fileUniqueId: text("file_unique_id"),
  },
  (table) => ({
    userIdIdx: index("files_user_id_idx").on(table.userId),
    // Each file name is unique per user
    userFileNameUniqueIdx: uniqueIndex("files_user_file_name_unique_idx").on(
      table.userId,
      table.fileName,
    ),
    fileUniqueIdIdx: uniqueIndex("files_file_unique_id_unique_idx").on(
      table.fileUniqueId,
    ),
  }),
);

export type FileRecord = typeof files.$inferSelect;
