import Database from "better-sqlite3";
import { eq, and, count, desc } from "drizzle-orm";
import { files, type AppDatabase, type FileRecord } from "../db";
import { createModuleLogger, type Logger } from "../logger";
import { success, failure, type StoreResult } from "../types/result";

// ============================================================================
// Types
// ============================================================================

/**
 * Fields a caller supplies when recording a file.
 * `id` and `uploadDate` are always assigned by the store.
 */
export interface NewFileRecord {
  userId: number;
  fileId: string;
  fileName: string;
  fileSize: number;
  mimeType?: string | null;
  fileUniqueId?: string | null;
}

export interface FileStore {
  insert(record: NewFileRecord): Promise<StoreResult<FileRecord>>;
  listByUser(userId: number): Promise<StoreResult<FileRecord[]>>;
  findByName(userId: number, fileName: string): Promise<StoreResult<FileRecord>>;
  deleteByName(
    userId: number,
    fileName: string,
  ): Promise<StoreResult<FileRecord>>;
  countForUser(userId: number): Promise<StoreResult<number>>;
}

export interface FileStoreDeps {
  db: AppDatabase;
  logger?: Logger;
  now?: () => Date;
}

// ============================================================================
// Helpers
// ============================================================================

type SqliteError = InstanceType<typeof Database.SqliteError>;

/**
 * Walk the cause chain looking for the driver's error
 */
function findSqliteError(error: unknown): SqliteError | null {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof Database.SqliteError) {
      return current;
    }
    current = current.cause;
  }
  return null;
}

/**
 * Name the column a unique constraint failure was raised for, if any
 */
export function uniqueViolationField(
  error: unknown,
): "file_unique_id" | "file_name" | null {
  const sqliteError = findSqliteError(error);
  if (!sqliteError || !sqliteError.code.startsWith("SQLITE_CONSTRAINT")) {
    return null;
  }
  if (sqliteError.message.includes("files.file_unique_id")) {
    return "file_unique_id";
  }
  if (sqliteError.message.includes("files.file_name")) {
    return "file_name";
  }
  return null;
}

// ============================================================================
// Store
// ============================================================================

/**
 * Create the metadata store over the `files` table.
 * Storage failures are logged here and surface as UNAVAILABLE results.
 */
export function createFileStore(deps: FileStoreDeps): FileStore {
  const { db } = deps;
  const log = deps.logger ?? createModuleLogger("store");
  const now = deps.now ?? (() => new Date());

  function unavailable(operation: string, error: unknown, context: object) {
    log.error({ err: error, operation, ...context }, "File store failure");
    return failure("UNAVAILABLE", `File store unavailable during ${operation}`);
  }

  return {
    async insert(record) {
      try {
        const [row] = db
          .insert(files)
          .values({
            userId: record.userId,
            fileId: record.fileId,
            fileName: record.fileName,
            fileSize: record.fileSize,
            mimeType: record.mimeType ?? null,
            fileUniqueId: record.fileUniqueId ?? null,
            uploadDate: now(),
          })
          .returning()
          .all();

        if (!row) {
          return unavailable("insert", new Error("Insert returned no row"), {
            userId: record.userId,
          });
        }

        log.info(
          { userId: row.userId, fileName: row.fileName, id: row.id },
          "Added file record",
        );
        return success(row);
      } catch (error) {
        const field = uniqueViolationField(error);
        if (field) {
          log.warn(
            {
              userId: record.userId,
              fileName: record.fileName,
              fileUniqueId: record.fileUniqueId,
              field,
            },
            "File record already exists",
          );
          return failure("CONFLICT", `A file with this ${field} already exists`, {
            field,
          });
        }
        return unavailable("insert", error, { userId: record.userId });
      }
    },

    async listByUser(userId) {
      try {
        const rows = db
          .select()
          .from(files)
          .where(eq(files.userId, userId))
          .orderBy(desc(files.uploadDate), desc(files.id))
          .all();

        return success(rows);
      } catch (error) {
        return unavailable("listByUser", error, { userId });
      }
    },

    async findByName(userId, fileName) {
      try {
        const row = db
          .select()
          .from(files)
          .where(and(eq(files.userId, userId), eq(files.fileName, fileName)))
          .get();

        if (!row) {
          return failure("NOT_FOUND", `File not found: ${fileName}`);
        }
        return success(row);
      } catch (error) {
        return unavailable("findByName", error, { userId, fileName });
      }
    },

    async deleteByName(userId, fileName) {
      try {
        const [row] = db
          .delete(files)
          .where(and(eq(files.userId, userId), eq(files.fileName, fileName)))
          .returning()
          .all();

        if (!row) {
          log.warn({ userId, fileName }, "File record to delete not found");
          return failure("NOT_FOUND", `File not found: ${fileName}`);
        }

        log.info({ userId, fileName, id: row.id }, "Deleted file record");
        return success(row);
      } catch (error) {
        return unavailable("deleteByName", error, { userId, fileName });
      }
    },

    async countForUser(userId) {
      try {
        const row = db
          .select({ count: count() })
          .from(files)
          .where(eq(files.userId, userId))
          .get();

        return success(row?.count ?? 0);
      } catch (error) {
        return unavailable("countForUser", error, { userId });
      }
    },
  };
}
