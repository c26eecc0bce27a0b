import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

// Re-export schema for convenience
export * from "./schema";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  /**
   * Run a trivial query against the database
   * @returns true if the query succeeded, throws otherwise
   */
  testConnection(): boolean;
  /**
   * Close the underlying SQLite handle
   * Call this when shutting down
   */
  close(): void;
}

const CREATE_FILES_TABLE = `
  CREATE TABLE IF NOT EXISTS files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    file_id TEXT NOT NULL,
    file_name TEXT NOT NULL,
    file_size INTEGER NOT NULL,
    mime_type TEXT,
    upload_date INTEGER NOT NULL,
    file_unique_id TEXT
  );
  CREATE INDEX IF NOT EXISTS files_user_id_idx ON files (user_id);
  CREATE UNIQUE INDEX IF NOT EXISTS files_user_file_name_unique_idx ON files (user_id, file_name);
  CREATE UNIQUE INDEX IF NOT EXISTS files_file_unique_id_unique_idx ON files (file_unique_id);
`;

/**
 * Open (or create) the SQLite database and make sure the schema exists.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(filename: string): DatabaseHandle {
  const sqlite = new Database(filename);

  if (filename !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  sqlite.exec(CREATE_FILES_TABLE);

  const db = drizzle(sqlite, { schema });

  return {
    db,
    testConnection() {
      sqlite.prepare("SELECT 1").get();
      return true;
    },
    close() {
      sqlite.close();
    },
  };
}
