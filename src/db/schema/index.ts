import { files, type FileRecord } from "./files";

// Tables
export { files };

// Types
export type { FileRecord };
