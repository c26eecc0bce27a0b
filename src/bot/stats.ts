import type { FileRecord } from "../db";

export const UNKNOWN_MIME_TYPE = "Unknown";

export interface MimeTypeCount {
  mimeType: string;
  count: number;
}

export interface StorageStats {
  totalFiles: number;
  totalBytes: number;
  /** Sorted by MIME type */
  typeCounts: MimeTypeCount[];
  /** Up to three records, largest first */
  largest: FileRecord[];
}

/**
 * Aggregate a user's records.
 * Ties among the largest files keep the order the records were given in.
 */
export function computeStorageStats(
  records: readonly FileRecord[],
  topCount = 3,
): StorageStats {
  const counts = new Map<string, number>();
  let totalBytes = 0;

  for (const record of records) {
    totalBytes += record.fileSize;
    const mimeType = record.mimeType ?? UNKNOWN_MIME_TYPE;
    counts.set(mimeType, (counts.get(mimeType) ?? 0) + 1);
  }

  const typeCounts = [...counts.entries()]
    .map(([mimeType, count]) => ({ mimeType, count }))
    .sort((a, b) => (a.mimeType < b.mimeType ? -1 : a.mimeType > b.mimeType ? 1 : 0));

  const largest = [...records]
    .sort((a, b) => b.fileSize - a.fileSize)
    .slice(0, topCount);

  return { totalFiles: records.length, totalBytes, typeCounts, largest };
}
