import crypto from "crypto";

/**
 * Hash an API key using SHA-256
 */
export function hashApiKey(key: string): string {
  return crypto.createHash("sha256").update(key).digest("hex");
}

/**
 * Compare a presented key with the configured one in constant time
 */
export function apiKeysMatch(presented: string, expected: string): boolean {
  const presentedHash = Buffer.from(hashApiKey(presented), "hex");
  const expectedHash = Buffer.from(hashApiKey(expected), "hex");
  return crypto.timingSafeEqual(presentedHash, expectedHash);
}
