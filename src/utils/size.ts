const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

export const KIB = 1024;
export const MIB = 1024 * KIB;
export const GIB = 1024 * MIB;

export interface SizeLimits {
  /** Local ceiling for recording an upload */
  maxUploadSize: number;
  /** Largest file Telegram itself will transfer */
  platformFileSizeLimit: number;
  /** Local ceiling for re-sending a stored file */
  maxDownloadSize: number;
}

export interface SizeCheck {
  ok: boolean;
  reason: string;
}

export const DEFAULT_SIZE_LIMITS: SizeLimits = {
  maxUploadSize: 4 * GIB,
  platformFileSizeLimit: 2 * GIB,
  maxDownloadSize: 10 * GIB,
};

/**
 * Format a byte count for display, e.g. "0 B", "512 B", "1.50 MB"
 */
export function formatSize(bytes: number): string {
  let value = bytes;
  let unit = 0;

  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  if (unit === 0) {
    return `${Math.trunc(value)} B`;
  }
  return `${value.toFixed(2)} ${SIZE_UNITS[unit]}`;
}

/**
 * Upload ceiling actually in force: the local limit, capped by the platform's
 */
export function effectiveUploadLimit(limits: SizeLimits): number {
  return Math.min(limits.maxUploadSize, limits.platformFileSizeLimit);
}

export function validateUploadSize(
  size: number,
  limits: SizeLimits = DEFAULT_SIZE_LIMITS,
): SizeCheck {
  const ceiling = effectiveUploadLimit(limits);
  if (size > ceiling) {
    return {
      ok: false,
      reason: `File too large. Maximum upload size is ${formatSize(ceiling)}`,
    };
  }
  return { ok: true, reason: "" };
}

export function validateDownloadSize(
  size: number,
  limits: SizeLimits = DEFAULT_SIZE_LIMITS,
): SizeCheck {
  if (size > limits.maxDownloadSize) {
    return {
      ok: false,
      reason: `File too large for download. Maximum download size is ${formatSize(limits.maxDownloadSize)}`,
    };
  }
  return { ok: true, reason: "" };
}
