/**
 * Byte Size Helpers
 */

export const KIB = 1024;
export const MIB = 1024 * KIB;
export const GIB = 1024 * MIB;

/**
 * Human-readable size with two decimals (B, KB, MB, GB)
 */
export function formatSize(bytes: number): string {
  if (bytes < KIB) {
    return `${bytes} B`;
  }
  if (bytes < MIB) {
    return `${(bytes / KIB).toFixed(2)} KB`;
  }
  if (bytes < GIB) {
    return `${(bytes / MIB).toFixed(2)} MB`;
  }
  return `${(bytes / GIB).toFixed(2)} GB`;
}

/**
 * Bytes expressed in mebibytes with two decimals
 */
export function toMegabytes(bytes: number): string {
  return (bytes / MIB).toFixed(2);
}
