/**
 * Format bytes as a human-readable string using base-1024 units.
 *
 * @example
 *   formatSize(512)         // "512 B"
 *   formatSize(1536)        // "1.5 KB"
 *   formatSize(1073741824)  // "1.00 GB"
 */
export const formatSize = (bytes: number): string => {
  if (bytes < 1024) return `${bytes} B`;
  if (fits(bytes, 1, 1)) return `${(bytes / 1024).toFixed(1)} KB`;
  if (fits(bytes, 2, 1)) return `${(bytes / 1024 ** 2).toFixed(1)} MB`;
  if (fits(bytes, 3, 2)) return `${(bytes / 1024 ** 3).toFixed(2)} GB`;
  if (fits(bytes, 4, 2)) return `${(bytes / 1024 ** 4).toFixed(2)} TB`;
  return `${(bytes / 1024 ** 5).toFixed(2)} PB`;
};

// Judged on the rounded figure, so 1048575 B reads "1.0 MB" rather than "1024.0 KB"
const fits = (bytes: number, power: number, decimals: number): boolean =>
  Number((bytes / 1024 ** power).toFixed(decimals)) < 1024;

/**
 * Format a count with thousands separators ("12,345").
 */
export const formatCount = (n: number): string => n.toLocaleString("en-US");
