/**
 * Compact UTC stamp usable as a directory name, e.g. `20260301T101500Z`.
 */
export function compactUtcStamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z')
    .replace(/[-:]/g, '');
}
