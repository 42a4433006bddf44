/**
 * Human-readable sizes and shares
 */

const UNITS = ['KB', 'MB', 'GB', 'TB', 'PB'] as const;

/**
 * Format a byte count with decimal (1000-based) units, the way file managers
 * show file sizes: whole bytes and kilobytes, one decimal from megabytes up.
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes < 0) return '0 bytes';
  if (bytes < 1000) return bytes === 1 ? '1 byte' : `${Math.round(bytes)} bytes`;

  let value = bytes / 1000;
  let unit = 0;
  while (value >= 1000 && unit < UNITS.length - 1) {
    value /= 1000;
    unit += 1;
  }

  const digits = unit === 0 ? 0 : 1;
  return `${value.toFixed(digits)} ${UNITS[unit]}`;
}

export function formatPercent(percentage: number): string {
  return `${percentage.toFixed(1)}%`;
}
