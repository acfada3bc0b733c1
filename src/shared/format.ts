const UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Formats a byte count with decimal (SI) units.
 *
 * @example
 * formatBytes(1_500_000) // => "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";
  const exponent = Math.min(Math.floor(Math.log10(bytes) / 3), UNITS.length - 1);
  const value = bytes / 1000 ** exponent;
  const unit = UNITS[exponent] ?? "B";
  return exponent === 0 ? `${value} ${unit}` : `${Number(value.toFixed(1))} ${unit}`;
}

export function formatSpeed(bytesPerSecond: number): string {
  return `${formatBytes(bytesPerSecond)}/s`;
}
