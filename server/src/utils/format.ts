const UNITS = ["B", "KB", "MB", "GB", "TB"];

/** 1536 → "1.5 KB". Powers of 1024, up to two decimals. */
export function humanBytes(size: number): string {
  if (!Number.isFinite(size) || size <= 0) {
    return "0 B";
  }
  const exponent = Math.min(Math.floor(Math.log(size) / Math.log(1024)), UNITS.length - 1);
  const value = Math.round((size / Math.pow(1024, exponent)) * 100) / 100;
  return `${value} ${UNITS[exponent]}`;
}
