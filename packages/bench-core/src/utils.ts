/**
 * Round to a fixed number of decimals for serialized output
 */
export function roundTo(value: number, decimals = 3): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local-time stamp used to name artifact directories, e.g. 20260119-134501
 */
export function formatRunStamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

/**
 * UTC timestamp without milliseconds, e.g. 2026-01-19T13:45:01Z
 */
export function nowIsoUtc(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Zero-padded directory name for a repetition, e.g. run_03
 */
export function repetitionDirName(prefix: string, repetition: number): string {
  return `${prefix}_${pad(repetition)}`;
}
