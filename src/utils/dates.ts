/**
 * Local-time date stamps used in archive partitions, backup names and log files
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD
 */
export function dateStamp(date: Date = new Date()): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * YYYYMMDD_HHMMSS
 */
export function timeStamp(date: Date = new Date()): string {
  return `${dateStamp(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * YYYY-MM-DD
 */
export function isoDate(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
