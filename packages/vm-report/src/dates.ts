/**
 * Local-time date stamps used in file names, snapshot names and report headers
 */

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD
 */
export function formatDateStamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/**
 * YYYY-MM-DD HH:MM:SS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
