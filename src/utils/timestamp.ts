export const CAPTURE_EXTENSION = '.jpg';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time at second granularity, e.g. 2024_03_07-14_05_09.
 * Two captures in the same second share a name and the later one overwrites.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}_${pad(date.getMonth() + 1)}_${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}_${pad(date.getMinutes())}_${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export function formatCaptureFileName(date: Date): string {
  return `${formatTimestamp(date)}${CAPTURE_EXTENSION}`;
}
