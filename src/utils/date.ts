const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/**
 * Local wall-clock timestamp, `YYYY-MM-DD HH:MM:SS`, as written to download logs.
 */
export function formatLogTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Caption offsets: `MM:SS` below one hour, `HH:MM:SS` above.
 */
export function formatCaptionTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  if (hours > 0) return `${pad(hours)}:${pad(minutes)}:${pad(secs)}`;
  return `${pad(minutes)}:${pad(secs)}`;
}
