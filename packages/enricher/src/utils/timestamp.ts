const pad = (value: number): string => String(value).padStart(2, '0');

/** Local-time `YYYYMMDD_HHmmss`, used in output and log file names. */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** `<m> minutes and <s.ss> seconds` */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, ms) / 1000;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds - minutes * 60;
  return `${minutes} minutes and ${seconds.toFixed(2)} seconds`;
}
