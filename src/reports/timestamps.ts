const pad = (n: number) => String(n).padStart(2, '0');

/** Local calendar date, YYYY-MM-DD. */
export function formatDateHeader(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local time at minute granularity for filenames, YYYY-MM-DD_HH-MM. */
export function formatFileTimestamp(date: Date): string {
  return `${formatDateHeader(date)}_${pad(date.getHours())}-${pad(date.getMinutes())}`;
}
