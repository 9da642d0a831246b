/**
 * DDMMYYYY in local time, as used in output file names.
 */
export function formatDayStamp(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}${month}${date.getFullYear()}`;
}
