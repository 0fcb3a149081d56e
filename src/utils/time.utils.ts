const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * One-second resolution stamp used in stored file names, e.g. 20260314_093005 (UTC)
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
