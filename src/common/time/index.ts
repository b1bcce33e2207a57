const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

/**
 * Japan Standard Time has a fixed offset and no daylight saving.
 */
export const JST_OFFSET_MS = 9 * 60 * MINUTE_MS;

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

/**
 * Formats the JST calendar date of `date` as `YYYYMMDD`.
 */
export function formatJstDate(date: Date): string {
  const jst = new Date(date.getTime() + JST_OFFSET_MS);
  return (
    pad(jst.getUTCFullYear(), 4) +
    pad(jst.getUTCMonth() + 1, 2) +
    pad(jst.getUTCDate(), 2)
  );
}

/**
 * Parses a JST `YYYYMMDDHHMM` timestamp (24-hour clock).
 * Returns null unless the string names a real calendar minute.
 */
export function parseJstMinute(value: string): Date | null {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute] = match
    .slice(1)
    .map((part) => parseInt(part, 10));

  const utc = new Date(Date.UTC(year, month - 1, day, hour, minute));
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day ||
    utc.getUTCHours() !== hour ||
    utc.getUTCMinutes() !== minute
  ) {
    return null;
  }

  return new Date(utc.getTime() - JST_OFFSET_MS);
}
