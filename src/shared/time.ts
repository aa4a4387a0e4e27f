export const HOUR_MS = 60 * 60 * 1000;

export function startOfWeekUTC(date: Date): Date {
  const day = date.getUTCDay();
  const diff = (day + 6) % 7;
  const result = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
  result.setUTCDate(result.getUTCDate() - diff);
  return result;
}

export function startOfMonthUTC(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), 1));
}

export function formatDateKey(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

// `YYYY-MM-DD HH:MM` in UTC, the prefix used for lead notes.
export function formatNoteStamp(date: Date): string {
  const hours = String(date.getUTCHours()).padStart(2, '0');
  const minutes = String(date.getUTCMinutes()).padStart(2, '0');
  return `${formatDateKey(date)} ${hours}:${minutes}`;
}

/**
 * Parses any Date-readable timestamp and returns it as ISO-8601 UTC, or null
 * when it cannot be read. Stored timestamps always go through this so they
 * compare correctly as strings.
 */
export function normalizeTimestamp(value: string | Date): string | null {
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  if (Number.isNaN(ms)) {
    return null;
  }
  return new Date(ms).toISOString();
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * HOUR_MS);
}
