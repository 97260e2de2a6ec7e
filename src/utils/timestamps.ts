/**
 * Reads a stored creation timestamp. Backends hand these back as Date objects,
 * ISO strings (Postgres timestamptz over PostgREST) or epoch milliseconds.
 * Returns null for anything else.
 */
export function parseTimestamp(value: unknown): Date | null {
  let date: Date | null = null;

  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string' && value.trim()) {
    date = new Date(value);
  } else if (typeof value === 'number') {
    date = new Date(value);
  }

  return date && !Number.isNaN(date.getTime()) ? date : null;
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}

export function minutesBefore(now: Date, minutes: number): Date {
  return new Date(now.getTime() - minutes * 60 * 1000);
}
