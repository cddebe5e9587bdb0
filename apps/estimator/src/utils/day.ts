const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * UTC calendar day of a timestamp, as YYYY-MM-DD.
 */
export function toDayKey(value: Date | number): string {
  return new Date(value).toISOString().slice(0, 10);
}

/**
 * The instant `days` whole days before `from`.
 */
export function daysBefore(from: Date, days: number): Date {
  return new Date(from.getTime() - days * DAY_MS);
}
