// Run days are UTC calendar dates. Admission at 23:59:59Z and 00:00:00Z fall on different days.

const DAY_MS = 24 * 60 * 60 * 1000;

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** YYYY-MM-DD of the given instant in UTC. */
export function utcDay(at: Date): string {
  return at.toISOString().slice(0, 10);
}

export function addDays(day: string, days: number): string {
  const base = Date.parse(`${day}T00:00:00.000Z`);
  return utcDay(new Date(base + days * DAY_MS));
}

export function minutesBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 60000;
}

/** Parses an API timestamp; null when missing or unparseable. */
export function parseTimestamp(input: string | null | undefined): Date | null {
  if (!input) return null;
  const parsed = new Date(input);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}
