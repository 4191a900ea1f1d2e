const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

export const addMinutes = (date: Date, minutes: number): Date => {
  return new Date(date.getTime() + minutes * MS_PER_MINUTE);
};

export const addDays = (date: Date, days: number): Date => {
  return new Date(date.getTime() + days * MS_PER_DAY);
};

/**
 * Parse an ISO timestamp to epoch ms. Unparseable values sort as the epoch,
 * which makes them due immediately rather than never.
 */
export function toTime(iso: string): number {
  const time = Date.parse(iso);
  return Number.isNaN(time) ? 0 : time;
}

export function isDueAt(dueAt: string, now: Date): boolean {
  return toTime(dueAt) <= now.getTime();
}

// UTC calendar day, e.g. '2024-01-15'
export function dayKey(date: Date): string {
  return date.toISOString().split('T')[0];
}
