/**
 * Half-open time window `[start, end)`.
 */
export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface DayWindow extends TimeWindow {
  /** UTC calendar date, YYYY-MM-DD */
  date: string;
}

const HOUR_MS = 3_600_000;

/** The UTC hour containing `at` */
export function hourWindow(at: Date): TimeWindow {
  const start = new Date(Math.floor(at.getTime() / HOUR_MS) * HOUR_MS);
  return { start, end: new Date(start.getTime() + HOUR_MS) };
}

/** The UTC day containing `at` */
export function dayWindow(at: Date): DayWindow {
  const start = new Date(
    Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()),
  );
  const end = new Date(start.getTime() + 24 * HOUR_MS);
  return { start, end, date: start.toISOString().slice(0, 10) };
}
