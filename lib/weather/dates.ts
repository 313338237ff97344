const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function pad(value: number) {
  return String(value).padStart(2, "0");
}

/** Local calendar date of `now`, formatted YYYY-MM-DD. */
export function toIsoDate(now: Date): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

function toUtcMidnight(isoDate: string): number | null {
  const match = ISO_DATE.exec(isoDate);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  // Date.UTC rolls 2024-02-30 over into March.
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return ms;
}

export function isIsoDate(value: string): boolean {
  return toUtcMidnight(value) !== null;
}

/**
 * Whole calendar days from `today` to `target`. Both sides are taken as
 * UTC midnights so daylight-saving shifts never produce fractional days.
 */
export function dayOffset(target: string, today: string): number {
  const targetMs = toUtcMidnight(target);
  const todayMs = toUtcMidnight(today);
  if (targetMs === null || todayMs === null) {
    throw new Error(`Invalid calendar date: ${targetMs === null ? target : today}`);
  }
  return Math.round((targetMs - todayMs) / MS_PER_DAY);
}
