/** Local calendar day as a sortable number, e.g. 20260314. */
export function toDayKey(date: Date): number {
  return date.getFullYear() * 10000 + (date.getMonth() + 1) * 100 + date.getDate();
}

/** Parses `YYYY-MM-DD` as local midnight. */
export function parseLocalDate(value: string): Date {
  return new Date(`${value}T00:00:00`);
}

/** True when `YYYY-MM-DD` names a real day, e.g. rejects 2026-02-30. */
export function isCalendarDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return false;
  }
  const date = parseLocalDate(value);
  return (
    date.getFullYear() === Number(match[1]) &&
    date.getMonth() + 1 === Number(match[2]) &&
    date.getDate() === Number(match[3])
  );
}

export function addDays(date: Date, days: number): Date {
  const next = new Date(date.getTime());
  next.setDate(next.getDate() + days);
  return next;
}

export function isWithinDayRange(date: Date, start?: Date, end?: Date): boolean {
  const day = toDayKey(date);
  if (start && day < toDayKey(start)) {
    return false;
  }
  if (end && day > toDayKey(end)) {
    return false;
  }
  return true;
}
