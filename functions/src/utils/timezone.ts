export const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKEND_DAYS = new Set(['Sat', 'Sun']);

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function buildWeekdayFormatter(timeZone: string): Intl.DateTimeFormat {
  const cached = formatterCache.get(timeZone);
  if (cached) {
    return cached;
  }
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'short',
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
}

/**
 * Short English weekday ("Mon" … "Sun") of an instant as seen in `timeZone`.
 */
export function weekdayInTimeZone(date: Date, timeZone: string): string {
  const parts = buildWeekdayFormatter(timeZone).formatToParts(date);
  return parts.find(part => part.type === 'weekday')?.value ?? '';
}

export function isWeekendInTimeZone(date: Date, timeZone: string): boolean {
  return WEEKEND_DAYS.has(weekdayInTimeZone(date, timeZone));
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}
