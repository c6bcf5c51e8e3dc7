/**
 * Calendar-day helpers for the brokerage's midnight token expiry
 */

export const EASTERN_TIME_ZONE = 'America/New_York';

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-CA', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Local calendar date of an instant in the given zone, as YYYY-MM-DD
 */
export function easternDateKey(date: Date, timeZone: string = EASTERN_TIME_ZONE): string {
  const parts = formatterFor(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

export function isSameEasternDay(a: Date, b: Date, timeZone: string = EASTERN_TIME_ZONE): boolean {
  return easternDateKey(a, timeZone) === easternDateKey(b, timeZone);
}
