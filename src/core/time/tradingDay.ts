const ISO_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

const dayFormatters = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  let formatter = dayFormatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    });
    dayFormatters.set(timeZone, formatter);
  }
  return formatter;
};

/**
 * Calendar day (YYYY-MM-DD) of `instant` as seen in `timeZone`.
 */
const toCalendarDay = (instant: Date, timeZone: string): string => {
  const parts = formatterFor(timeZone).formatToParts(instant);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((item) => item.type === type)?.value ?? "";

  return `${part("year")}-${part("month")}-${part("day")}`;
};

/**
 * Trading day for a Unix timestamp in seconds. Ingestion and every date-range read use
 * the same market time zone, so a day never shifts between write and query.
 */
export const toTradingDay = (
  unixSeconds: number,
  timeZone: string,
): string => {
  if (!Number.isFinite(unixSeconds)) {
    throw new RangeError(`Invalid trading timestamp: ${unixSeconds}`);
  }
  return toCalendarDay(new Date(unixSeconds * 1000), timeZone);
};

export const isTradingDay = (value: string): boolean => {
  if (!ISO_DAY_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return (
    !Number.isNaN(parsed.getTime()) &&
    parsed.toISOString().slice(0, 10) === value
  );
};

/**
 * Moves a YYYY-MM-DD day by whole calendar days.
 */
export const shiftTradingDay = (day: string, days: number): string => {
  if (!isTradingDay(day)) {
    throw new RangeError(`Invalid trading day: ${day}`);
  }
  const start = new Date(`${day}T00:00:00.000Z`).getTime();
  return new Date(start + days * MS_PER_DAY).toISOString().slice(0, 10);
};
