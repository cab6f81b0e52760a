const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+(?:Z|[+-][\d:]+)?)?$/;

/**
 * Collapses whitespace runs and trims; blank input becomes null.
 */
export const sanitizeString = (value: string | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  const cleaned = value.replace(/\s+/g, " ").trim();
  return cleaned.length > 0 ? cleaned : null;
};

/**
 * Trims a link, drops an explicit `:443` port and escapes spaces.
 */
export const sanitizeLink = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  return trimmed.replace(":443", "").replaceAll(" ", "%20");
};

const pad = (value: number, width: number): string =>
  String(value).padStart(width, "0");

const formatDay = (year: number, month: number, day: number): string =>
  `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;

/**
 * Checks that year, month (1-12) and day name a real calendar day.
 */
const isCalendarDay = (year: number, month: number, day: number): boolean => {
  const candidate = new Date(Date.UTC(year, month - 1, day));
  candidate.setUTCFullYear(year);
  return (
    candidate.getUTCFullYear() === year &&
    candidate.getUTCMonth() === month - 1 &&
    candidate.getUTCDate() === day
  );
};

/**
 * Normalizes a calendar date to `YYYY-MM-DD`. A `Date` contributes its
 * local calendar day; a string must be an ISO date, optionally
 * followed by a time of day.
 */
export const sanitizeDate = (value: string | Date | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new RangeError("Invalid date");
    }
    return formatDay(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const match = ISO_DATE.exec(trimmed);
  if (!match) {
    throw new RangeError(`Invalid date "${value}"`);
  }

  const [year, month, day] = [match[1], match[2], match[3]].map(Number);
  if (!isCalendarDay(year, month, day)) {
    throw new RangeError(`Invalid date "${value}"`);
  }
  return formatDay(year, month, day);
};
