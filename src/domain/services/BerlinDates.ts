import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import timezone from 'dayjs/plugin/timezone.js';
import utc from 'dayjs/plugin/utc.js';

dayjs.extend(customParseFormat);
dayjs.extend(utc);
dayjs.extend(timezone);

export const BANK_TIMEZONE = 'Europe/Berlin';
export const DATE_FORMAT = 'DD.MM.YYYY';
export const DATETIME_FORMAT = 'DD.MM.YYYY HH.mm.ss';

/**
 * Parses a wall-clock value from the export as Europe/Berlin local time and
 * returns an ISO timestamp carrying the offset, e.g. `2024-02-01T00:00:00+01:00`.
 * Returns `null` when the value does not match the format exactly.
 */
export const parseBerlinDate = (value: string, format: string = DATE_FORMAT): string | null => {
  const trimmed = value.trim();

  if (!dayjs(trimmed, format, true).isValid()) {
    return null;
  }

  return dayjs.tz(trimmed, format, BANK_TIMEZONE).format();
};

/** `2024-02-01T00:00:00+01:00` → `20240201`, in the timestamp's own offset. */
export const toCompactDate = (isoTimestamp: string): string => {
  return isoTimestamp.slice(0, 10).replace(/-/g, '');
};
