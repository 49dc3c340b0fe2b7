import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import utc from 'dayjs/plugin/utc.js';
import type { TimestampLike } from '../entities/Transaction.js';

dayjs.extend(customParseFormat);
dayjs.extend(utc);

// Zone-less dates are read as UTC.
const LOCAL_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY-MM-DD[T]HH:mm:ss',
  'YYYY-MM-DD[T]HH:mm:ss.SSS',
  'DD.MM.YYYY',
  'DD.MM.YYYY HH:mm',
  'DD.MM.YYYY HH:mm:ss',
  'DD/MM/YYYY',
] as const;

const zoned = /([zZ]|[+-]\d{2}:?\d{2})$/;

/** Epoch milliseconds or a handful of common bank formats; null when the value cannot be read. */
export const parseTransactionDate = (value: TimestampLike | null): Date | null => {
  if (value === null) {
    return null;
  }

  if (typeof value === 'number') {
    const parsed = dayjs(value);
    return parsed.isValid() ? parsed.toDate() : null;
  }

  const trimmed = value.trim();

  if (zoned.test(trimmed)) {
    const parsed = dayjs(trimmed);
    return parsed.isValid() ? parsed.toDate() : null;
  }

  for (const format of LOCAL_FORMATS) {
    const parsed = dayjs.utc(trimmed, format, true);
    if (parsed.isValid()) {
      return parsed.toDate();
    }
  }

  return null;
};
