import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import { ValidationError } from '../errors.js';
import { DATE_FORMATS } from './constants.js';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

/**
 * Formats tried, in order, by parseFlexibleDateTime for text that is not purely numeric.
 * Day-first forms come before any month-first reading.
 */
export const DEFAULT_DATE_FORMATS: readonly string[] = [
  DATE_FORMATS.RECORD,
  'YYYY-MM-DD[T]HH:mm:ss',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD',
  'YYYY/MM/DD',
  'DD-MM-YYYY',
  'D-M-YYYY',
  'DD/MM/YYYY',
  'D/M/YYYY',
  'DD.MM.YYYY',
  'D.M.YYYY',
  'DD-MM-YYYY HH:mm:ss',
  'DD/MM/YYYY HH:mm:ss',
  'D MMM YYYY',
  'DD MMM YYYY',
  'D MMMM YYYY',
  'DD MMMM YYYY',
  'MMM D, YYYY',
  'MMM D YYYY',
  'MMMM D, YYYY',
  'MMMM D YYYY',
];

export type DateInput = Date | string | null | undefined;

function parseCompactDigits(raw: string): Date {
  const format =
    raw.length === 14 ? DATE_FORMATS.INTERCHANGE : raw.length === 8 ? DATE_FORMATS.DAY : undefined;
  if (format === undefined) {
    throw new ValidationError(
      `Unable to parse date: "${raw}" is a ${raw.length}-digit number (expected 8 or 14 digits)`,
      'date',
      raw
    );
  }
  const parsed = dayjs.utc(raw, format, true);
  if (!parsed.isValid()) {
    throw new ValidationError(`Unable to parse date: "${raw}" is not a valid ${format} value`, 'date', raw);
  }
  return parsed.toDate();
}

/**
 * Turn a scraped date into an instant.
 *
 * Dates pass through unchanged and blank text means "no date". Wall-clock text is read as UTC.
 * Malformed numeric artifacts raise ValidationError instead of yielding a nonsense date.
 */
export function parseFlexibleDateTime(
  raw: DateInput,
  formats: readonly string[] = DEFAULT_DATE_FORMATS
): Date | null {
  if (raw instanceof Date) {
    return raw;
  }
  if (raw === null || raw === undefined) {
    return null;
  }
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    return parseCompactDigits(trimmed);
  }

  for (const format of formats) {
    const parsed = dayjs.utc(trimmed, format, true);
    if (parsed.isValid()) {
      return parsed.toDate();
    }
  }

  // The general parser reads wall-clock text in the host timezone; keep its fields, drop the zone.
  const fallback = dayjs(trimmed);
  if (fallback.isValid()) {
    return dayjs.utc(fallback.format('YYYY-MM-DD[T]HH:mm:ss.SSS')).toDate();
  }

  throw new ValidationError(`Unable to parse date: "${raw}"`, 'date', raw);
}

export function toInterchangeDateTime(date: Date | null | undefined): string {
  if (date === null || date === undefined) {
    return '';
  }
  return dayjs.utc(date).format(DATE_FORMATS.INTERCHANGE);
}

export function toRecordDateTime(date: Date | null | undefined): string {
  if (date === null || date === undefined) {
    return '';
  }
  return dayjs.utc(date).format(DATE_FORMATS.RECORD);
}

/** "YYYYMMDD" part of the interchange encoding, used in output file names. */
export function toDayStamp(date: Date | null | undefined): string {
  return toInterchangeDateTime(date).substring(0, 8);
}
