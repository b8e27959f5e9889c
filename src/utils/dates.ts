/**
 * Date formatting and parsing for timestamp labels.
 *
 * Two output forms exist on purpose: the display form (MM/dd/yyyy) is what a
 * reviewer sees; the unambiguous form (yyyy-MM-dd) is what this system writes
 * whenever it must read the value back.
 *
 * @module utils/dates
 */

import { format, isValid, parse, parseISO } from 'date-fns';
import { ValidationError } from './validation.js';

export const DISPLAY_DATE_FORMAT = 'MM/dd/yyyy';
export const UNAMBIGUOUS_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Platform date formats, most specific first, each with the prefix pattern
 * that lets `2021-03-04T10:00:00Z` match `yyyy-MM-dd`.
 */
const PLATFORM_DATE_FORMATS: Array<{ fmt: string; prefix: RegExp }> = [
  { fmt: 'yyyy-MM-dd', prefix: /^\d{4}-\d{2}-\d{2}/ },
  { fmt: 'yyyy-MM', prefix: /^\d{4}-\d{2}/ },
  { fmt: 'yyyy', prefix: /^\d{4}/ },
];

const REFERENCE_DATE = new Date(2000, 0, 1, 0, 0, 0, 0);

export function formatDisplayDate(date: Date): string {
  return format(date, DISPLAY_DATE_FORMAT);
}

export function formatUnambiguousDate(date: Date): string {
  return format(date, UNAMBIGUOUS_DATE_FORMAT);
}

/**
 * Parse a date string the way the platform emits them. Trailing data after a
 * matching prefix is ignored. Falls back to ISO and then general parsing.
 *
 * @throws ValidationError when nothing parses
 */
export function parseDate(value: string): Date {
  const trimmed = value.trim();

  for (const { fmt, prefix } of PLATFORM_DATE_FORMATS) {
    const match = prefix.exec(trimmed);
    if (!match) continue;
    const parsed = parse(match[0], fmt, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }

  const iso = parseISO(trimmed);
  if (isValid(iso)) {
    return iso;
  }

  const general = new Date(trimmed);
  if (isValid(general)) {
    return general;
  }

  throw new ValidationError(`Unable to parse date: "${value}"`);
}
