/**
 * Due-date parsing and display for the configured date format.
 */

import * as chrono from 'chrono-node';
import { format, isValid, parse } from 'date-fns';
import { DateParseError } from './errors.js';

export interface DateParseOptions {
  /** date-fns pattern, e.g. `yyyy-MM-dd` or `dd.MM.yyyy HH:mm`. */
  dateFormat: string;
  /** Accept informal descriptions such as "tomorrow" or "next friday 5pm". */
  humanTime: boolean;
  now: Date;
}

/**
 * Empty input means "no due date". The configured format is always tried first;
 * with `humanTime` chrono-node gets a second chance.
 */
export function parseDueDate(input: string, options: DateParseOptions): Date | null {
  const trimmed = input.trim();
  if (!trimmed) {
    return null;
  }

  const strict = parse(trimmed, options.dateFormat, options.now);
  if (isValid(strict)) {
    return strict;
  }

  if (options.humanTime) {
    const informal: Date | null = chrono.parseDate(trimmed, options.now, { forwardDate: true });
    if (informal && isValid(informal)) {
      return informal;
    }
    throw new DateParseError(trimmed, `Time description not recognized: '${trimmed}'.`);
  }

  throw new DateParseError(trimmed, `Invalid date '${trimmed}'. Expected format: ${options.dateFormat}.`);
}

/**
 * Throws a RangeError for an invalid Date, which listing reports inline.
 */
export function formatDueDate(date: Date, dateFormat: string): string {
  return format(date, dateFormat);
}

export function isOverdue(date: Date, now: Date): boolean {
  return date.getTime() < now.getTime();
}
