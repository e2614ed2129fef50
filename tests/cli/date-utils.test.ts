import { format } from 'date-fns';
import { describe, expect, it } from 'vitest';
import { formatDueDate, isOverdue, parseDueDate } from '../../src/cli/date-utils.js';
import { DateParseError } from '../../src/cli/errors.js';
import { NOW } from '../helpers/fixtures.js';

const strict = { dateFormat: 'yyyy-MM-dd', humanTime: false, now: NOW };
const human = { ...strict, humanTime: true };

describe('parseDueDate', () => {
  it('treats empty input as no due date', () => {
    expect(parseDueDate('', strict)).toBeNull();
    expect(parseDueDate('   ', human)).toBeNull();
  });

  it('reads the configured format', () => {
    expect(parseDueDate('2026-10-19', strict)?.toISOString()).toBe('2026-10-19T00:00:00.000Z');
    expect(parseDueDate('19.10.2026 14:30', { ...strict, dateFormat: 'dd.MM.yyyy HH:mm' })?.toISOString()).toBe(
      '2026-10-19T14:30:00.000Z'
    );
  });

  it('accepts informal phrases only when human time is on', () => {
    const parsed = parseDueDate('tomorrow', human);
    expect(parsed).not.toBeNull();
    expect(parsed && format(parsed, 'yyyy-MM-dd')).toBe('2026-10-19');

    expect(() => parseDueDate('tomorrow', strict)).toThrow(
      "Invalid date 'tomorrow'. Expected format: yyyy-MM-dd."
    );
  });

  it('rejects text no parser understands', () => {
    expect(() => parseDueDate('blorf', human)).toThrow(DateParseError);
    expect(() => parseDueDate('blorf', human)).toThrow("Time description not recognized: 'blorf'.");
  });
});

describe('formatDueDate', () => {
  it('prints in the configured pattern', () => {
    expect(formatDueDate(new Date('2026-10-19T09:05:00Z'), 'yyyy-MM-dd HH:mm')).toBe('2026-10-19 09:05');
  });

  it('throws for an invalid date', () => {
    expect(() => formatDueDate(new Date(Number.NaN), 'yyyy-MM-dd')).toThrow(RangeError);
  });
});

describe('isOverdue', () => {
  it('compares against now', () => {
    expect(isOverdue(new Date('2026-10-17T00:00:00Z'), NOW)).toBe(true);
    expect(isOverdue(new Date('2026-10-19T00:00:00Z'), NOW)).toBe(false);
  });
});
