import { describe, expect, it } from 'vitest';
import {
  creationDate,
  extractDate,
  formatDate,
  isValidCalendarDate,
  parseDateFormat,
  stripDatePrefix,
  stripDateToken
} from './DateExtractor.js';

describe('extractDate', () => {
  it.each([
    ['2024-01-15-document', '2024-01-15'],
    ['2024_01_15_document', '2024_01_15'],
    ['20240115-document', '20240115'],
    ['01-15-2024-document', '01-15-2024'],
    ['01_15_2024_document', '01_15_2024']
  ])('reads %s', (stem, token) => {
    expect(extractDate(stem)).toEqual({ year: 2024, month: 1, day: 15, token, index: 0 });
  });

  it('finds a date in the middle of a stem', () => {
    expect(extractDate('report 2024-03-05 final')).toEqual({
      year: 2024,
      month: 3,
      day: 5,
      token: '2024-03-05',
      index: 7
    });
  });

  it('returns null when there is no date', () => {
    expect(extractDate('document')).toBeNull();
  });

  it('rejects an impossible date instead of throwing', () => {
    expect(extractDate('2024-13-45-document')).toBeNull();
  });

  it('falls through to the next layout when the first match is invalid', () => {
    expect(extractDate('2024-13-45 20230102')).toEqual({
      year: 2023,
      month: 1,
      day: 2,
      token: '20230102',
      index: 11
    });
  });

  it('does not retry a layout further along the stem', () => {
    expect(extractDate('2024-13-01 2023-05-06')).toBeNull();
  });

  it('knows about leap years', () => {
    expect(extractDate('2024-02-29')).toMatchObject({ year: 2024, month: 2, day: 29 });
    expect(extractDate('2023-02-29')).toBeNull();
  });
});

describe('isValidCalendarDate', () => {
  it('rejects year zero and out-of-range days', () => {
    expect(isValidCalendarDate({ year: 0, month: 1, day: 1 })).toBe(false);
    expect(isValidCalendarDate({ year: 2024, month: 4, day: 31 })).toBe(false);
    expect(isValidCalendarDate({ year: 2024, month: 12, day: 31 })).toBe(true);
  });
});

describe('stripDatePrefix', () => {
  it.each([
    ['2024-01-15-document.pdf', 'document.pdf'],
    ['2024-01-15 document.pdf', 'document.pdf'],
    ['2024_01_15_document.pdf', 'document.pdf'],
    ['20240115-document.pdf', 'document.pdf'],
    ['01-15-2024-document.pdf', 'document.pdf'],
    ['01_15_2024 _ document.pdf', 'document.pdf']
  ])('strips the prefix of %s', (input, expected) => {
    expect(stripDatePrefix(input)).toBe(expected);
  });

  it('leaves names without a date alone', () => {
    expect(stripDatePrefix('document.pdf')).toBe('document.pdf');
  });

  it('only touches the start of the name', () => {
    expect(stripDatePrefix('report-2024-01-15')).toBe('report-2024-01-15');
  });
});

describe('stripDateToken', () => {
  function strip(stem: string): string {
    const found = extractDate(stem);
    if (!found) throw new Error(`no date in ${stem}`);
    return stripDateToken(stem, found);
  }

  it('removes the token and the separators after it', () => {
    expect(strip('2024-01-15_doc')).toBe('doc');
    expect(strip('report-2024-01-15-final')).toBe('report-final');
  });

  it('keeps words apart when the date was glued between them', () => {
    expect(strip('abc2024-01-15def')).toBe('abc-def');
  });

  it('leaves trailing text before a final date as-is', () => {
    expect(strip('notes 2024-01-15')).toBe('notes ');
  });
});

describe('creationDate', () => {
  it('prefers the birth time', () => {
    expect(creationDate({ birthtimeMs: 1000, ctimeMs: 500, mtimeMs: 200 }).getTime()).toBe(1000);
  });

  it('falls back to the earlier of ctime and mtime', () => {
    expect(creationDate({ birthtimeMs: 0, ctimeMs: 5000, mtimeMs: 3000 }).getTime()).toBe(3000);
    expect(creationDate({ birthtimeMs: 0, ctimeMs: 2000, mtimeMs: 3000 }).getTime()).toBe(2000);
  });
});

describe('formatDate', () => {
  const date = { year: 2024, month: 1, day: 15 };

  it('defaults to the full format', () => {
    expect(formatDate(date)).toBe('2024-01-15');
  });

  it('supports year-month and year', () => {
    expect(formatDate(date, 'year-month')).toBe('2024-01');
    expect(formatDate(date, 'year')).toBe('2024');
  });

  it('falls back to full for unknown formats', () => {
    expect(formatDate(date, 'invalid')).toBe('2024-01-15');
  });

  it('reads a Date in local time with leading zeros', () => {
    expect(formatDate(new Date(2024, 4, 3))).toBe('2024-05-03');
  });
});

describe('parseDateFormat', () => {
  it('accepts known formats case-insensitively', () => {
    expect(parseDateFormat(' YEAR ')).toBe('year');
    expect(parseDateFormat('year-month')).toBe('year-month');
  });

  it('returns null for anything else', () => {
    expect(parseDateFormat('monthly')).toBeNull();
    expect(parseDateFormat(undefined)).toBeNull();
  });
});
