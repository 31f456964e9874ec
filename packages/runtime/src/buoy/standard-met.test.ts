// Tests for standard meteorological file parsing and averaging

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { parseStandardMet, summarizeStandardMet, StandardMetParseError } from './standard-met.js';

const agateBuoy = readFileSync(new URL('./__fixtures__/46050.txt', import.meta.url), 'utf8');

const utc = (iso: string) => DateTime.fromISO(iso, { zone: 'utc' });

describe('parseStandardMet', () => {
  it('reads one row per data line with UTC timestamps', () => {
    const rows = parseStandardMet(agateBuoy);

    expect(rows).toHaveLength(6);
    expect(rows[0].observedAt.toISO()).toBe('2024-01-01T21:50:00.000Z');
    expect(rows[5].observedAt.toISO()).toBe('2024-01-01T20:50:00.000Z');
  });

  it('keeps the summary columns and turns MM into null', () => {
    const [first, second] = parseStandardMet(agateBuoy);

    expect(first.values).toEqual({
      WDIR: 350,
      WSPD: 11,
      GST: 14,
      WVHT: null,
      DPD: null,
      MWD: null,
      ATMP: 12,
      WTMP: 10,
    });
    expect(second.values.MWD).toBe(270);
  });

  it('ignores blank lines and finds columns by header name', () => {
    const text = [
      '#YY  MM DD hh mm WTMP ATMP MWD DPD WVHT GST WSPD WDIR',
      '',
      '2024 03 02 15 20 10.5 11.0 280 11 1.5 12 8 10',
      '',
    ].join('\n');

    const [row] = parseStandardMet(text);

    expect(row.observedAt.toISO()).toBe('2024-03-02T15:20:00.000Z');
    expect(row.values).toMatchObject({ WDIR: 10, WTMP: 10.5, MWD: 280 });
  });

  it('rejects text without a header line', () => {
    expect(() => parseStandardMet('2024 01 01 21 00 357 10.2')).toThrow(StandardMetParseError);
    expect(() => parseStandardMet('<html>Not Found</html>')).toThrow('missing #YY header line');
  });

  it('rejects a header without a summary column', () => {
    expect(() => parseStandardMet('#YY MM DD hh mm WDIR WSPD\n2024 01 01 21 00 357 10.2')).toThrow(
      'missing column GST'
    );
  });

  it('rejects a row with an impossible timestamp', () => {
    const text = agateBuoy.replace('2024 01 01 21 30', '2024 13 01 21 30');

    expect(() => parseStandardMet(text)).toThrow(/^bad timestamp in row: 2024 13 01 21 30/);
  });
});

describe('summarizeStandardMet', () => {
  const rows = parseStandardMet(agateBuoy);

  it('averages the rows inside the window to two decimals', () => {
    const summary = summarizeStandardMet(rows, {
      start: utc('2024-01-01T21:00:00Z'),
      end: utc('2024-01-01T21:45:00Z'),
    });

    expect(summary).toEqual({
      samples: 4,
      means: {
        WDIR: 357.5,
        WSPD: 10.2,
        GST: 13.2,
        WVHT: 1.3,
        DPD: 9.5,
        MWD: 272.5,
        ATMP: 12.5,
        WTMP: 9.83,
      },
    });
  });

  it('includes rows on both ends of the window', () => {
    const summary = summarizeStandardMet(rows, {
      start: utc('2024-01-01T21:10:00Z'),
      end: utc('2024-01-01T21:40:00Z'),
    });

    expect(summary.samples).toBe(3);
  });

  it('reports null means when the window holds no rows', () => {
    const summary = summarizeStandardMet(rows, {
      start: utc('2024-01-02T08:00:00Z'),
      end: utc('2024-01-02T09:00:00Z'),
    });

    expect(summary.samples).toBe(0);
    expect(Object.values(summary.means).every((mean) => mean === null)).toBe(true);
  });
});
