// NDBC standard meteorological data ("realtime2" .txt files)
//
// Whitespace-separated columns under a '#YY MM DD hh mm ...' header line and
// a units line. Timestamps are UTC; 'MM' marks a missing value.

import { DateTime } from 'luxon';

/**
 * Columns averaged over a session, in file order.
 */
export const SUMMARY_COLUMNS = ['WDIR', 'WSPD', 'GST', 'WVHT', 'DPD', 'MWD', 'ATMP', 'WTMP'] as const;

export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

export type StandardMetRow = {
  observedAt: DateTime;
  values: Record<SummaryColumn, number | null>;
};

export type StandardMetSummary = {
  /** Rows that fell inside the window */
  samples: number;
  /** Mean of each column over the window, two decimals; null when every value was missing */
  means: Record<SummaryColumn, number | null>;
};

export type TimeWindow = {
  start: DateTime;
  end: DateTime;
};

const TIMESTAMP_COLUMNS = ['#YY', 'MM', 'DD', 'hh', 'mm'] as const;

function perColumn<T>(value: (column: SummaryColumn) => T): Record<SummaryColumn, T> {
  return {
    WDIR: value('WDIR'),
    WSPD: value('WSPD'),
    GST: value('GST'),
    WVHT: value('WVHT'),
    DPD: value('DPD'),
    MWD: value('MWD'),
    ATMP: value('ATMP'),
    WTMP: value('WTMP'),
  };
}

export class StandardMetParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StandardMetParseError';
  }
}

function toReading(field: string | undefined): number | null {
  if (field === undefined || field === 'MM') return null;
  const value = Number(field);
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a standard meteorological file into rows.
 *
 * @throws StandardMetParseError if the header is missing or a row has a bad timestamp
 */
export function parseStandardMet(text: string): StandardMetRow[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '');
  const header = lines.find((line) => line.startsWith('#YY'));
  if (!header) {
    throw new StandardMetParseError('missing #YY header line');
  }

  const names = header.trim().split(/\s+/);
  const indexOf = (name: string) => {
    const index = names.indexOf(name);
    if (index < 0) throw new StandardMetParseError(`missing column ${name}`);
    return index;
  };
  const [year, month, day, hour, minute] = TIMESTAMP_COLUMNS.map(indexOf);
  const columns = perColumn(indexOf);

  return lines
    .filter((line) => !line.startsWith('#'))
    .map((line) => {
      const fields = line.trim().split(/\s+/);
      const observedAt = DateTime.utc(
        Number(fields[year]),
        Number(fields[month]),
        Number(fields[day]),
        Number(fields[hour]),
        Number(fields[minute])
      );
      if (!observedAt.isValid) {
        throw new StandardMetParseError(`bad timestamp in row: ${line.trim()}`);
      }

      return { observedAt, values: perColumn((column) => toReading(fields[columns[column]])) };
    });
}

function roundHundredths(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Average every summary column over the rows observed within `window`,
 * both ends included. Missing values are left out of each column's mean.
 */
export function summarizeStandardMet(rows: StandardMetRow[], window: TimeWindow): StandardMetSummary {
  const start = window.start.toMillis();
  const end = window.end.toMillis();
  const inWindow = rows.filter((row) => {
    const at = row.observedAt.toMillis();
    return at >= start && at <= end;
  });

  const mean = (column: SummaryColumn): number | null => {
    const values = inWindow
      .map((row) => row.values[column])
      .filter((value): value is number => value !== null);
    if (values.length === 0) return null;
    return roundHundredths(values.reduce((sum, value) => sum + value, 0) / values.length);
  };

  return { samples: inWindow.length, means: perColumn(mean) };
}
