import fs from 'fs';

import { parse } from 'csv-parse/sync';

import { InputError } from './errors';

export const CLOSE_COLUMN = 'close';
// First match wins; only used for log context, rows are never re-ordered
const TIMESTAMP_COLUMNS = ['timestamp', 'date', 'datetime'];
// Plain decimal notation only: no hex, binary, octal or Infinity
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface PriceRow {
  timestamp?: string;
  close: number;
}

const isStringGrid = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));

/**
 * Parse CSV text into price rows. The first line is the header and must
 * contain a `close` column with a finite number in every data row.
 */
export const parsePriceCsv = (csvData: string, sourceLabel = 'input'): PriceRow[] => {
  let parsed: unknown;
  try {
    parsed = parse(csvData, {
      delimiter: ',',
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new InputError(
      `There's something wrong with the CSV format: ${error instanceof Error ? error.message : String(error)}`,
      sourceLabel
    );
  }

  if (!isStringGrid(parsed)) {
    throw new InputError('The CSV parser returned an unexpected structure.', sourceLabel);
  }

  const [header, ...rows] = parsed;
  if (!header || rows.length === 0) {
    throw new InputError('The data file appears to be empty.', sourceLabel);
  }

  const closeIndex = header.indexOf(CLOSE_COLUMN);
  if (closeIndex === -1) {
    throw new InputError(
      `The data file is missing the '${CLOSE_COLUMN}' column. It only has: ${header.join(', ')}`,
      sourceLabel
    );
  }
  const timestampIndex = TIMESTAMP_COLUMNS.map(name => header.indexOf(name)).find(i => i !== -1);

  return rows.map((row, rowIndex) => {
    const rawClose = row[closeIndex] ?? '';
    const close = DECIMAL_PATTERN.test(rawClose) ? Number(rawClose) : NaN;
    if (!Number.isFinite(close)) {
      // +2: one for the header, one for 1-based line numbers
      throw new InputError(
        `The '${CLOSE_COLUMN}' column has a value that isn't a number on line ${rowIndex + 2}: '${rawClose}'`,
        sourceLabel
      );
    }

    const priceRow: PriceRow = { close };
    if (timestampIndex !== undefined && row[timestampIndex]) {
      priceRow.timestamp = row[timestampIndex];
    }
    return priceRow;
  });
};

/**
 * Load the price series from a CSV file
 *
 * @param dataFilePath Path to a CSV file with a header row
 * @returns Rows in file order
 */
export const loadPriceSeries = (dataFilePath: string): PriceRow[] => {
  if (!fs.existsSync(dataFilePath)) {
    throw new InputError(`Data file not found: ${dataFilePath}`, dataFilePath);
  }

  let csvData: string;
  try {
    csvData = fs.readFileSync(dataFilePath, 'utf8');
  } catch (error) {
    throw new InputError(
      `Could not read data file ${dataFilePath}: ${error instanceof Error ? error.message : String(error)}`,
      dataFilePath
    );
  }

  return parsePriceCsv(csvData, dataFilePath);
};
