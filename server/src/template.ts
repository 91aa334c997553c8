import { columnLetter } from './sheet.js';
import type { Row } from './types.js';

const PLACEHOLDER_RE = /\{\{([^{}]+)\}\}/g;

/** First data row: row 1 holds the header. */
export const FIRST_DATA_ROW = 2;

/** Column name -> spreadsheet letter for the row's declared column order. */
export function columnLetters(columns: readonly string[]): Map<string, string> {
  return new Map(columns.map((name, i) => [name, columnLetter(i)]));
}

/**
 * Rewrites every string value of a row placed at `rowNumber`:
 * `{{index}}` becomes the row number and `{{Column}}` the letter of that
 * column in this row. Placeholders naming no declared column stay as written.
 */
export function renderRow(row: Row, rowNumber: number): Row {
  const letters = columnLetters(row.map(c => c.name));
  const substitute = (text: string) =>
    text.replace(PLACEHOLDER_RE, (whole, key: string) => {
      if (key === 'index') return String(rowNumber);
      return letters.get(key) ?? whole;
    });
  return row.map(c => (typeof c.value === 'string' ? { name: c.name, value: substitute(c.value) } : c));
}

/** Renders rows at consecutive positions starting at `startIndex`. */
export function renderRows(rows: readonly Row[], startIndex = FIRST_DATA_ROW): Row[] {
  return rows.map((row, i) => renderRow(row, startIndex + i));
}
