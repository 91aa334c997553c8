import type { Cell, CellFormat, CellValue, Row, Sheet } from './types.js';

/** 0-based column index -> spreadsheet letters: 0 -> A, 25 -> Z, 26 -> AA. */
export function columnLetter(c: number): string {
  let n = c + 1, s = '';
  while (n > 0) { const rem = (n - 1) % 26; s = String.fromCharCode(65 + rem) + s; n = Math.floor((n - 1) / 26); }
  return s;
}

function toCell(value: CellValue, format?: CellFormat): Cell {
  if (typeof value === 'string' && value.startsWith('=')) return { value: null, formula: value, format };
  return { value, format };
}

/**
 * Workbook of named sheets built row by row. The first row appended to a
 * sheet fixes its header; every later row must declare the same columns in
 * the same order, since formulas address columns by letter.
 */
export class SheetModel {
  readonly sheets = new Map<string, Sheet>();

  static a1ToRc(ref: string): { r: number; c: number } {
    const m = ref.match(/^([A-Za-z]+)([0-9]+)$/);
    if (!m) throw new Error(`Bad A1 ref: ${ref}`);
    const colStr = m[1].toUpperCase();
    const row = parseInt(m[2], 10) - 1;
    let col = 0;
    for (let i = 0; i < colStr.length; i++) col = col * 26 + (colStr.charCodeAt(i) - 64);
    return { r: row, c: col - 1 };
  }

  getSheet(name: string): Sheet {
    const s = this.sheets.get(name);
    if (!s) throw new Error(`Sheet not found: ${name}`);
    return s;
  }

  /** `columns` fixes the header up front, so a sheet without rows still has one. */
  createSheet(name: string, columns: readonly string[] = [], formats: Sheet['formats'] = {}) {
    if (this.sheets.has(name)) throw new Error(`Sheet exists: ${name}`);
    if (name.length > 31) throw new Error(`Sheet name longer than 31 characters: ${name}`);
    const sheet: Sheet = { name, columns: [...columns], rows: [], formats };
    this.sheets.set(name, sheet);
    return sheet;
  }

  appendRows(name: string, rows: readonly Row[]) {
    const s = this.getSheet(name);
    for (const row of rows) {
      const cols = row.map(c => c.name);
      if (s.columns.length === 0 && s.rows.length === 0) s.columns = [...cols];
      else if (cols.length !== s.columns.length || cols.some((c, i) => c !== s.columns[i])) {
        throw new Error(`Row ${s.rows.length + 2} of '${name}' declares columns [${cols.join(', ')}], expected [${s.columns.join(', ')}]`);
      }
      s.rows.push(row.map(c => toCell(c.value, s.formats[c.name])));
    }
  }

  /** Reads a cell by A1 reference; row 1 is the header. */
  getCell(name: string, a1: string): Cell | undefined {
    const s = this.getSheet(name);
    const { r, c } = SheetModel.a1ToRc(a1);
    if (r === 0) return c < s.columns.length ? { value: s.columns[c] } : undefined;
    return s.rows[r - 1]?.[c];
  }

  /** 1-based number of the last row holding data (1 when only the header exists). */
  lastRow(name: string): number {
    return this.getSheet(name).rows.length + 1;
  }

  toJSON() {
    return {
      sheets: Array.from(this.sheets.values()).map(s => ({
        name: s.name,
        columns: s.columns,
        rows: s.rows.map(row => row.map(c => ({ value: c.value, formula: c.formula ?? null, format: c.format ?? null })))
      }))
    };
  }
}
