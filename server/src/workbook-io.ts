import fs from 'fs';
import type ExcelJS from 'exceljs';
import type { CellObject } from 'xlsx';
import type { SpreadsheetSession } from './environment.js';
import type { SheetModel } from './sheet.js';
import type { Cell, CellFormat, CellValue, InputRow, InputSheet, Sheet } from './types.js';

/** The export's header sits on row 6, below a five-row preamble. */
export const INPUT_HEADER_ROW = 6;

const NUMBER_FORMATS: Record<CellFormat, string> = {
  currency: '#,##0.00',
  percent: '0.00%',
  number: '#,##0.####',
  text: '@'
};

function readValue(cell: CellObject | undefined): CellValue {
  const v = cell?.v;
  if (typeof v === 'string') return v.trim() === '' ? null : v;
  if (typeof v === 'number' || typeof v === 'boolean') return v;
  return null;
}

/**
 * Reads the first sheet of an .xlsx buffer: header labels at `headerRow`
 * (1-based) and every non-blank row below it. Date cells stay day-count
 * serials.
 */
export function readInputSheet(session: SpreadsheetSession, data: Buffer | Uint8Array, headerRow = INPUT_HEADER_ROW): InputSheet {
  const xlsx = session.xlsx;
  const book = xlsx.read(data, { type: 'buffer' });
  const ws = book.Sheets[book.SheetNames[0]];
  if (!ws || !ws['!ref']) return { headerRow, header: [], rows: [] };

  const range = xlsx.utils.decode_range(ws['!ref']);
  const h = headerRow - 1;
  const header: string[] = [];
  for (let c = 0; c <= range.e.c; c++) {
    const v = readValue(ws[xlsx.utils.encode_cell({ r: h, c })]);
    header.push(v === null ? '' : String(v).trim());
  }
  while (header.length && header[header.length - 1] === '') header.pop();

  const rows: InputRow[] = [];
  for (let r = h + 1; r <= range.e.r; r++) {
    const values = header.map((_, c) => readValue(ws[xlsx.utils.encode_cell({ r, c })]));
    if (values.some(v => v !== null)) rows.push({ row: r + 1, values });
  }
  return { headerRow, header, rows };
}

export function readInputFile(session: SpreadsheetSession, file: string, headerRow = INPUT_HEADER_ROW): InputSheet {
  return readInputSheet(session, fs.readFileSync(file), headerRow);
}

function displayWidth(cell: Cell): number {
  if (cell.formula || cell.value === null) return 0;
  return String(cell.value).length;
}

function writeCell(target: ExcelJS.Cell, cell: Cell) {
  if (cell.formula) target.value = { formula: cell.formula.slice(1), date1904: false };
  else if (cell.value !== null) target.value = cell.value;
  if (cell.format) target.numFmt = NUMBER_FORMATS[cell.format];
}

function addWorksheet(book: ExcelJS.Workbook, sheet: Sheet) {
  const ws = book.addWorksheet(sheet.name, { views: [{ state: 'frozen', ySplit: 1 }] });
  const width = sheet.columns.length;
  if (width === 0) return ws;

  const header = ws.getRow(1);
  sheet.columns.forEach((name, c) => { header.getCell(c + 1).value = name; });
  header.font = { bold: true };
  sheet.rows.forEach((row, i) => row.forEach((cell, c) => writeCell(ws.getCell(i + 2, c + 1), cell)));

  ws.autoFilter = { from: { row: 1, column: 1 }, to: { row: sheet.rows.length + 1, column: width } };

  // Auto-size: widest literal in the column, header included, capped at 50.
  sheet.columns.forEach((name, c) => {
    const widest = sheet.rows.reduce((m, row) => Math.max(m, displayWidth(row[c])), name.length);
    ws.getColumn(c + 1).width = Math.min(Math.max(widest + 2, 10), 50);
  });
  return ws;
}

/** Every sheet of the model, in order, with its header row frozen. */
export function toExcelWorkbook(session: SpreadsheetSession, model: SheetModel): ExcelJS.Workbook {
  const book = new session.exceljs.Workbook();
  book.created = new Date();
  for (const sheet of model.sheets.values()) addWorksheet(book, sheet);
  return book;
}

export async function writeWorkbookBuffer(session: SpreadsheetSession, model: SheetModel): Promise<Buffer> {
  return Buffer.from(await toExcelWorkbook(session, model).xlsx.writeBuffer());
}

export async function writeWorkbookFile(book: ExcelJS.Workbook, file: string) {
  await book.xlsx.writeFile(file);
}
