import { describe, it, expect } from 'vitest';
import ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';
import { withSpreadsheetLibrary } from './environment.js';
import { HEADER, SAMPLE_ROWS, portfolioBuffer } from './fixtures/portfolio.js';
import { SheetModel } from './sheet.js';
import { readInputSheet, toExcelWorkbook, writeWorkbookBuffer } from './workbook-io.js';

describe('readInputSheet', () => {
  it('reads the header on row 6 and the rows below it', async () => {
    const sheet = await withSpreadsheetLibrary(s => readInputSheet(s, portfolioBuffer()));
    expect(sheet.headerRow).toBe(6);
    expect(sheet.header).toEqual(HEADER);
    expect(sheet.rows.map(r => r.row)).toEqual([7, 8, 9]);
    expect(sheet.rows[0].values).toEqual(SAMPLE_ROWS[0]);
  });

  it('skips blank rows but keeps physical row numbers', async () => {
    const sheet = await withSpreadsheetLibrary(s => readInputSheet(s, portfolioBuffer([SAMPLE_ROWS[0], [], SAMPLE_ROWS[2]])));
    expect(sheet.rows.map(r => r.row)).toEqual([7, 9]);
  });

  it('reads missing cells as null', async () => {
    const sheet = await withSpreadsheetLibrary(s => readInputSheet(s, portfolioBuffer([['Share Plan', 'Purchase', 1, 5]])));
    expect(sheet.rows[0].values).toEqual(['Share Plan', 'Purchase', 1, 5, null, null, null, null]);
  });
});

describe('toExcelWorkbook', () => {
  function model() {
    const m = new SheetModel();
    m.createSheet('S', ['Name', 'Amount', 'Double'], { Amount: 'currency' });
    m.appendRows('S', [
      [{ name: 'Name', value: 'a' }, { name: 'Amount', value: 1.5 }, { name: 'Double', value: '=B2*2' }],
      [{ name: 'Name', value: 'longer name here' }, { name: 'Amount', value: null }, { name: 'Double', value: '=B3*2' }]
    ]);
    return m;
  }

  it('writes literals, formulas and number formats', async () => {
    const ws = (await withSpreadsheetLibrary(s => toExcelWorkbook(s, model()))).getWorksheet('S');
    expect(ws?.getCell('A1').value).toBe('Name');
    expect(ws?.getCell('B2').value).toBe(1.5);
    expect(ws?.getCell('B2').numFmt).toBe('#,##0.00');
    expect(ws?.getCell('C2').formula).toBe('B2*2');
    expect(ws?.getCell('B3').value).toBeNull();
  });

  it('freezes the header row and sets an auto-filter and column widths', async () => {
    const ws = (await withSpreadsheetLibrary(s => toExcelWorkbook(s, model()))).getWorksheet('S');
    expect(ws?.views).toEqual([{ state: 'frozen', ySplit: 1 }]);
    expect(ws?.autoFilter).toEqual({ from: { row: 1, column: 1 }, to: { row: 3, column: 3 } });
    expect([1, 2, 3].map(c => ws?.getColumn(c).width)).toEqual([18, 10, 10]);
  });

  it('keeps formulas and the frozen header through an .xlsx round trip', async () => {
    const data = await withSpreadsheetLibrary(s => writeWorkbookBuffer(s, model()));

    const book = XLSX.read(data, { type: 'buffer', sheetStubs: true });
    expect(book.SheetNames).toEqual(['S']);
    expect(book.Sheets.S.C3.f).toBe('B3*2');

    const reread = new ExcelJS.Workbook();
    await reread.xlsx.load(await withSpreadsheetLibrary(s => toExcelWorkbook(s, model()).xlsx.writeBuffer()));
    expect(reread.getWorksheet('S')?.views).toMatchObject([{ state: 'frozen', ySplit: 1 }]);
  });
});
