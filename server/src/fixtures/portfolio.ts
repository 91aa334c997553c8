import * as XLSX from 'xlsx';
import type { CellValue } from '../types.js';

export const HEADER = [
  'Plan',
  'Contribution type',
  'Strike price / Cost basis',
  'Market price',
  'Available from',
  'Allocated quantity',
  'Allocation date',
  'Expiry date'
];

// Serials: 45078 = 2023-06-01, 45292 = 2024-01-01, 45658 = 2025-01-01, 46023 = 2026-01-01
export const SAMPLE_ROWS: CellValue[][] = [
  ['Share Plan', 'Award', 0, 5, 45658, 10, 45292, 46023],
  ['Share Plan', 'Award', 2, 5, 45292, 5, 45078, 46023],
  ['Share Plan', 'Company match', 3, 5, 45658, 8, 45292, 46023]
];

/** An export as the brokerage produces it: five preamble rows, header on row 6. */
export function portfolioSheet(rows: CellValue[][] = SAMPLE_ROWS, header: string[] = HEADER): XLSX.WorkSheet {
  const preamble: CellValue[][] = [['Portfolio export'], ['Account', 'test-account'], [], [], []];
  return XLSX.utils.aoa_to_sheet([...preamble, header, ...rows]);
}

export function portfolioBuffer(rows?: CellValue[][], header?: string[]): Buffer {
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, portfolioSheet(rows, header), 'Portfolio');
  const out: Buffer = XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
  return out;
}
