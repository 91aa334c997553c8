import ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';
import { EnvironmentDependencyUnavailableError } from './errors.js';

/** SheetJS reads the export; ExcelJS writes the report (it can freeze panes). */
export type SpreadsheetLibraries = {
  xlsx: typeof XLSX;
  exceljs: typeof ExcelJS;
};

const REQUIRED_XLSX = ['read'];
const REQUIRED_XLSX_UTILS = ['encode_cell', 'decode_range'];
const REQUIRED_EXCELJS = ['Workbook'];

function isCallable(owner: unknown, name: string): boolean {
  return typeof owner === 'object' && owner !== null && typeof Reflect.get(owner, name) === 'function';
}

/** Names of the capabilities the report pipeline needs that `libs` lack. */
export function missingCapabilities(libs: { xlsx: object; exceljs: object }): string[] {
  const utils: unknown = Reflect.get(libs.xlsx, 'utils');
  return [
    ...REQUIRED_XLSX.filter(n => !isCallable(libs.xlsx, n)).map(n => `xlsx.${n}`),
    ...REQUIRED_XLSX_UTILS.filter(n => !isCallable(utils, n)).map(n => `xlsx.utils.${n}`),
    ...REQUIRED_EXCELJS.filter(n => !isCallable(libs.exceljs, n)).map(n => `exceljs.${n}`)
  ];
}

export function assertSpreadsheetLibrary(libs: { xlsx: object; exceljs: object }) {
  const missing = missingCapabilities(libs);
  if (missing.length) {
    throw new EnvironmentDependencyUnavailableError(`Spreadsheet library is missing: ${missing.join(', ')}`);
  }
}

/** Access to the spreadsheet libraries that ends when its scope is released. */
export class SpreadsheetSession {
  private released = false;

  constructor(private readonly libs: SpreadsheetLibraries) {}

  private check() {
    if (this.released) throw new EnvironmentDependencyUnavailableError('Spreadsheet session already released');
  }

  get xlsx(): typeof XLSX {
    this.check();
    return this.libs.xlsx;
  }

  get exceljs(): typeof ExcelJS {
    this.check();
    return this.libs.exceljs;
  }

  release() {
    this.released = true;
  }
}

/**
 * Checks the spreadsheet libraries once, runs `fn` with a session on them and
 * releases the session once `fn` settles, whether it resolves or throws.
 */
export async function withSpreadsheetLibrary<T>(
  fn: (session: SpreadsheetSession) => T | Promise<T>,
  libs: SpreadsheetLibraries = { xlsx: XLSX, exceljs: ExcelJS }
): Promise<T> {
  assertSpreadsheetLibrary(libs);
  const session = new SpreadsheetSession(libs);
  try {
    return await fn(session);
  } finally {
    session.release();
  }
}
