import fs from 'fs';
import path from 'path';
import { serialToIsoDate } from './dates.js';
import { buildDetailRows, DETAIL_COLUMNS, DETAIL_FORMATS, DETAIL_SHEET, TAX_RATES_SHEET } from './detail.js';
import { withSpreadsheetLibrary, type SpreadsheetSession } from './environment.js';
import { InvalidOutputSpecificationError, InvalidParameterError, MissingInputFileError } from './errors.js';
import { INPUT_DATE_LABELS, normalizeSheet } from './normalizer.js';
import { buildOverviewRows, buildTaxRateRows, OVERVIEW_COLUMNS, OVERVIEW_FORMATS, OVERVIEW_SHEET, TAX_RATE_COLUMNS, TAX_RATE_FORMATS } from './overview.js';
import { SheetModel } from './sheet.js';
import type { CellValue, EnhancedFile, InputSheet, Row, TaxRates } from './types.js';
import { readInputFile, readInputSheet, toExcelWorkbook, writeWorkbookBuffer, writeWorkbookFile } from './workbook-io.js';

export const INPUT_DATA_SHEET = 'Input Data';
export const OUTPUT_PREFIX = 'Enhanced-';

export type OutputOptions = {
  outputDir?: string;
  outputFile?: string;
};

export type BatchOptions = OutputOptions & {
  taxRates: TaxRates;
  /** Input paths arrived through a pipe rather than as arguments. */
  piped?: boolean;
  onFile?: (result: EnhancedFile) => void;
};

function echoValue(label: string, value: CellValue): CellValue {
  if (INPUT_DATE_LABELS.some(l => l === label) && typeof value === 'number' && value >= 0) return serialToIsoDate(value);
  return value;
}

/** The source rows as read, with the date-serial columns turned into ISO text. */
export function buildInputEchoRows(input: InputSheet): Row[] {
  return input.rows.map(r => input.header.map((name, c) => ({ name, value: echoValue(name, r.values[c] ?? null) })));
}

/**
 * Runs the whole transformation on one source sheet. Throws before returning
 * anything when a row fails to normalize, so callers never see a partial
 * report.
 */
export function buildReport(input: InputSheet, taxRates: TaxRates): SheetModel {
  const records = normalizeSheet(input);
  const detailRows = buildDetailRows(records);
  const model = new SheetModel();

  model.createSheet(OVERVIEW_SHEET, OVERVIEW_COLUMNS, OVERVIEW_FORMATS);
  model.createSheet(TAX_RATES_SHEET, TAX_RATE_COLUMNS, TAX_RATE_FORMATS);
  model.createSheet(DETAIL_SHEET, DETAIL_COLUMNS, DETAIL_FORMATS);
  model.createSheet(INPUT_DATA_SHEET, input.header);

  model.appendRows(DETAIL_SHEET, detailRows);
  model.appendRows(OVERVIEW_SHEET, buildOverviewRows(model.lastRow(DETAIL_SHEET)));
  model.appendRows(TAX_RATES_SHEET, buildTaxRateRows(taxRates));
  model.appendRows(INPUT_DATA_SHEET, buildInputEchoRows(input));
  return model;
}

export function outputFileName(inputFile: string): string {
  return OUTPUT_PREFIX + path.basename(inputFile);
}

export function resolveOutputPath(inputFile: string, options: OutputOptions = {}): string {
  if (options.outputFile) return path.resolve(options.outputFile);
  const dir = options.outputDir ?? path.dirname(path.resolve(inputFile));
  return path.resolve(dir, outputFileName(inputFile));
}

function assertInputFile(file: string) {
  if (!fs.existsSync(file) || !fs.statSync(file).isFile()) throw new MissingInputFileError(file);
}

/**
 * Reads, transforms and writes one file. The previous report is replaced only
 * once the new one has been built, so a bad input leaves it in place.
 */
export async function enhanceFile(session: SpreadsheetSession, inputFile: string, options: OutputOptions & { taxRates: TaxRates }): Promise<EnhancedFile> {
  const input = path.resolve(inputFile);
  assertInputFile(input);

  const sheet = readInputFile(session, input);
  if (sheet.rows.length === 0) console.warn(`⚠️  No data rows below header row ${sheet.headerRow} in ${input}`);
  const book = toExcelWorkbook(session, buildReport(sheet, options.taxRates));

  const output = resolveOutputPath(input, options);
  if (output === input) throw new InvalidOutputSpecificationError(`Output file would overwrite its input: ${input}`);
  fs.rmSync(output, { force: true });
  fs.mkdirSync(path.dirname(output), { recursive: true });
  await writeWorkbookFile(book, output);
  return { inputFile: input, outputFile: output };
}

export function validateOutputOptions(inputs: readonly string[], options: BatchOptions) {
  if (inputs.length === 0) throw new InvalidParameterError('No input files given');
  if (!options.outputFile) return;
  if (options.outputDir) throw new InvalidOutputSpecificationError('An output file and an output directory cannot be combined');
  if (inputs.length > 1 || options.piped) {
    throw new InvalidOutputSpecificationError('An explicit output file needs exactly one input file given as an argument');
  }
  if (path.resolve(options.outputFile) === path.resolve(inputs[0])) {
    throw new InvalidOutputSpecificationError(`Output file would overwrite its input: ${path.resolve(inputs[0])}`);
  }
}

/**
 * Processes `inputs` one at a time, in order, under a single spreadsheet
 * session. The first failure ends the batch; files already written stay.
 */
export async function enhanceFiles(inputs: readonly string[], options: BatchOptions): Promise<EnhancedFile[]> {
  validateOutputOptions(inputs, options);
  return withSpreadsheetLibrary(async session => {
    const results: EnhancedFile[] = [];
    for (const file of inputs) {
      const result = await enhanceFile(session, file, options);
      options.onFile?.(result);
      results.push(result);
    }
    return results;
  });
}

/** Same pipeline for an uploaded file; nothing touches the disk. */
export function enhanceBuffer(data: Buffer | Uint8Array, fileName: string, taxRates: TaxRates) {
  return withSpreadsheetLibrary(async session => {
    const model = buildReport(readInputSheet(session, data), taxRates);
    return { fileName: outputFileName(fileName), model, data: await writeWorkbookBuffer(session, model) };
  });
}

/** Builds the report model for an upload without serializing it. */
export function previewBuffer(data: Buffer | Uint8Array, taxRates: TaxRates): Promise<SheetModel> {
  return withSpreadsheetLibrary(session => buildReport(readInputSheet(session, data), taxRates));
}
