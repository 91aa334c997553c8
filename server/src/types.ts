export type CellValue = string | number | boolean | null;

/** Simple formatting: 'currency' | 'percent' | 'number' | 'text' */
export type CellFormat = 'currency' | 'percent' | 'number' | 'text';

export type Cell = {
  value: CellValue;
  formula?: string; // literal formula string starting with '='
  format?: CellFormat;
};

/** One (column, value) pair. Column order decides the spreadsheet letter. */
export type Column = { name: string; value: CellValue };

/** A row as an ordered list of columns; never a keyed object. */
export type Row = Column[];

export type Sheet = {
  name: string;
  columns: string[]; // header row, fixed by the first appended row
  rows: Cell[][]; // data rows, rows[r][c], header excluded
  formats: Partial<Record<string, CellFormat>>;
};

/** A source sheet as read: the header labels and the rows beneath them. */
export type InputSheet = {
  headerRow: number; // 1-based physical row of the header
  header: string[];
  rows: InputRow[];
};

export type InputRow = { row: number; values: CellValue[] }; // row: 1-based physical row

export const CONTRIBUTION_TYPES = ['Locked Award', 'Granted Award', 'Own Contribution', 'Company Match'] as const;
export type ContributionType = (typeof CONTRIBUTION_TYPES)[number];

/** Base-10 decimal text such as "12.5"; never a binary float. */
export type DecimalText = string;

export type NormalizedRecord = Readonly<{
  plan: string;
  contributionType: ContributionType;
  purchasePrice: DecimalText; // "0" means no purchase price
  marketPrice: DecimalText;
  shares: DecimalText;
  date: string; // yyyy-MM-dd
  sourceRow: number;
}>;

export type TaxRates = {
  incomeTaxPercent: number;
  capitalGainsTaxPercent: number;
};

export type EnhancedFile = { inputFile: string; outputFile: string };
