import { isZero, toNumber } from './decimal.js';
import { renderRows } from './template.js';
import type { CellFormat, CellValue, NormalizedRecord, Row } from './types.js';

export const DETAIL_SHEET = 'Detailed Data';
export const TAX_RATES_SHEET = 'Tax Rates';

// Rate cells on the Tax Rates sheet (see buildTaxRateRows).
export const INCOME_TAX_RATE_REF = `'${TAX_RATES_SHEET}'!$C$2`;
export const CAPITAL_GAINS_TAX_RATE_REF = `'${TAX_RATES_SHEET}'!$C$3`;

export const DETAIL_COLUMNS = [
  'Date',
  'Plan',
  'Contribution Type',
  'Shares',
  'Market Price',
  'Value',
  'Purchase Price',
  'Cost Basis',
  'Own Costs',
  'Taxable Unrealized Gains',
  'Real Unrealized Gains',
  'Estimated Tax',
  'Estimated Net Profit'
] as const;

export type DetailColumn = (typeof DETAIL_COLUMNS)[number];

export const DETAIL_FORMATS: Partial<Record<DetailColumn, CellFormat>> = {
  Date: 'text',
  Shares: 'number',
  'Market Price': 'currency',
  Value: 'currency',
  'Purchase Price': 'currency',
  'Cost Basis': 'currency',
  'Own Costs': 'currency',
  'Taxable Unrealized Gains': 'currency',
  'Real Unrealized Gains': 'currency',
  'Estimated Tax': 'currency',
  'Estimated Net Profit': 'currency'
};

const ref = (col: DetailColumn) => `{{${col}}}{{index}}`;

export const DETAIL_FORMULAS = {
  value: `=ROUND(${ref('Shares')}*${ref('Market Price')},2)`,
  costBasis: `=IF(${ref('Purchase Price')}="","",ROUND(${ref('Shares')}*${ref('Purchase Price')},2))`,
  ownCosts:
    `=IF(${ref('Contribution Type')}="Company Match",ROUND(${INCOME_TAX_RATE_REF}*${ref('Cost Basis')},2),` +
    `IF(${ref('Contribution Type')}="Locked Award","",${ref('Cost Basis')}))`,
  taxableGains: `=IF(${ref('Cost Basis')}="","",ROUND(${ref('Value')}-${ref('Cost Basis')},2))`,
  realGains: `=IF(${ref('Cost Basis')}="","",ROUND(${ref('Value')}-${ref('Own Costs')},2))`,
  estimatedTax:
    `=IF(${ref('Taxable Unrealized Gains')}="","",IF(${ref('Taxable Unrealized Gains')}<0,0,` +
    `ROUND(${CAPITAL_GAINS_TAX_RATE_REF}*${ref('Taxable Unrealized Gains')},2)))`,
  netProfit: `=IF(${ref('Cost Basis')}="","",ROUND(${ref('Real Unrealized Gains')}-${ref('Estimated Tax')},2))`
};

/** One unrendered detail row; formulas still carry placeholders. */
export function detailTemplate(record: NormalizedRecord): Row {
  const cells: Record<DetailColumn, CellValue> = {
    Date: record.date,
    Plan: record.plan,
    'Contribution Type': record.contributionType,
    Shares: toNumber(record.shares),
    'Market Price': toNumber(record.marketPrice),
    Value: DETAIL_FORMULAS.value,
    'Purchase Price': isZero(record.purchasePrice) ? null : toNumber(record.purchasePrice),
    'Cost Basis': DETAIL_FORMULAS.costBasis,
    'Own Costs': DETAIL_FORMULAS.ownCosts,
    'Taxable Unrealized Gains': DETAIL_FORMULAS.taxableGains,
    'Real Unrealized Gains': DETAIL_FORMULAS.realGains,
    'Estimated Tax': DETAIL_FORMULAS.estimatedTax,
    'Estimated Net Profit': DETAIL_FORMULAS.netProfit
  };
  return DETAIL_COLUMNS.map(name => ({ name, value: cells[name] }));
}

/** Detail rows for records already sorted by date, numbered from row 2. */
export function buildDetailRows(records: readonly NormalizedRecord[]): Row[] {
  return renderRows(records.map(detailTemplate));
}
