import { DETAIL_COLUMNS, DETAIL_SHEET, INCOME_TAX_RATE_REF, CAPITAL_GAINS_TAX_RATE_REF } from './detail.js';
import { columnLetters, renderRows, FIRST_DATA_ROW } from './template.js';
import type { CellFormat, CellValue, ContributionType, Row, TaxRates } from './types.js';

export const OVERVIEW_SHEET = 'Overview';

export const OVERVIEW_COLUMNS = [
  'Contribution Type',
  'Shares',
  'Value',
  'Cost Basis',
  'Own Costs',
  'Taxable Unrealized Gains',
  'Real Unrealized Gains',
  'Estimated Tax',
  'Estimated Net Profit',
  'Percentage Gain'
] as const;

export type OverviewColumn = (typeof OVERVIEW_COLUMNS)[number];

export const OVERVIEW_FORMATS: Partial<Record<OverviewColumn, CellFormat>> = {
  Shares: 'number',
  Value: 'currency',
  'Cost Basis': 'currency',
  'Own Costs': 'currency',
  'Taxable Unrealized Gains': 'currency',
  'Real Unrealized Gains': 'currency',
  'Estimated Tax': 'currency',
  'Estimated Net Profit': 'currency',
  'Percentage Gain': 'number'
};

export const OVERVIEW_CATEGORIES: { label: string; type: ContributionType }[] = [
  { label: 'Locked Awards', type: 'Locked Award' },
  { label: 'Granted Awards', type: 'Granted Award' },
  { label: 'Own Contributions', type: 'Own Contribution' },
  { label: 'Company Matches', type: 'Company Match' }
];

export const TOTAL_LABEL = 'All Except Locked Awards';

// The total sums the Granted Awards..Company Matches rows. This span assumes the
// four category rows above sit at rows 2-5 in the order of OVERVIEW_CATEGORIES.
const TOTAL_FIRST_ROW = 3;
const TOTAL_LAST_ROW = 5;

const detailLetter = columnLetters(DETAIL_COLUMNS);

/** Absolute range over one detail column, from the first data row to `lastRow`. */
export function detailRange(column: (typeof DETAIL_COLUMNS)[number], lastRow: number): string {
  const l = detailLetter.get(column);
  return `'${DETAIL_SHEET}'!$${l}$${FIRST_DATA_ROW}:$${l}$${lastRow}`;
}

const ref = (col: OverviewColumn) => `{{${col}}}{{index}}`;

function categoryRow(type: ContributionType, label: string, lastDetailRow: number): Row {
  const sumIf = (column: (typeof DETAIL_COLUMNS)[number]) =>
    `SUMIF(${detailRange('Contribution Type', lastDetailRow)},"${type}",${detailRange(column, lastDetailRow)})`;
  const locked = type === 'Locked Award';

  let ownCosts: CellValue;
  if (locked) ownCosts = null;
  else if (type === 'Company Match') ownCosts = `=ROUND(${INCOME_TAX_RATE_REF}*${ref('Cost Basis')},2)`;
  else ownCosts = `=${ref('Cost Basis')}`;

  const cells: Record<OverviewColumn, CellValue> = {
    'Contribution Type': label,
    Shares: `=${sumIf('Shares')}`,
    Value: `=ROUND(${ref('Shares')}*'${DETAIL_SHEET}'!$${detailLetter.get('Market Price')}$${FIRST_DATA_ROW},2)`,
    'Cost Basis': locked ? null : `=${sumIf('Cost Basis')}`,
    'Own Costs': ownCosts,
    'Taxable Unrealized Gains': `=IF(${ref('Cost Basis')}="","",ROUND(${ref('Value')}-${ref('Cost Basis')},2))`,
    'Real Unrealized Gains': `=IF(${ref('Cost Basis')}="","",ROUND(${ref('Value')}-${ref('Own Costs')},2))`,
    'Estimated Tax':
      `=IF(${ref('Taxable Unrealized Gains')}="","",IF(${ref('Taxable Unrealized Gains')}<0,0,` +
      `ROUND(${CAPITAL_GAINS_TAX_RATE_REF}*${ref('Taxable Unrealized Gains')},2)))`,
    'Estimated Net Profit': `=IF(${ref('Cost Basis')}="","",ROUND(${ref('Real Unrealized Gains')}-${ref('Estimated Tax')},2))`,
    'Percentage Gain': `=IF(${ref('Cost Basis')}="","",ROUND(${ref('Estimated Net Profit')}/${ref('Own Costs')}*100,2))`
  };
  return OVERVIEW_COLUMNS.map(name => ({ name, value: cells[name] }));
}

function totalRow(): Row {
  const sum = (col: OverviewColumn) => `=SUM({{${col}}}${TOTAL_FIRST_ROW}:{{${col}}}${TOTAL_LAST_ROW})`;
  return OVERVIEW_COLUMNS.map(name => {
    if (name === 'Contribution Type') return { name, value: TOTAL_LABEL };
    if (name === 'Percentage Gain') return { name, value: `=ROUND(${ref('Estimated Net Profit')}/${ref('Own Costs')}*100,2)` };
    return { name, value: sum(name) };
  });
}

/** Four category rows (rows 2-5) and the total row (row 6) over detail rows 2..lastDetailRow. */
export function buildOverviewRows(lastDetailRow: number): Row[] {
  const rows = OVERVIEW_CATEGORIES.map(c => categoryRow(c.type, c.label, lastDetailRow));
  rows.push(totalRow());
  return renderRows(rows);
}

export const TAX_RATE_COLUMNS = ['Tax', 'Percentage', 'Rate'] as const;

export const TAX_RATE_FORMATS: Partial<Record<(typeof TAX_RATE_COLUMNS)[number], CellFormat>> = {
  Percentage: 'number',
  Rate: 'percent'
};

/** Income on row 2, capital gains on row 3; the rate cells feed every tax formula. */
export function buildTaxRateRows(rates: TaxRates): Row[] {
  const row = (tax: string, percent: number): Row => [
    { name: 'Tax', value: tax },
    { name: 'Percentage', value: percent },
    { name: 'Rate', value: '={{Percentage}}{{index}}/100' }
  ];
  return renderRows([row('Income', rates.incomeTaxPercent), row('Capital Gains', rates.capitalGainsTaxPercent)]);
}
