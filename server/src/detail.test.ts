import { describe, it, expect } from 'vitest';
import { buildDetailRows, DETAIL_COLUMNS } from './detail.js';
import type { NormalizedRecord, Row } from './types.js';

const granted: NormalizedRecord = {
  plan: 'Share Plan', contributionType: 'Granted Award', purchasePrice: '2', marketPrice: '5', shares: '5', date: '2023-06-01', sourceRow: 8
};
const locked: NormalizedRecord = {
  plan: 'Share Plan', contributionType: 'Locked Award', purchasePrice: '0', marketPrice: '5', shares: '10', date: '2024-01-01', sourceRow: 7
};

function valuesOf(row: Row) {
  return Object.fromEntries(row.map(c => [c.name, c.value]));
}

describe('buildDetailRows', () => {
  it('declares the detail columns in order on every row', () => {
    for (const row of buildDetailRows([granted, locked])) expect(row.map(c => c.name)).toEqual([...DETAIL_COLUMNS]);
  });

  it('emits literals and formulas for a row with a purchase price', () => {
    const [row] = buildDetailRows([granted]);
    expect(valuesOf(row)).toEqual({
      Date: '2023-06-01',
      Plan: 'Share Plan',
      'Contribution Type': 'Granted Award',
      Shares: 5,
      'Market Price': 5,
      Value: '=ROUND(D2*E2,2)',
      'Purchase Price': 2,
      'Cost Basis': '=IF(G2="","",ROUND(D2*G2,2))',
      'Own Costs': `=IF(C2="Company Match",ROUND('Tax Rates'!$C$2*H2,2),IF(C2="Locked Award","",H2))`,
      'Taxable Unrealized Gains': '=IF(H2="","",ROUND(F2-H2,2))',
      'Real Unrealized Gains': '=IF(H2="","",ROUND(F2-I2,2))',
      'Estimated Tax': `=IF(J2="","",IF(J2<0,0,ROUND('Tax Rates'!$C$3*J2,2)))`,
      'Estimated Net Profit': '=IF(H2="","",ROUND(K2-L2,2))'
    });
  });

  it('leaves the purchase price blank when it is zero', () => {
    const [, row] = buildDetailRows([granted, locked]);
    const v = valuesOf(row);
    expect(v['Purchase Price']).toBeNull();
    expect(v['Cost Basis']).toBe('=IF(G3="","",ROUND(D3*G3,2))');
  });

  it('addresses each row at its own position', () => {
    const rows = buildDetailRows([granted, locked, granted]);
    expect(rows.map(r => valuesOf(r).Value)).toEqual(['=ROUND(D2*E2,2)', '=ROUND(D3*E3,2)', '=ROUND(D4*E4,2)']);
  });

  it('writes decimal text as the number it denotes', () => {
    const [row] = buildDetailRows([{ ...granted, shares: '0.1', marketPrice: '12.5' }]);
    expect(valuesOf(row).Shares).toBe(0.1);
    expect(valuesOf(row)['Market Price']).toBe(12.5);
  });
});
