import { describe, it, expect } from 'vitest';
import { columnLetters, renderRow, renderRows } from './template.js';
import type { Row } from './types.js';

describe('renderRow', () => {
  const row: Row = [
    { name: 'A', value: 'x' },
    { name: 'B', value: '{{A}}-{{index}}' }
  ];

  it('substitutes column letters, not column values', () => {
    expect(renderRow(row, 5)).toEqual([
      { name: 'A', value: 'x' },
      { name: 'B', value: 'A-5' }
    ]);
  });

  it('uses the letter of the column position', () => {
    const r: Row = [
      { name: 'Shares', value: 3 },
      { name: 'Price', value: 2 },
      { name: 'Value', value: '=ROUND({{Shares}}{{index}}*{{Price}}{{index}},2)' }
    ];
    expect(renderRow(r, 12)[2].value).toBe('=ROUND(A12*B12,2)');
  });

  it('is a no-op on rendered text', () => {
    const once = renderRow(row, 5);
    expect(renderRow(once, 5)).toEqual(once);
  });

  it('leaves undeclared placeholders and non-strings alone', () => {
    const r: Row = [
      { name: 'A', value: '{{Missing}}{{index}}' },
      { name: 'B', value: 42 },
      { name: 'C', value: null }
    ];
    expect(renderRow(r, 3)).toEqual([
      { name: 'A', value: '{{Missing}}3' },
      { name: 'B', value: 42 },
      { name: 'C', value: null }
    ]);
  });

  it('does not mutate its input', () => {
    renderRow(row, 5);
    expect(row[1].value).toBe('{{A}}-{{index}}');
  });
});

describe('renderRows', () => {
  it('numbers rows consecutively from the start index', () => {
    const r: Row = [{ name: 'N', value: '{{N}}{{index}}' }];
    expect(renderRows([r, r, r]).map(x => x[0].value)).toEqual(['A2', 'A3', 'A4']);
    expect(renderRows([r, r], 10).map(x => x[0].value)).toEqual(['A10', 'A11']);
  });
});

describe('columnLetters', () => {
  it('continues past Z', () => {
    const names = Array.from({ length: 28 }, (_, i) => `c${i}`);
    const letters = columnLetters(names);
    expect(letters.get('c0')).toBe('A');
    expect(letters.get('c25')).toBe('Z');
    expect(letters.get('c26')).toBe('AA');
    expect(letters.get('c27')).toBe('AB');
  });
});
