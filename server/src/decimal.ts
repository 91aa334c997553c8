import type { DecimalText } from './types.js';

const DECIMAL_RE = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parses a cell value into canonical non-negative decimal text: no exponent,
 * no leading zeros, no trailing fractional zeros. Returns null when the value
 * is not such a number.
 *
 * Numbers go through their shortest round-trip text, so a cell holding 12.5
 * yields "12.5". Strings may use ',' as the decimal separator.
 */
export function parseDecimal(value: unknown): DecimalText | null {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) return null;
    text = expandExponent(String(value));
  } else if (typeof value === 'string') {
    text = value.trim().replace(',', '.');
  } else {
    return null;
  }

  const m = text.match(DECIMAL_RE);
  if (!m) return null;
  const int = m[1].replace(/^0+(?=\d)/, '');
  const frac = (m[2] ?? '').replace(/0+$/, '');
  return frac ? `${int}.${frac}` : int;
}

export function isZero(d: DecimalText): boolean {
  return /^0(\.0*)?$/.test(d);
}

export function toNumber(d: DecimalText): number {
  return Number(d);
}

// 1e-7 -> "0.0000001", 1e21 -> "1000000000000000000000"
function expandExponent(s: string): string {
  const m = s.match(/^(\d+)(?:\.(\d+))?e([+-]\d+)$/i);
  if (!m) return s;
  const digits = m[1] + (m[2] ?? '');
  const point = m[1].length + Number(m[3]);
  if (point <= 0) return `0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return digits + '0'.repeat(point - digits.length);
  return `${digits.slice(0, point)}.${digits.slice(point)}`;
}
