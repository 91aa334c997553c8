import { z } from 'zod';
import { parseDecimal, isZero } from './decimal.js';
import { serialToIsoDate } from './dates.js';
import { InvalidContributionTypeError, InvalidInputRowError } from './errors.js';
import type { CellValue, ContributionType, DecimalText, InputSheet, NormalizedRecord } from './types.js';

export const INPUT_LABELS = {
  plan: 'Plan',
  contributionType: 'Contribution type',
  purchasePrice: 'Strike price / Cost basis',
  marketPrice: 'Market price',
  availableFrom: 'Available from',
  shares: 'Allocated quantity',
  allocationDate: 'Allocation date',
  expiryDate: 'Expiry date'
} as const;

export const INPUT_DATE_LABELS = [INPUT_LABELS.availableFrom, INPUT_LABELS.allocationDate, INPUT_LABELS.expiryDate];

// ---- Zod schema for one source row ----
const DecimalField = z.union([z.number(), z.string()]).transform((v, ctx): DecimalText => {
  const d = parseDecimal(v);
  if (d === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a non-negative number: '${v}'` });
    return z.NEVER;
  }
  return d;
});

const DateSerialField = z.number().finite().nonnegative().transform(serialToIsoDate);

const RawRecordSchema = z.object({
  [INPUT_LABELS.plan]: z.union([z.string(), z.number()]).transform(String),
  // Any cell, blank included, reaches classification so it is reported as a contribution type.
  [INPUT_LABELS.contributionType]: z.union([z.string(), z.number(), z.boolean()]).nullable().transform(v => (v === null ? '' : String(v))),
  [INPUT_LABELS.purchasePrice]: DecimalField,
  [INPUT_LABELS.marketPrice]: DecimalField,
  [INPUT_LABELS.shares]: DecimalField,
  [INPUT_LABELS.allocationDate]: DateSerialField
});

/** Raw labels compare without case or whitespace: "Company match" == "Companymatch". */
function labelKey(raw: string) {
  return raw.replace(/\s+/g, '').toLowerCase();
}

export function classifyContribution(rawType: string, purchasePrice: DecimalText, row: number): ContributionType {
  switch (labelKey(rawType)) {
    case 'award': return isZero(purchasePrice) ? 'Locked Award' : 'Granted Award';
    case 'purchase': return 'Own Contribution';
    case 'companymatch': return 'Company Match';
    default: throw new InvalidContributionTypeError(row, rawType);
  }
}

/** Zips a header with one row of values. Missing trailing cells read as null. */
export function toRawRecord(header: string[], values: CellValue[]): Record<string, CellValue> {
  const out: Record<string, CellValue> = {};
  header.forEach((label, i) => { out[label] = values[i] ?? null; });
  return out;
}

export function normalizeRow(header: string[], values: CellValue[], row: number): NormalizedRecord {
  const parsed = RawRecordSchema.safeParse(toRawRecord(header, values));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidInputRowError(row, String(issue.path[0] ?? ''), issue.message);
  }
  const r = parsed.data;
  const purchasePrice = r[INPUT_LABELS.purchasePrice];
  return Object.freeze({
    plan: r[INPUT_LABELS.plan],
    contributionType: classifyContribution(r[INPUT_LABELS.contributionType], purchasePrice, row),
    purchasePrice,
    marketPrice: r[INPUT_LABELS.marketPrice],
    shares: r[INPUT_LABELS.shares],
    date: r[INPUT_LABELS.allocationDate],
    sourceRow: row
  });
}

/** Stable sort by ISO date; ties keep their source order. */
export function sortByDate(records: readonly NormalizedRecord[]): NormalizedRecord[] {
  return records
    .map((record, i) => ({ record, i }))
    .sort((a, b) => (a.record.date < b.record.date ? -1 : a.record.date > b.record.date ? 1 : a.i - b.i))
    .map(x => x.record);
}

export function normalizeSheet(input: InputSheet): NormalizedRecord[] {
  return sortByDate(input.rows.map(r => normalizeRow(input.header, r.values, r.row)));
}
