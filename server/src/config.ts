import dotenv from 'dotenv';
import { z } from 'zod';
import { InvalidParameterError } from './errors.js';
import type { TaxRates } from './types.js';

dotenv.config();

export const DEFAULT_INCOME_TAX_PERCENT = 42.0;
export const DEFAULT_CAPITAL_GAINS_TAX_PERCENT = 26.375;

// `KEY=` in .env arrives as '' and means "not set".
const blankAsUnset = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const percent = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().finite().min(0).max(100).default(fallback));

export const TaxRatesSchema = z.object({
  incomeTaxPercent: percent(DEFAULT_INCOME_TAX_PERCENT),
  capitalGainsTaxPercent: percent(DEFAULT_CAPITAL_GAINS_TAX_PERCENT)
});

const EnvSchema = z.object({
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(3000)),
  INCOME_TAX_PERCENT: percent(DEFAULT_INCOME_TAX_PERCENT),
  CAPITAL_GAINS_TAX_PERCENT: percent(DEFAULT_CAPITAL_GAINS_TAX_PERCENT),
  REPORT_OUTPUT_DIR: z.string().min(1).optional()
});

export type Config = {
  port: number;
  taxRates: TaxRates;
  outputDir?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration – ${detail}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    taxRates: { incomeTaxPercent: e.INCOME_TAX_PERCENT, capitalGainsTaxPercent: e.CAPITAL_GAINS_TAX_PERCENT },
    outputDir: e.REPORT_OUTPUT_DIR
  };
}

/**
 * Overrides the configured rates with caller-supplied ones (CLI flags, form
 * fields). Blank overrides keep the configured value.
 */
export function resolveTaxRates(base: TaxRates, overrides: { incomeTax?: unknown; capitalGainsTax?: unknown }): TaxRates {
  const pick = (v: unknown, fallback: number) => (v === undefined || v === null || v === '' ? fallback : v);
  const parsed = TaxRatesSchema.safeParse({
    incomeTaxPercent: pick(overrides.incomeTax, base.incomeTaxPercent),
    capitalGainsTaxPercent: pick(overrides.capitalGainsTax, base.capitalGainsTaxPercent)
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InvalidParameterError(`Invalid tax rate – ${detail}`);
  }
  return parsed.data;
}
