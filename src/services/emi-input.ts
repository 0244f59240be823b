/**
 * Turns JSON and HTML form bodies into a validated CalculationRequest.
 * Form fields arrive as strings, JSON fields as numbers; both are accepted.
 */
import { EmiCalculationError, MAX_TENURE_YEARS, MIN_TENURE_YEARS } from '../models/emi.js';
import type { CalculationMode, CalculationRequest } from '../models/emi.js';

const MODE_ALIASES: Record<string, CalculationMode> = {
  'emi': 'emi',
  'tenure': 'tenure',
  'Calculate EMI': 'emi',
  'Calculate Tenure': 'tenure',
};

function parseMode(value: unknown): CalculationMode {
  if (value === undefined || value === '') {
    return 'emi';
  }
  if (typeof value === 'string' && Object.hasOwn(MODE_ALIASES, value)) {
    return MODE_ALIASES[value];
  }
  throw new EmiCalculationError('Invalid calculation type.');
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value.trim());
  }
  return undefined;
}

function requireNumber(value: unknown, field: string, check: (n: number) => boolean): number {
  const parsed = toNumber(value);
  if (parsed === undefined || !Number.isFinite(parsed) || !check(parsed)) {
    throw new EmiCalculationError(`Please enter a valid value for ${field}.`);
  }
  return parsed;
}

export function parseCalculationRequest(body: Record<string, unknown>): CalculationRequest {
  const mode = parseMode(body.mode ?? body.calculationType);
  const principal = requireNumber(body.principal, 'principal', (n) => n > 0);
  const annualRate = requireNumber(body.annualRate ?? body.rate, 'annualRate', (n) => n >= 0);

  if (mode === 'emi') {
    const tenureYears = requireNumber(
      body.tenureYears ?? body.tenure,
      'tenureYears',
      (n) => Number.isInteger(n) && n >= MIN_TENURE_YEARS && n <= MAX_TENURE_YEARS,
    );
    return { mode, principal, annualRate, tenureYears };
  }

  // A missing or non-positive EMI is reported by the tenure calculation itself
  const emi = toNumber(body.emi);
  return {
    mode,
    principal,
    annualRate,
    emi: emi !== undefined && Number.isFinite(emi) ? emi : undefined,
  };
}
