/**
 * EMI and Amortization — Service
 *
 * Calculates either the monthly installment for a fixed tenure, or the
 * tenure for a fixed installment, and builds the month-by-month
 * amortization schedule for the result.
 */
import { generateId } from '../utils/id.js';
import { clock } from '../utils/clock.js';
import { formatAmount, round2 } from '../utils/format.js';
import { EmiCalculationError, MAX_TENURE_MONTHS } from '../models/emi.js';
import type {
  AmortizationRow,
  AmortizationSchedule,
  CalculationRequest,
  CalculationResult,
} from '../models/emi.js';

const MAX_HISTORY = 100;

// Balances at or below this are treated as paid off
const SETTLED_BALANCE = 0.01;

const OVERFLOW_MESSAGE = 'The calculation is out of range. Please enter a smaller loan amount or interest rate.';

// In-memory store, newest last
const history: CalculationResult[] = [];

function monthlyRate(annualRate: number): number {
  return annualRate / 100 / 12;
}

export function calculateEmiValue(principal: number, annualRate: number, tenureYears: number): number {
  const r = monthlyRate(annualRate);
  const n = tenureYears * 12;
  if (n <= 0) {
    throw new EmiCalculationError('Please enter a valid tenure.');
  }
  if (r > 0) {
    const growth = Math.pow(1 + r, n);
    const emi = (principal * r * growth) / (growth - 1);
    if (!Number.isFinite(growth) || !Number.isFinite(emi)) {
      throw new EmiCalculationError(OVERFLOW_MESSAGE);
    }
    return emi;
  }
  return principal / n;
}

/** Number of monthly payments (fractional) needed to repay `principal` at `emi` per month. */
export function calculateTenureValue(principal: number, annualRate: number, emi: number | undefined): number {
  if (emi === undefined || !(emi > 0)) {
    throw new EmiCalculationError('Please enter a valid EMI amount to calculate tenure.');
  }
  const r = monthlyRate(annualRate);
  if (r <= 0) {
    return principal / emi;
  }
  if (emi <= principal * r) {
    throw new EmiCalculationError(
      'The entered EMI is too low to cover the monthly interest. Please increase the EMI.',
    );
  }
  // From EMI = P·r·(1+r)^n / ((1+r)^n - 1)
  return Math.log(emi / (emi - principal * r)) / Math.log(1 + r);
}

export function generateAmortizationSchedule(
  principal: number,
  annualRate: number,
  emi: number,
  months: number,
): AmortizationSchedule {
  const r = monthlyRate(annualRate);
  const payments = Math.ceil(months);
  const rows: AmortizationRow[] = [];
  let balance = principal;
  let totalInterest = 0;

  for (let month = 1; month <= payments; month++) {
    const interestPaid = balance * r;
    let principalPaid = Math.min(emi - interestPaid, balance);
    if (principalPaid < 0) {
      principalPaid = emi;
    }

    balance -= principalPaid;
    if (balance <= SETTLED_BALANCE) {
      balance = 0;
    }

    rows.push({
      month,
      emi: round2(emi),
      principalPaid: round2(principalPaid),
      interestPaid: round2(interestPaid),
      remainingBalance: round2(Math.max(balance, 0)),
    });

    totalInterest += interestPaid;

    if (balance === 0) break;
  }

  return { rows, totalInterest };
}

function describeTenure(months: number, annualRate: number): string {
  const closing = `Your loan will be closed in: ${formatAmount(months, 0)} months`;
  if (monthlyRate(annualRate) <= 0) {
    return closing;
  }
  return `${closing} (${formatAmount(months / 12, 1)} years)`;
}

export function calculateEmiOrTenure(request: CalculationRequest): CalculationResult {
  const { mode, principal, annualRate } = request;

  let emi: number;
  let months: number;
  let headline: string;

  if (mode === 'emi') {
    if (request.tenureYears === undefined) {
      throw new EmiCalculationError('Please enter a valid tenure.');
    }
    months = request.tenureYears * 12;
    emi = calculateEmiValue(principal, annualRate, request.tenureYears);
    headline = `Your Monthly EMI: ₹${formatAmount(emi)}`;
  } else {
    months = calculateTenureValue(principal, annualRate, request.emi);
    emi = request.emi ?? 0;
    headline = describeTenure(months, annualRate);
  }

  if (!Number.isFinite(emi) || !Number.isFinite(months)) {
    throw new EmiCalculationError(OVERFLOW_MESSAGE);
  }
  if (months > MAX_TENURE_MONTHS) {
    throw new EmiCalculationError(
      `The loan would take more than ${MAX_TENURE_MONTHS} months to close. Please increase the EMI.`,
    );
  }

  const schedule = generateAmortizationSchedule(principal, annualRate, emi, months);

  const result: CalculationResult = {
    id: generateId(),
    mode,
    principal,
    annualRate,
    tenureYears: mode === 'emi' ? request.tenureYears : undefined,
    emi: round2(emi),
    months: round2(months),
    totalInterest: round2(schedule.totalInterest),
    totalPayment: round2(principal + schedule.totalInterest),
    summary: `${headline}\nTotal Interest Payment is : ${formatAmount(schedule.totalInterest, 0)}`,
    schedule: schedule.rows,
    calculatedAt: clock.isoNow(),
  };

  history.push(result);
  if (history.length > MAX_HISTORY) {
    history.splice(0, history.length - MAX_HISTORY);
  }

  return result;
}

export function getCalculation(id: string): CalculationResult | undefined {
  return history.find((entry) => entry.id === id);
}

export function listCalculations(): CalculationResult[] {
  return [...history].reverse();
}

/** Reset state (for testing) */
export function _resetState(): void {
  history.length = 0;
}
