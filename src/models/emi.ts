/**
 * EMI and Amortization — Types
 */

export type CalculationMode = 'emi' | 'tenure';

export const MIN_TENURE_YEARS = 1;
export const MAX_TENURE_YEARS = 30;
export const MAX_TENURE_MONTHS = MAX_TENURE_YEARS * 12;

export interface CalculationRequest {
  mode: CalculationMode;
  principal: number;
  annualRate: number; // percent, e.g. 8.5
  tenureYears?: number;
  emi?: number;
}

export interface AmortizationRow {
  month: number;
  emi: number;
  principalPaid: number;
  interestPaid: number;
  remainingBalance: number;
}

export interface AmortizationSchedule {
  rows: AmortizationRow[];
  totalInterest: number;
}

export interface CalculationResult {
  id: string;
  mode: CalculationMode;
  principal: number;
  annualRate: number;
  tenureYears?: number;
  emi: number;
  months: number; // fractional in tenure mode
  totalInterest: number;
  totalPayment: number;
  summary: string;
  schedule: AmortizationRow[];
  calculatedAt: string;
}

export class EmiCalculationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EmiCalculationError';
  }
}
