import type { AmortizationYear, AssumptionSet, LoanState, ScenarioKind } from '../types.js';
import { DegenerateInputError, DiagnosticsCollector, requireFinite } from './checked.js';

function monthlyRateOf(computation: string, annualRate: number): number {
  const r = annualRate / 12;
  if (r <= -1) {
    throw new DegenerateInputError('invalid-rate', `${computation}: monthly rate ${r} is at or below -100%`);
  }
  return r;
}

/**
 * Calculate monthly mortgage payment using the standard formula:
 * M = P × r(1+r)^n / ((1+r)^n - 1)
 *
 * @param principal - Loan amount
 * @param annualRate - Annual interest rate (e.g. 0.06 for 6%)
 * @param termYears - Loan term in years
 */
export function monthlyPayment(principal: number, annualRate: number, termYears: number): number {
  requireFinite('monthlyPayment', { principal, annualRate, termYears });
  if (principal <= 0 || termYears <= 0) return 0;

  const n = Math.trunc(termYears * 12);
  if (n <= 0) return 0;
  if (annualRate === 0) return principal / n;

  const r = monthlyRateOf('monthlyPayment', annualRate);
  const factor = Math.pow(1 + r, n);
  // rates this small round the factor to exactly 1
  if (factor === 1) return principal / n;
  return (principal * r * factor) / (factor - 1);
}

/**
 * Balance still owed after `yearsElapsed` years of level payments.
 * FV of the principal minus FV of the payments made, never below 0.
 */
export function remainingBalance(
  principal: number,
  annualRate: number,
  termYears: number,
  yearsElapsed: number,
): number {
  requireFinite('remainingBalance', { principal, annualRate, termYears, yearsElapsed });
  if (principal <= 0) return 0;
  if (yearsElapsed <= 0) return principal;
  if (yearsElapsed >= termYears) return 0;

  const payment = monthlyPayment(principal, annualRate, termYears);
  const k = Math.trunc(yearsElapsed * 12);
  if (annualRate === 0) return Math.max(0, principal - payment * k);

  const r = monthlyRateOf('remainingBalance', annualRate);
  const factor = Math.pow(1 + r, k);
  const balance = principal * factor - (payment * (factor - 1)) / r;
  return balance > 0 ? balance : 0;
}

/**
 * Total interest paid in payment months (startYear×12, endYear×12], limited to
 * the loan term. Empty or inverted intervals pay no interest.
 */
export function interestPaidInInterval(
  principal: number,
  annualRate: number,
  termYears: number,
  startYear: number,
  endYear: number,
): number {
  requireFinite('interestPaidInInterval', { principal, annualRate, termYears, startYear, endYear });
  if (principal <= 0 || startYear >= endYear) return 0;

  const totalPeriods = Math.trunc(termYears * 12);
  const firstMonth = Math.max(1, Math.trunc(startYear * 12) + 1);
  const lastMonth = Math.min(totalPeriods, Math.trunc(endYear * 12));
  if (firstMonth > lastMonth || annualRate === 0) return 0;

  const r = monthlyRateOf('interestPaidInInterval', annualRate);
  const payment = monthlyPayment(principal, annualRate, termYears);

  let balance = principal;
  let interest = 0;
  for (let month = 1; month <= lastMonth; month++) {
    const monthInterest = balance * r;
    if (month >= firstMonth) interest += monthInterest;
    balance -= payment - monthInterest;
  }
  return Math.abs(interest);
}

/**
 * Number of monthly payments that fall inside horizon year `year` (1-based).
 */
export function paymentMonthsInYear(year: number, termYears: number): number {
  const remaining = Math.trunc(termYears * 12) - (year - 1) * 12;
  return Math.max(0, Math.min(12, remaining));
}

/**
 * Year-by-year split of payments into interest and principal.
 */
export function amortizationSchedule(
  principal: number,
  annualRate: number,
  termYears: number,
  years: number = termYears,
): AmortizationYear[] {
  const payment = monthlyPayment(principal, annualRate, termYears);
  const rows: AmortizationYear[] = [];

  for (let year = 1; year <= years; year++) {
    const payments = payment * paymentMonthsInYear(year, termYears);
    const interest = interestPaidInInterval(principal, annualRate, termYears, year - 1, year);
    rows.push({
      year,
      payments,
      interest,
      principal: payments - interest,
      endBalance: remainingBalance(principal, annualRate, termYears, year),
    });
  }

  return rows;
}

/**
 * Derive the loan and upfront cash for a purchase.
 * A degenerate payment falls back to 0 and is recorded on the collector.
 */
export function describeLoan(
  assumptions: AssumptionSet,
  diagnostics: DiagnosticsCollector = new DiagnosticsCollector(),
  scenario?: ScenarioKind,
): LoanState {
  const downPayment = assumptions.homePrice * assumptions.downPaymentRate;
  const closingCosts = assumptions.homePrice * assumptions.closingCostRate;
  const principal = assumptions.homePrice - downPayment;

  return {
    downPayment,
    closingCosts,
    initialOutlay: downPayment + closingCosts,
    principal,
    monthlyPayment: diagnostics.value(
      'monthlyPayment',
      () => monthlyPayment(principal, assumptions.mortgageRate, assumptions.loanTermYears),
      { scenario },
    ),
    annualRate: assumptions.mortgageRate,
    termYears: assumptions.loanTermYears,
  };
}
