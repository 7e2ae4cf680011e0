import { requireFinite } from './checked.js';

/**
 * Future value of a lump sum with annual compounding.
 * FV = PV × (1+r)^years
 *
 * @param presentValue - Amount invested today
 * @param annualRate - Annual return rate (e.g. 0.07 for 7%)
 * @param years - Holding period
 */
export function futureValueLumpSum(presentValue: number, annualRate: number, years: number): number {
  requireFinite('futureValueLumpSum', { presentValue, annualRate, years });
  if (years <= 0) return presentValue;
  return presentValue * Math.pow(1 + annualRate, years);
}

/**
 * Future value of level end-of-month contributions with monthly compounding.
 * FV = PMT × ((1+r/12)^n - 1) / (r/12), n = years × 12
 */
export function futureValueAnnuity(monthlyPayment: number, annualRate: number, years: number): number {
  requireFinite('futureValueAnnuity', { monthlyPayment, annualRate, years });
  if (years <= 0 || annualRate < -1) return 0;

  const periods = Math.trunc(years * 12);
  const r = annualRate / 12;
  if (r === 0) return monthlyPayment * periods;

  const factor = Math.pow(1 + r, periods);
  return monthlyPayment * ((factor - 1) / r);
}
