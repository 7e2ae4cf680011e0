import { DegenerateInputError, requireFinite } from './checked.js';

/**
 * Value after `years` of annual compounding: initial × (1+g)^years.
 */
export function valueAtYear(initial: number, annualGrowthRate: number, years: number): number {
  requireFinite('valueAtYear', { initial, annualGrowthRate, years });
  return initial * Math.pow(1 + annualGrowthRate, years);
}

/**
 * Mean of `years × 12` monthly samples of a value growing geometrically at the
 * monthly equivalent of `annualGrowthRate`, starting at `initialMonthly`.
 *
 * m = (1+g)^(1/12) - 1
 * avg = initial × ((1+m)^n - 1) / m / n
 */
export function averageMonthlyValue(initialMonthly: number, annualGrowthRate: number, years: number): number {
  requireFinite('averageMonthlyValue', { initialMonthly, annualGrowthRate, years });
  if (annualGrowthRate === 0 || years <= 0) return initialMonthly;
  if (annualGrowthRate < -1) {
    throw new DegenerateInputError('invalid-rate', `averageMonthlyValue: growth rate ${annualGrowthRate} is below -100%`);
  }

  const periods = Math.trunc(years * 12);
  if (periods <= 0) return initialMonthly;

  const m = Math.pow(1 + annualGrowthRate, 1 / 12) - 1;
  if (m === 0) return initialMonthly;

  const total = (initialMonthly * (Math.pow(1 + m, periods) - 1)) / m;
  return total / periods;
}
