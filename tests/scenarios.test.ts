import { describe, expect, it } from 'vitest';
import { buyAndOccupy, buyAndRentOut, computeComparison, rentAndInvest } from '../src/calculators/scenarios.js';
import { DiagnosticsCollector } from '../src/calculators/checked.js';
import type { EngineDiagnostic } from '../src/types.js';
import { cashCondoRental, condoRentOut, plainCondo } from './fixtures.js';

describe('buyAndOccupy', () => {
  it('net gain is equity after sale minus the cash put in', () => {
    const result = buyAndOccupy(plainCondo);

    expect(result.initialOutlay).toBe(200_000);
    expect(result.loan.monthlyPayment).toBeCloseTo(4_796.404, 3);
    expect(result.sale.salePrice).toBe(1_000_000);
    expect(result.sale.sellingCosts).toBe(60_000);
    expect(result.sale.loanBalance).toBeCloseTo(669_485.80, 2);
    expect(result.sale.capitalGain).toBe(0);
    expect(result.netGain).toBeCloseTo(70_514.20, 2);
  });

  it('averages mortgage payments over the horizon', () => {
    const result = buyAndOccupy(plainCondo);
    expect(result.years).toHaveLength(10);
    expect(result.averageMonthlyGrossCost).toBeCloseTo(4_796.404, 3);
  });

  it('stops counting payments once the loan is paid off', () => {
    const result = buyAndOccupy({ ...plainCondo, loanTermYears: 5 });
    expect(result.years[5].mortgagePayments).toBe(0);
    expect(result.averageMonthlyGrossCost).toBeCloseTo(result.loan.monthlyPayment / 2, 6);
    expect(result.sale.loanBalance).toBe(0);
  });

  it('adds a separately billed property tax to the monthly cost', () => {
    const result = buyAndOccupy(cashCondoRental);

    expect(result.yearOneMonthlyCost).toEqual({ principalAndInterest: 0, fees: 500, propertyTax: 500, total: 1_000 });
    expect(result.averageMonthlyGrossCost).toBe(1_000);
    expect(result.cumulativeGrossCost).toBe(60_000);
  });

  it('shelters the sale gain as a primary residence', () => {
    const result = buyAndOccupy(cashCondoRental);

    expect(result.sale.capitalGain).toBeCloseTo(14_438.38, 2);
    expect(result.sale.exclusionApplied).toBeCloseTo(14_438.38, 2);
    expect(result.sale.capitalGainsTax).toBe(0);
    expect(result.netGain).toBeCloseTo(14_438.38, 2);
  });

  it('itemizing beats the standard deduction on a large loan', () => {
    const result = buyAndOccupy({ ...plainCondo, marginalTaxRate: 0.4, annualPropertyTax: 12_000 });
    const [first] = result.years;

    // 47,732.76 interest + 10,000 SALT-capped tax - 30,000 standard, at 40%
    expect(first.itemizedTotal).toBeCloseTo(57_732.76, 2);
    expect(first.taxSaving).toBeCloseTo(11_093.10, 2);
  });

  it('a rising home price raises the net gain', () => {
    const flat = buyAndOccupy(plainCondo).netGain;
    const rising = buyAndOccupy({ ...plainCondo, appreciationRate: 0.03 }).netGain;
    expect(rising).toBeGreaterThan(flat);
  });
});

describe('rentAndInvest', () => {
  it('invests the down payment and the monthly savings over rent', () => {
    const occupy = buyAndOccupy(plainCondo);
    const result = rentAndInvest(plainCondo, occupy);

    expect(result.averageMonthlyRent).toBe(4_000);
    expect(result.monthlyInvestment).toBeCloseTo(796.404, 3);
    expect(result.futureValue).toBeCloseTo(295_568.504, 3);
    expect(result.investmentGain).toBeCloseTo(0, 6);
    expect(result.netGain).toBeCloseTo(95_568.504, 3);
  });

  it('never invests a negative amount when rent costs more than owning', () => {
    const result = rentAndInvest(cashCondoRental, { initialOutlay: 510_000, averageMonthlyGrossCost: 1_000 });

    expect(result.monthlyInvestment).toBe(0);
    expect(result.futureValue).toBeCloseTo(650_903.60, 2);
    expect(result.investmentTax).toBeCloseTo(28_180.72, 2);
    expect(result.netGain).toBeCloseTo(112_722.88, 2);
  });

  it('a higher investment return raises the net gain', () => {
    const benchmark = buyAndOccupy(plainCondo);
    const low = rentAndInvest({ ...plainCondo, investmentReturnRate: 0.03, capitalGainsTaxRate: 0.2 }, benchmark);
    const high = rentAndInvest({ ...plainCondo, investmentReturnRate: 0.05, capitalGainsTaxRate: 0.2 }, benchmark);

    expect(low.netGain).toBeCloseTo(163_172.84, 2);
    expect(high.netGain).toBeCloseTo(218_670.81, 2);
  });

  it('a loss is not taxed', () => {
    const result = rentAndInvest(
      { ...plainCondo, investmentReturnRate: -0.1, capitalGainsTaxRate: 0.2 },
      { initialOutlay: 100_000, averageMonthlyGrossCost: 4_000 },
    );
    expect(result.investmentGain).toBeLessThan(0);
    expect(result.investmentTax).toBe(0);
  });
});

describe('buyAndRentOut', () => {
  it('lives in, then rents out, then sells', () => {
    const result = buyAndRentOut(cashCondoRental);
    if (!result) throw new Error('expected a rent-out result');

    expect(result.years.map((y) => y.phase)).toEqual(['occupied', 'occupied', 'rental', 'rental', 'rental']);
    expect(result.annualDepreciation).toBe(10_000);
    expect(result.cumulativeDepreciation).toBe(30_000);
    expect(result.cumulativeOccupiedTaxSavings).toBe(0);
  });

  it('computes each rental year after expenses and tax', () => {
    const result = buyAndRentOut(cashCondoRental);
    const year = result?.years[2];
    if (year?.phase !== 'rental') throw new Error('expected a rental year');

    expect(year.scheduledRent).toBe(36_000);
    expect(year.effectiveRent).toBe(34_200);
    expect(year.managementFee).toBe(3_420);
    expect(year.taxableIncome).toBe(7_780);
    expect(year.rentalTax).toBeCloseTo(2_334, 6);
    expect(year.netCashFlow).toBeCloseTo(15_446, 6);
  });

  it('keeps the exclusion after two occupied years and recaptures depreciation', () => {
    const result = buyAndRentOut(cashCondoRental);

    expect(result?.sale.occupiedYearsInWindow).toBe(2);
    expect(result?.sale.capitalGainsTax).toBe(0);
    expect(result?.sale.recaptureTax).toBe(7_500);
    expect(result?.cumulativeRentalCashFlow).toBeCloseTo(46_338, 6);
    expect(result?.netGain).toBeCloseTo(53_276.38, 2);
  });

  it('loses the exclusion after only one occupied year', () => {
    const result = buyAndRentOut({
      ...cashCondoRental,
      rentOut: { ...condoRentOut, yearsOccupied: 1 },
    });

    expect(result?.sale.occupiedYearsInWindow).toBe(1);
    expect(result?.sale.exclusionApplied).toBe(0);
    expect(result?.sale.cumulativeDepreciation).toBe(40_000);
    expect(result?.sale.recaptureTax).toBe(10_000);
    // the 14,438.38 gain is all depreciation, taxed once as recapture
    expect(result?.sale.capitalGain).toBe(0);
    expect(result?.sale.capitalGainsTax).toBe(0);
    expect(result?.netGain).toBeCloseTo(66_222.38, 2);
  });

  it('taxes only the gain beyond depreciation as capital gain', () => {
    const result = buyAndRentOut({
      ...cashCondoRental,
      appreciationRate: 0.1,
      rentOut: { ...condoRentOut, yearsOccupied: 1 },
    });

    // 805,255 sale - 40,262.75 selling - 510,000 basis - 40,000 depreciation
    expect(result?.sale.capitalGain).toBeCloseTo(214_992.25, 2);
    expect(result?.sale.capitalGainsTax).toBeCloseTo(42_998.45, 2);
    expect(result?.sale.recaptureTax).toBe(10_000);
  });

  it('does not apply to co-ops or without rent-out assumptions', () => {
    expect(buyAndRentOut({ ...cashCondoRental, propertyType: 'coop' })).toBeUndefined();
    expect(buyAndRentOut(plainCondo)).toBeUndefined();
  });
});

describe('computeComparison', () => {
  it('runs buy and rent, and rent-out only when asked', () => {
    const plain = computeComparison(plainCondo);
    expect(plain.rentOutResult).toBeUndefined();
    expect(plain.occupyResult.netGain).toBeCloseTo(70_514.20, 2);
    expect(plain.rentResult.netGain).toBeCloseTo(95_568.504, 3);
    expect(plain.diagnostics).toEqual([]);

    const rental = computeComparison(cashCondoRental);
    expect(rental.rentOutResult?.netGain).toBeCloseTo(53_276.38, 2);
  });

  it('same inputs → same outputs', () => {
    expect(computeComparison(cashCondoRental)).toEqual(computeComparison(cashCondoRental));
  });

  it('a NaN mortgage rate degrades to zeros and reports every fallback', () => {
    const seen: EngineDiagnostic[] = [];
    const result = computeComparison({ ...plainCondo, mortgageRate: Number.NaN }, {
      onDiagnostic: (d) => seen.push(d),
    });

    expect(result.occupyResult.loan.monthlyPayment).toBe(0);
    expect(result.occupyResult.sale.loanBalance).toBe(0);
    expect(result.occupyResult.netGain).toBe(740_000);
    expect(Number.isFinite(result.rentResult.netGain)).toBe(true);

    expect(result.diagnostics).toHaveLength(12);
    expect(seen).toEqual(result.diagnostics);
    expect(result.diagnostics.map((d) => d.computation)).toEqual([
      'monthlyPayment',
      ...Array.from({ length: 10 }, () => 'interestPaidInInterval'),
      'remainingBalance',
    ]);
    expect(result.diagnostics[1]).toEqual({
      computation: 'interestPaidInInterval',
      reason: 'non-finite-input',
      message: 'interestPaidInInterval: annualRate is NaN',
      scenario: 'buy-and-occupy',
      year: 1,
    });
  });

  it('keeps diagnostics of separate runs apart', () => {
    const collector = new DiagnosticsCollector();
    buyAndOccupy({ ...plainCondo, mortgageRate: Number.NaN }, collector);
    const clean = computeComparison(plainCondo);

    expect(collector.diagnostics.length).toBeGreaterThan(0);
    expect(clean.diagnostics).toEqual([]);
  });
});
