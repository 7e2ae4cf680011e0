import { describe, expect, it } from 'vitest';
import {
  annualDepreciation,
  depreciationForYear,
  occupiedYearsInSaleWindow,
  ownerDeduction,
  qualifiesForExclusion,
  rentalTaxableIncome,
  saleTaxes,
} from '../src/calculators/tax.js';
import { resolvePropertyTax } from '../src/calculators/costs.js';
import { DEFAULT_ASSUMPTIONS } from '../src/config/defaults.js';

const deductionBase = {
  interestPaid: 40_000,
  loanPrincipal: 600_000,
  propertyTax: 8_000,
  mortgageInterestCap: 750_000,
  saltCap: 10_000,
  standardDeduction: 30_000,
  marginalTaxRate: 0.4,
};

describe('ownerDeduction', () => {
  it('saves tax only on the amount above the standard deduction', () => {
    const d = ownerDeduction(deductionBase);
    expect(d.deductibleInterest).toBe(40_000);
    expect(d.deductiblePropertyTax).toBe(8_000);
    expect(d.itemizedTotal).toBe(48_000);
    expect(d.taxSaving).toBeCloseTo(7_200, 6);
  });

  it('limits interest to the share of principal under the cap', () => {
    const d = ownerDeduction({ ...deductionBase, loanPrincipal: 1_000_000 });
    expect(d.deductibleInterest).toBe(30_000);
  });

  it('limits property tax to the SALT cap', () => {
    const d = ownerDeduction({ ...deductionBase, propertyTax: 15_000 });
    expect(d.deductiblePropertyTax).toBe(10_000);
    expect(d.taxSaving).toBeCloseTo(8_000, 6);
  });

  it('no saving when itemizing does not beat the standard deduction', () => {
    const d = ownerDeduction({ ...deductionBase, interestPaid: 10_000 });
    expect(d.itemizedTotal).toBe(18_000);
    expect(d.taxSaving).toBe(0);
  });

  it('a zero interest cap makes no interest deductible', () => {
    expect(ownerDeduction({ ...deductionBase, mortgageInterestCap: 0 }).deductibleInterest).toBe(0);
  });
});

describe('rentalTaxableIncome', () => {
  const base = {
    scheduledRent: 36_000,
    vacancyRate: 0.05,
    managementFeeRate: 0.1,
    interestPaid: 0,
    propertyTax: 6_000,
    fees: 6_000,
    landlordCost: 1_000,
    depreciation: 10_000,
    marginalTaxRate: 0.3,
  };

  it('taxes effective rent less operating expenses and depreciation', () => {
    const income = rentalTaxableIncome(base);
    expect(income.effectiveRent).toBe(34_200);
    expect(income.managementFee).toBe(3_420);
    expect(income.deductibleExpenses).toBe(26_420);
    expect(income.taxableIncome).toBe(7_780);
    expect(income.rentalTax).toBeCloseTo(2_334, 6);
  });

  it('a loss produces a negative tax', () => {
    const income = rentalTaxableIncome({ ...base, interestPaid: 20_000 });
    expect(income.taxableIncome).toBe(-12_220);
    expect(income.rentalTax).toBeCloseTo(-3_666, 6);
  });
});

describe('depreciation', () => {
  it('spreads the building value over 27.5 years', () => {
    expect(annualDepreciation(500_000, 0.45)).toBe(10_000);
  });

  it('full years, then a half year, then nothing', () => {
    expect(depreciationForYear(10_000, 0)).toBe(10_000);
    expect(depreciationForYear(10_000, 26)).toBe(10_000);
    expect(depreciationForYear(10_000, 27)).toBe(5_000);
    expect(depreciationForYear(10_000, 28)).toBe(0);
  });
});

describe('primary-residence exclusion', () => {
  it('counts occupied years inside the five years before sale', () => {
    expect(occupiedYearsInSaleWindow(4, 7)).toBe(2);
    expect(occupiedYearsInSaleWindow(3, 7)).toBe(1);
    expect(occupiedYearsInSaleWindow(10, 10)).toBe(5);
    expect(occupiedYearsInSaleWindow(2, 3)).toBe(2);
    expect(occupiedYearsInSaleWindow(1, 8)).toBe(0);
  });

  it('needs two of the last five years', () => {
    expect(qualifiesForExclusion(4, 7)).toBe(true);
    expect(qualifiesForExclusion(3, 7)).toBe(false);
    expect(qualifiesForExclusion(2, 3)).toBe(true);
    expect(qualifiesForExclusion(1, 3)).toBe(false);
  });
});

describe('saleTaxes', () => {
  const sale = {
    salePrice: 1_300_000,
    sellingCosts: 100_000,
    homePrice: 1_000_000,
    closingCosts: 30_000,
    cumulativeDepreciation: 0,
    exclusionEligible: false,
    capitalGainsTaxRate: 0.2,
    recaptureTaxRate: 0.25,
  };

  it('gain is net proceeds over price plus closing costs', () => {
    const t = saleTaxes(sale);
    expect(t.costBasis).toBe(1_030_000);
    expect(t.capitalGain).toBe(170_000);
    expect(t.exclusionApplied).toBe(0);
    expect(t.capitalGainsTax).toBe(34_000);
    expect(t.recaptureTax).toBe(0);
  });

  it('the exclusion shelters up to $500k of gain', () => {
    expect(saleTaxes({ ...sale, exclusionEligible: true }).capitalGainsTax).toBe(0);

    const big = saleTaxes({ ...sale, salePrice: 1_730_000, exclusionEligible: true });
    expect(big.capitalGain).toBe(600_000);
    expect(big.exclusionApplied).toBe(500_000);
    expect(big.capitalGainsTax).toBe(20_000);
  });

  it('a loss is not taxed', () => {
    const t = saleTaxes({ ...sale, salePrice: 900_000 });
    expect(t.capitalGain).toBe(0);
    expect(t.capitalGainsTax).toBe(0);
  });

  it('depreciation taken is recaptured', () => {
    expect(saleTaxes({ ...sale, cumulativeDepreciation: 40_000 }).recaptureTax).toBe(10_000);
  });

  it('gain already taxed as recapture is not taxed again as capital gain', () => {
    const t = saleTaxes({
      ...sale,
      salePrice: 700_000,
      sellingCosts: 0,
      homePrice: 500_000,
      closingCosts: 0,
      cumulativeDepreciation: 30_000,
    });
    expect(t.capitalGain).toBe(170_000);
    expect(t.capitalGainsTax).toBe(34_000);
    expect(t.recaptureTax).toBe(7_500);
  });

  it('depreciation above the gain leaves no capital gain', () => {
    const t = saleTaxes({ ...sale, cumulativeDepreciation: 200_000 });
    expect(t.capitalGain).toBe(0);
    expect(t.capitalGainsTax).toBe(0);
    expect(t.recaptureTax).toBe(50_000);
  });
});

describe('resolvePropertyTax', () => {
  it('co-op: a share of maintenance', () => {
    const basis = resolvePropertyTax({ ...DEFAULT_ASSUMPTIONS, propertyType: 'coop', monthlyFees: 2_000, propertyTaxPortionRate: 0.4 });
    expect(basis).toEqual({ annual: 9_600, source: 'fee-portion', billedSeparately: false, portionIgnored: false });
  });

  it('co-op: an explicit annual figure wins over the fee share', () => {
    const basis = resolvePropertyTax({ ...DEFAULT_ASSUMPTIONS, propertyType: 'coop', annualPropertyTax: 20_000 });
    expect(basis.annual).toBe(20_000);
    expect(basis.source).toBe('override');
  });

  it('condo: billed separately, fee share ignored', () => {
    const basis = resolvePropertyTax({
      ...DEFAULT_ASSUMPTIONS,
      propertyType: 'condo',
      annualPropertyTax: 12_000,
      propertyTaxPortionRate: 0.4,
    });
    expect(basis).toEqual({ annual: 12_000, source: 'separate', billedSeparately: true, portionIgnored: true });
  });
});
