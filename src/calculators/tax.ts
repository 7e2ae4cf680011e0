import type { OwnerDeduction } from '../types.js';
import {
  EXCLUSION_MIN_OCCUPIED_YEARS,
  EXCLUSION_WINDOW_YEARS,
  PRIMARY_RESIDENCE_EXCLUSION,
  RESIDENTIAL_RECOVERY_YEARS,
} from '../config/defaults.js';

// ─── Owner-occupant itemized deduction ───

export interface OwnerDeductionInput {
  interestPaid: number;
  loanPrincipal: number;
  propertyTax: number;
  mortgageInterestCap: number;
  saltCap: number;
  standardDeduction: number;
  marginalTaxRate: number;
}

/**
 * One year's saving from itemizing housing deductions instead of taking the
 * standard deduction. Interest on principal above the cap is not deductible;
 * property tax counts up to the SALT cap.
 */
export function ownerDeduction(input: OwnerDeductionInput): OwnerDeduction {
  const deductibleRatio =
    input.loanPrincipal > input.mortgageInterestCap
      ? Math.min(1, input.mortgageInterestCap / input.loanPrincipal)
      : 1;
  const deductibleInterest = input.interestPaid * deductibleRatio;
  const deductiblePropertyTax = Math.max(0, Math.min(input.propertyTax, input.saltCap));
  const itemizedTotal = deductibleInterest + deductiblePropertyTax;
  const taxSaving = Math.max(0, itemizedTotal - input.standardDeduction) * input.marginalTaxRate;

  return { deductibleInterest, deductiblePropertyTax, itemizedTotal, taxSaving };
}

// ─── Landlord ───

export interface RentalIncomeInput {
  scheduledRent: number;
  vacancyRate: number;
  managementFeeRate: number;
  interestPaid: number;
  propertyTax: number;
  fees: number;
  landlordCost: number;
  depreciation: number;
  marginalTaxRate: number;
}

export interface RentalIncome {
  effectiveRent: number;
  managementFee: number;
  deductibleExpenses: number;
  taxableIncome: number;
  rentalTax: number;
}

/**
 * Taxable rental income for one year. A loss is kept as-is (no passive-loss
 * limitation) and produces a negative tax.
 */
export function rentalTaxableIncome(input: RentalIncomeInput): RentalIncome {
  const effectiveRent = input.scheduledRent * (1 - input.vacancyRate);
  const managementFee = effectiveRent * input.managementFeeRate;
  const deductibleExpenses =
    input.interestPaid +
    input.propertyTax +
    input.fees +
    managementFee +
    input.landlordCost +
    input.depreciation;
  const taxableIncome = effectiveRent - deductibleExpenses;

  return {
    effectiveRent,
    managementFee,
    deductibleExpenses,
    taxableIncome,
    rentalTax: taxableIncome * input.marginalTaxRate,
  };
}

/**
 * Straight-line residential depreciation on the building (price less land).
 */
export function annualDepreciation(homePrice: number, landValueFraction: number): number {
  return (homePrice * (1 - landValueFraction)) / RESIDENTIAL_RECOVERY_YEARS;
}

/**
 * Depreciation for the next rental year, given how many years have already
 * been taken. The last partial year of the recovery period gets a fraction.
 */
export function depreciationForYear(annual: number, yearsAlreadyDepreciated: number): number {
  const remaining = RESIDENTIAL_RECOVERY_YEARS - yearsAlreadyDepreciated;
  return annual * Math.max(0, Math.min(1, remaining));
}

// ─── Sale ───

/**
 * Years of the occupied span [0, yearsOccupied] that fall inside the trailing
 * window [horizon - 5, horizon], with the window clipped at purchase.
 */
export function occupiedYearsInSaleWindow(yearsOccupied: number, horizonYears: number): number {
  const windowStart = Math.max(0, horizonYears - EXCLUSION_WINDOW_YEARS);
  const occupiedEnd = Math.min(yearsOccupied, horizonYears);
  return Math.max(0, occupiedEnd - windowStart);
}

export function qualifiesForExclusion(yearsOccupied: number, horizonYears: number): boolean {
  return occupiedYearsInSaleWindow(yearsOccupied, horizonYears) >= EXCLUSION_MIN_OCCUPIED_YEARS;
}

export interface SaleTaxInput {
  salePrice: number;
  sellingCosts: number;
  homePrice: number;
  closingCosts: number;
  cumulativeDepreciation: number;
  exclusionEligible: boolean;
  capitalGainsTaxRate: number;
  recaptureTaxRate: number;
}

export interface SaleTaxes {
  costBasis: number;
  capitalGain: number;
  exclusionApplied: number;
  capitalGainsTax: number;
  recaptureTax: number;
}

/**
 * Taxes due at sale. Depreciation taken is taxed as recapture; what is left of
 * the gain over the original basis after that is the capital gain, reduced by
 * the primary-residence exclusion when eligible.
 */
export function saleTaxes(input: SaleTaxInput): SaleTaxes {
  const costBasis = input.homePrice + input.closingCosts;
  const gainOverBasis = Math.max(0, input.salePrice - input.sellingCosts - costBasis);
  const capitalGain = Math.max(0, gainOverBasis - input.cumulativeDepreciation);
  const exclusionApplied = input.exclusionEligible ? Math.min(capitalGain, PRIMARY_RESIDENCE_EXCLUSION) : 0;

  return {
    costBasis,
    capitalGain,
    exclusionApplied,
    capitalGainsTax: Math.max(0, capitalGain - exclusionApplied) * input.capitalGainsTaxRate,
    recaptureTax: input.cumulativeDepreciation * input.recaptureTaxRate,
  };
}
