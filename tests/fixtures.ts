import type { AssumptionSet, RentOutAssumptions } from '../src/types.js';

/**
 * $1M condo, 20% down at 6% over 30 years, no fees, taxes, growth or
 * closing costs. Rent is $4,000 flat for 10 years and investments earn 0%,
 * so every result can be worked out by hand.
 */
export const plainCondo: AssumptionSet = {
  propertyType: 'condo',
  homePrice: 1_000_000,
  downPaymentRate: 0.2,
  mortgageRate: 0.06,
  loanTermYears: 30,
  monthlyFees: 0,
  closingCostRate: 0,
  monthlyRent: 4_000,
  horizonYears: 10,
  appreciationRate: 0,
  investmentReturnRate: 0,
  rentGrowthRate: 0,
  feeGrowthRate: 0,
  sellingCostRate: 0.06,
  propertyTaxPortionRate: 0,
  annualPropertyTax: 0,
  marginalTaxRate: 0,
  capitalGainsTaxRate: 0,
  recaptureTaxRate: 0,
  standardDeduction: 30_000,
  mortgageInterestCap: 750_000,
  saltCap: 10_000,
};

export const condoRentOut: RentOutAssumptions = {
  yearsOccupied: 2,
  vacancyRate: 0.05,
  managementFeeRate: 0.1,
  annualLandlordCost: 1_000,
  landValueFraction: 0.45,
};

/**
 * $500k condo bought outright, lived in for 2 years then rented out for 3.
 */
export const cashCondoRental: AssumptionSet = {
  propertyType: 'condo',
  homePrice: 500_000,
  downPaymentRate: 1,
  mortgageRate: 0.06,
  loanTermYears: 30,
  monthlyFees: 500,
  closingCostRate: 0.02,
  monthlyRent: 3_000,
  horizonYears: 5,
  appreciationRate: 0.02,
  investmentReturnRate: 0.05,
  rentGrowthRate: 0,
  feeGrowthRate: 0,
  sellingCostRate: 0.05,
  propertyTaxPortionRate: 0,
  annualPropertyTax: 6_000,
  marginalTaxRate: 0.3,
  capitalGainsTaxRate: 0.2,
  recaptureTaxRate: 0.25,
  standardDeduction: 30_000,
  mortgageInterestCap: 750_000,
  saltCap: 10_000,
  rentOut: condoRentOut,
};
