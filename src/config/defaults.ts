import type { AssumptionSet, PropertyType, RentOutAssumptions } from '../types.js';

export interface PropertyTypeProfile {
  label: string;
  feeLabel: string;
  closingCostRate: number;
  propertyTaxPortionRate: number;
  allowsRentOut: boolean;
}

export const PROPERTY_TYPES: Record<PropertyType, PropertyTypeProfile> = {
  coop: {
    label: 'Co-op',
    feeLabel: 'Maintenance',
    closingCostRate: 0.025, // ~1-3% + mansion tax
    propertyTaxPortionRate: 0.4,
    allowsRentOut: false,
  },
  condo: {
    label: 'Condo',
    feeLabel: 'Common charges',
    closingCostRate: 0.045, // ~3-6% incl. mortgage recording tax
    propertyTaxPortionRate: 0,
    allowsRentOut: true,
  },
};

export const DEFAULT_ASSUMPTIONS: AssumptionSet = {
  propertyType: 'coop',
  homePrice: 1_595_000,
  downPaymentRate: 0.2,
  mortgageRate: 0.07188,
  loanTermYears: 30,
  monthlyFees: 3_398,
  closingCostRate: PROPERTY_TYPES.coop.closingCostRate,
  monthlyRent: 10_000,
  horizonYears: 10,
  appreciationRate: 0.03,
  investmentReturnRate: 0.07,
  rentGrowthRate: 0.03,
  feeGrowthRate: 0.03,
  sellingCostRate: 0.07,
  propertyTaxPortionRate: PROPERTY_TYPES.coop.propertyTaxPortionRate,
  annualPropertyTax: 0,
  marginalTaxRate: 0.4,
  capitalGainsTaxRate: 0.2,
  recaptureTaxRate: 0.25,
  standardDeduction: 30_000,
  mortgageInterestCap: 750_000, // loans after 12/15/2017
  saltCap: 10_000,
};

export const DEFAULT_RENT_OUT: RentOutAssumptions = {
  yearsOccupied: 3,
  vacancyRate: 0.05,
  managementFeeRate: 0.08,
  annualLandlordCost: 3_000,
  landValueFraction: 0.2,
};

/**
 * Defaults for a property type: the shared assumptions with the type's
 * closing-cost and property-tax-portion rates.
 */
export function defaultsFor(propertyType: PropertyType): AssumptionSet {
  const profile = PROPERTY_TYPES[propertyType];
  return {
    ...DEFAULT_ASSUMPTIONS,
    propertyType,
    closingCostRate: profile.closingCostRate,
    propertyTaxPortionRate: profile.propertyTaxPortionRate,
  };
}

// ─── Engine constants ───

export const PRIMARY_RESIDENCE_EXCLUSION = 500_000; // married filing jointly
export const EXCLUSION_WINDOW_YEARS = 5;
export const EXCLUSION_MIN_OCCUPIED_YEARS = 2;
export const RESIDENTIAL_RECOVERY_YEARS = 27.5;

export const CLOSE_CALL_RATIO = 0.05;
export const CLOSE_CALL_ZERO_BAND = 1_000;

export const SCENARIO_LABELS = {
  'buy-and-occupy': 'Buy & Occupy',
  'rent-and-invest': 'Rent & Invest',
  'buy-and-rent-out': 'Buy & Rent Out',
} as const;
