import type { AssumptionSet, LoanState, MonthlyCostBreakdown, PropertyTaxBasis } from '../types.js';

/**
 * Year-one property tax. Co-ops carry it inside maintenance (a share of the
 * fees, or an explicit annual figure when given); condos are billed separately.
 */
export function resolvePropertyTax(assumptions: AssumptionSet): PropertyTaxBasis {
  if (assumptions.propertyType === 'coop') {
    if (assumptions.annualPropertyTax > 0) {
      return { annual: assumptions.annualPropertyTax, source: 'override', billedSeparately: false, portionIgnored: false };
    }
    return {
      annual: assumptions.monthlyFees * 12 * assumptions.propertyTaxPortionRate,
      source: 'fee-portion',
      billedSeparately: false,
      portionIgnored: false,
    };
  }

  return {
    annual: assumptions.annualPropertyTax,
    source: 'separate',
    billedSeparately: true,
    portionIgnored: assumptions.propertyTaxPortionRate > 0,
  };
}

/**
 * Level of a year-one annual amount in horizon year `year` (1-based).
 */
export function grownAnnual(yearOne: number, annualGrowthRate: number, year: number): number {
  return yearOne * Math.pow(1 + annualGrowthRate, year - 1);
}

export function yearOneMonthlyCost(
  assumptions: AssumptionSet,
  loan: LoanState,
  propertyTax: PropertyTaxBasis,
): MonthlyCostBreakdown {
  const separateTax = propertyTax.billedSeparately ? propertyTax.annual / 12 : 0;
  return {
    principalAndInterest: loan.monthlyPayment,
    fees: assumptions.monthlyFees,
    propertyTax: separateTax,
    total: loan.monthlyPayment + assumptions.monthlyFees + separateTax,
  };
}
