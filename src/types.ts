// ─── Assumption Types ───

export type PropertyType = 'coop' | 'condo';

export interface RentOutAssumptions {
  yearsOccupied: number; // whole years lived in before converting to a rental
  vacancyRate: number; // e.g. 0.05 for 5%
  managementFeeRate: number; // share of effective rent
  annualLandlordCost: number; // year-1 insurance, repairs, turnover etc.
  landValueFraction: number; // share of price that is land (not depreciable)
}

/**
 * Every rate is a decimal (0.06 for 6%). Percentages only exist on the
 * command line and in rendered output.
 */
export interface AssumptionSet {
  propertyType: PropertyType;
  homePrice: number;
  downPaymentRate: number;
  mortgageRate: number;
  loanTermYears: number;
  monthlyFees: number; // maintenance (co-op) or common charges (condo), year 1
  closingCostRate: number;
  monthlyRent: number; // equivalent market rent, year 1
  horizonYears: number;
  appreciationRate: number;
  investmentReturnRate: number;
  rentGrowthRate: number;
  feeGrowthRate: number; // also grows property tax and landlord costs
  sellingCostRate: number;
  propertyTaxPortionRate: number; // co-op only: share of fees that is property tax
  annualPropertyTax: number; // condo bill, or co-op override when > 0
  marginalTaxRate: number;
  capitalGainsTaxRate: number;
  recaptureTaxRate: number;
  standardDeduction: number;
  mortgageInterestCap: number;
  saltCap: number;
  rentOut?: RentOutAssumptions;
}

// ─── Loan & Cost Types ───

export interface LoanState {
  downPayment: number;
  closingCosts: number;
  initialOutlay: number;
  principal: number;
  monthlyPayment: number;
  annualRate: number;
  termYears: number;
}

export interface AmortizationYear {
  year: number;
  payments: number;
  interest: number;
  principal: number;
  endBalance: number;
}

export type PropertyTaxSource = 'fee-portion' | 'override' | 'separate';

export interface PropertyTaxBasis {
  annual: number; // year 1
  source: PropertyTaxSource;
  billedSeparately: boolean;
  portionIgnored: boolean; // condo with a non-zero fee-portion rate
}

export interface MonthlyCostBreakdown {
  principalAndInterest: number;
  fees: number;
  propertyTax: number; // separately billed tax only
  total: number;
}

// ─── Scenario Types ───

export type ScenarioKind = 'buy-and-occupy' | 'rent-and-invest' | 'buy-and-rent-out';

export interface OwnerDeduction {
  deductibleInterest: number;
  deductiblePropertyTax: number;
  itemizedTotal: number;
  taxSaving: number;
}

export interface OwnershipYear extends OwnerDeduction {
  phase: 'occupied';
  year: number;
  mortgagePayments: number;
  interestPaid: number;
  fees: number;
  propertyTax: number;
  grossCost: number;
}

export interface RentalYear {
  phase: 'rental';
  year: number;
  scheduledRent: number;
  effectiveRent: number;
  mortgagePayments: number;
  interestPaid: number;
  fees: number;
  propertyTax: number;
  managementFee: number;
  landlordCost: number;
  depreciation: number;
  taxableIncome: number; // negative is a loss
  rentalTax: number; // negative is a benefit
  netCashFlow: number; // after tax
}

export type RentOutYear = OwnershipYear | RentalYear;

export interface SaleOutcome {
  salePrice: number;
  sellingCosts: number;
  loanBalance: number;
  preTaxEquity: number;
  costBasis: number;
  capitalGain: number;
  occupiedYearsInWindow: number;
  exclusionApplied: number;
  capitalGainsTax: number;
  cumulativeDepreciation: number;
  recaptureTax: number;
  afterTaxEquity: number;
}

export interface BuyAndOccupyResult {
  kind: 'buy-and-occupy';
  loan: LoanState;
  propertyTax: PropertyTaxBasis;
  yearOneMonthlyCost: MonthlyCostBreakdown;
  averageMonthlyGrossCost: number;
  averageMonthlyTaxSaving: number;
  averageMonthlyNetCost: number;
  cumulativeGrossCost: number;
  cumulativeTaxSavings: number;
  years: OwnershipYear[];
  sale: SaleOutcome;
  initialOutlay: number;
  netGain: number;
}

export interface RentAndInvestResult {
  kind: 'rent-and-invest';
  averageMonthlyRent: number;
  comparedMonthlyBuyCost: number;
  monthlyInvestment: number;
  totalRentPaid: number;
  lumpSumFutureValue: number;
  contributionsFutureValue: number;
  totalContributed: number;
  futureValue: number;
  investmentGain: number;
  investmentTax: number;
  afterTaxValue: number;
  initialOutlay: number;
  netGain: number;
}

export interface BuyAndRentOutResult {
  kind: 'buy-and-rent-out';
  yearsOccupied: number;
  annualDepreciation: number;
  years: RentOutYear[];
  cumulativeOccupiedTaxSavings: number;
  cumulativeRentalCashFlow: number;
  cumulativeDepreciation: number;
  sale: SaleOutcome;
  initialOutlay: number;
  netGain: number;
}

export type ScenarioResult = BuyAndOccupyResult | RentAndInvestResult | BuyAndRentOutResult;

// ─── Diagnostics ───

export type DegradedReason = 'non-finite-input' | 'invalid-rate' | 'non-finite-result';

export interface EngineDiagnostic {
  computation: string;
  reason: DegradedReason;
  message: string;
  scenario?: ScenarioKind;
  year?: number;
}

export interface ComparisonResult {
  assumptions: AssumptionSet;
  occupyResult: BuyAndOccupyResult;
  rentResult: RentAndInvestResult;
  rentOutResult?: BuyAndRentOutResult;
  diagnostics: EngineDiagnostic[];
}

export interface ComparisonAssessment {
  best: ScenarioKind;
  ranking: { kind: ScenarioKind; netGain: number }[];
  margin: number; // best minus runner-up, 0 with a single scenario
  close: boolean;
  closeTo: ScenarioKind[];
}
