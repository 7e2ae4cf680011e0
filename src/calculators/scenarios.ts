import type {
  AssumptionSet,
  BuyAndOccupyResult,
  BuyAndRentOutResult,
  ComparisonResult,
  EngineDiagnostic,
  LoanState,
  OwnershipYear,
  PropertyTaxBasis,
  RentalYear,
  RentAndInvestResult,
  RentOutAssumptions,
  RentOutYear,
  SaleOutcome,
  ScenarioKind,
} from '../types.js';
import { DiagnosticsCollector } from './checked.js';
import { futureValueAnnuity, futureValueLumpSum } from './compound.js';
import { grownAnnual, resolvePropertyTax, yearOneMonthlyCost } from './costs.js';
import { averageMonthlyValue, valueAtYear } from './growth.js';
import { describeLoan, interestPaidInInterval, paymentMonthsInYear, remainingBalance } from './mortgage.js';
import {
  annualDepreciation,
  depreciationForYear,
  occupiedYearsInSaleWindow,
  ownerDeduction,
  qualifiesForExclusion,
  rentalTaxableIncome,
  saleTaxes,
} from './tax.js';

// ─── Shared ownership helpers ───

interface OwnershipContext {
  scenario: ScenarioKind;
  assumptions: AssumptionSet;
  loan: LoanState;
  propertyTax: PropertyTaxBasis;
  diagnostics: DiagnosticsCollector;
}

function ownershipContext(
  scenario: ScenarioKind,
  assumptions: AssumptionSet,
  diagnostics: DiagnosticsCollector,
): OwnershipContext {
  return {
    scenario,
    assumptions,
    loan: describeLoan(assumptions, diagnostics, scenario),
    propertyTax: resolvePropertyTax(assumptions),
    diagnostics,
  };
}

function horizonYears(assumptions: AssumptionSet): number[] {
  return Array.from({ length: Math.max(0, Math.trunc(assumptions.horizonYears)) }, (_, i) => i + 1);
}

function interestForYear(ctx: OwnershipContext, year: number): number {
  const { loan } = ctx;
  return ctx.diagnostics.value(
    'interestPaidInInterval',
    () => interestPaidInInterval(loan.principal, loan.annualRate, loan.termYears, year - 1, year),
    { scenario: ctx.scenario, year },
  );
}

/**
 * One year of owning and living in the unit: what it costs in cash and what
 * itemizing saves in tax.
 */
function ownershipYear(ctx: OwnershipContext, year: number): OwnershipYear {
  const a = ctx.assumptions;
  const mortgagePayments = ctx.loan.monthlyPayment * paymentMonthsInYear(year, ctx.loan.termYears);
  const interestPaid = interestForYear(ctx, year);
  const fees = grownAnnual(a.monthlyFees * 12, a.feeGrowthRate, year);
  const propertyTax = grownAnnual(ctx.propertyTax.annual, a.feeGrowthRate, year);
  const grossCost = mortgagePayments + fees + (ctx.propertyTax.billedSeparately ? propertyTax : 0);

  const deduction = ownerDeduction({
    interestPaid,
    loanPrincipal: ctx.loan.principal,
    propertyTax,
    mortgageInterestCap: a.mortgageInterestCap,
    saltCap: a.saltCap,
    standardDeduction: a.standardDeduction,
    marginalTaxRate: a.marginalTaxRate,
  });

  return { phase: 'occupied', year, mortgagePayments, interestPaid, fees, propertyTax, grossCost, ...deduction };
}

function rentalYear(
  ctx: OwnershipContext,
  rentOut: RentOutAssumptions,
  year: number,
  depreciation: number,
): RentalYear {
  const a = ctx.assumptions;
  const scheduledRent = grownAnnual(a.monthlyRent * 12, a.rentGrowthRate, year);
  const mortgagePayments = ctx.loan.monthlyPayment * paymentMonthsInYear(year, ctx.loan.termYears);
  const interestPaid = interestForYear(ctx, year);
  const fees = grownAnnual(a.monthlyFees * 12, a.feeGrowthRate, year);
  const propertyTax = grownAnnual(ctx.propertyTax.annual, a.feeGrowthRate, year);
  const landlordCost = grownAnnual(rentOut.annualLandlordCost, a.feeGrowthRate, year);

  const income = rentalTaxableIncome({
    scheduledRent,
    vacancyRate: rentOut.vacancyRate,
    managementFeeRate: rentOut.managementFeeRate,
    interestPaid,
    propertyTax,
    fees,
    landlordCost,
    depreciation,
    marginalTaxRate: a.marginalTaxRate,
  });

  const netCashFlow =
    income.effectiveRent -
    mortgagePayments -
    fees -
    propertyTax -
    income.managementFee -
    landlordCost -
    income.rentalTax;

  return {
    phase: 'rental',
    year,
    scheduledRent,
    effectiveRent: income.effectiveRent,
    mortgagePayments,
    interestPaid,
    fees,
    propertyTax,
    managementFee: income.managementFee,
    landlordCost,
    depreciation,
    taxableIncome: income.taxableIncome,
    rentalTax: income.rentalTax,
    netCashFlow,
  };
}

function sellAtHorizon(
  ctx: OwnershipContext,
  yearsOccupied: number,
  exclusionEligible: boolean,
  cumulativeDepreciation: number,
): SaleOutcome {
  const a = ctx.assumptions;
  const { loan, diagnostics, scenario } = ctx;

  const salePrice = diagnostics.value('valueAtYear', () => valueAtYear(a.homePrice, a.appreciationRate, a.horizonYears), {
    scenario,
  });
  const loanBalance = diagnostics.value(
    'remainingBalance',
    () => remainingBalance(loan.principal, loan.annualRate, loan.termYears, a.horizonYears),
    { scenario },
  );
  const sellingCosts = salePrice * a.sellingCostRate;
  const preTaxEquity = salePrice - loanBalance - sellingCosts;

  const taxes = saleTaxes({
    salePrice,
    sellingCosts,
    homePrice: a.homePrice,
    closingCosts: loan.closingCosts,
    cumulativeDepreciation,
    exclusionEligible,
    capitalGainsTaxRate: a.capitalGainsTaxRate,
    recaptureTaxRate: a.recaptureTaxRate,
  });

  return {
    salePrice,
    sellingCosts,
    loanBalance,
    preTaxEquity,
    costBasis: taxes.costBasis,
    capitalGain: taxes.capitalGain,
    occupiedYearsInWindow: occupiedYearsInSaleWindow(yearsOccupied, a.horizonYears),
    exclusionApplied: taxes.exclusionApplied,
    capitalGainsTax: taxes.capitalGainsTax,
    cumulativeDepreciation,
    recaptureTax: taxes.recaptureTax,
    afterTaxEquity: preTaxEquity - taxes.capitalGainsTax - taxes.recaptureTax,
  };
}

// ─── Buy & Occupy ───

export function buyAndOccupy(
  assumptions: AssumptionSet,
  diagnostics: DiagnosticsCollector = new DiagnosticsCollector(),
): BuyAndOccupyResult {
  const ctx = ownershipContext('buy-and-occupy', assumptions, diagnostics);
  const { loan, propertyTax } = ctx;

  const years = horizonYears(assumptions).map((year) => ownershipYear(ctx, year));
  const totals = years.reduce(
    (acc, y) => ({
      grossCost: acc.grossCost + y.grossCost,
      taxSavings: acc.taxSavings + y.taxSaving,
      paymentMonths: acc.paymentMonths + paymentMonthsInYear(y.year, loan.termYears),
    }),
    { grossCost: 0, taxSavings: 0, paymentMonths: 0 },
  );

  const horizonMonths = Math.max(1, years.length * 12);
  const averagePrincipalAndInterest = (loan.monthlyPayment * totals.paymentMonths) / horizonMonths;
  const averageFees = diagnostics.value(
    'averageMonthlyValue',
    () => averageMonthlyValue(assumptions.monthlyFees, assumptions.feeGrowthRate, assumptions.horizonYears),
    { scenario: ctx.scenario },
  );
  const averageSeparateTax = propertyTax.billedSeparately
    ? diagnostics.value(
        'averageMonthlyValue',
        () => averageMonthlyValue(propertyTax.annual / 12, assumptions.feeGrowthRate, assumptions.horizonYears),
        { scenario: ctx.scenario },
      )
    : 0;

  const averageMonthlyGrossCost = averagePrincipalAndInterest + averageFees + averageSeparateTax;
  const averageMonthlyTaxSaving = totals.taxSavings / horizonMonths;

  // Always sold as a primary residence: the exclusion applies in full.
  const sale = sellAtHorizon(ctx, assumptions.horizonYears, true, 0);

  return {
    kind: 'buy-and-occupy',
    loan,
    propertyTax,
    yearOneMonthlyCost: yearOneMonthlyCost(assumptions, loan, propertyTax),
    averageMonthlyGrossCost,
    averageMonthlyTaxSaving,
    averageMonthlyNetCost: averageMonthlyGrossCost - averageMonthlyTaxSaving,
    cumulativeGrossCost: totals.grossCost,
    cumulativeTaxSavings: totals.taxSavings,
    years,
    sale,
    initialOutlay: loan.initialOutlay,
    netGain: sale.afterTaxEquity - loan.initialOutlay,
  };
}

// ─── Rent & Invest ───

/**
 * What renting is measured against: the money a buyer would have put down
 * and the buyer's average gross monthly cost.
 */
export interface BuyBenchmark {
  initialOutlay: number;
  averageMonthlyGrossCost: number;
}

export function rentAndInvest(
  assumptions: AssumptionSet,
  benchmark: BuyBenchmark,
  diagnostics: DiagnosticsCollector = new DiagnosticsCollector(),
): RentAndInvestResult {
  const scenario: ScenarioKind = 'rent-and-invest';
  const a = assumptions;
  const periods = Math.trunc(a.horizonYears * 12);

  const averageMonthlyRent = diagnostics.value(
    'averageMonthlyValue',
    () => averageMonthlyValue(a.monthlyRent, a.rentGrowthRate, a.horizonYears),
    { scenario },
  );
  const monthlyInvestment = Math.max(0, benchmark.averageMonthlyGrossCost - averageMonthlyRent);

  const lumpSumFutureValue = diagnostics.value(
    'futureValueLumpSum',
    () => futureValueLumpSum(benchmark.initialOutlay, a.investmentReturnRate, a.horizonYears),
    { scenario },
  );
  const contributionsFutureValue = diagnostics.value(
    'futureValueAnnuity',
    () => futureValueAnnuity(monthlyInvestment, a.investmentReturnRate, a.horizonYears),
    { scenario },
  );

  const totalContributed = benchmark.initialOutlay + monthlyInvestment * periods;
  const futureValue = lumpSumFutureValue + contributionsFutureValue;
  const investmentGain = futureValue - totalContributed;
  const investmentTax = Math.max(0, investmentGain) * a.capitalGainsTaxRate;
  const afterTaxValue = futureValue - investmentTax;

  return {
    kind: scenario,
    averageMonthlyRent,
    comparedMonthlyBuyCost: benchmark.averageMonthlyGrossCost,
    monthlyInvestment,
    totalRentPaid: averageMonthlyRent * periods,
    lumpSumFutureValue,
    contributionsFutureValue,
    totalContributed,
    futureValue,
    investmentGain,
    investmentTax,
    afterTaxValue,
    initialOutlay: benchmark.initialOutlay,
    netGain: afterTaxValue - benchmark.initialOutlay,
  };
}

// ─── Buy & Rent Out ───

interface RentOutAccumulator {
  years: RentOutYear[];
  occupiedTaxSavings: number;
  rentalCashFlow: number;
  depreciation: number;
  rentalYears: number;
}

/**
 * Returns undefined when the scenario does not apply: co-ops, or no rent-out
 * assumptions.
 */
export function buyAndRentOut(
  assumptions: AssumptionSet,
  diagnostics: DiagnosticsCollector = new DiagnosticsCollector(),
): BuyAndRentOutResult | undefined {
  const rentOut = assumptions.rentOut;
  if (assumptions.propertyType !== 'condo' || !rentOut) return undefined;

  const ctx = ownershipContext('buy-and-rent-out', assumptions, diagnostics);
  const perYearDepreciation = annualDepreciation(assumptions.homePrice, rentOut.landValueFraction);

  const initial: RentOutAccumulator = {
    years: [],
    occupiedTaxSavings: 0,
    rentalCashFlow: 0,
    depreciation: 0,
    rentalYears: 0,
  };

  const acc = horizonYears(assumptions).reduce<RentOutAccumulator>((state, year) => {
    if (year <= rentOut.yearsOccupied) {
      const owned = ownershipYear(ctx, year);
      return {
        ...state,
        years: [...state.years, owned],
        occupiedTaxSavings: state.occupiedTaxSavings + owned.taxSaving,
      };
    }

    const depreciation = depreciationForYear(perYearDepreciation, state.rentalYears);
    const rented = rentalYear(ctx, rentOut, year, depreciation);
    return {
      ...state,
      years: [...state.years, rented],
      rentalCashFlow: state.rentalCashFlow + rented.netCashFlow,
      depreciation: state.depreciation + depreciation,
      rentalYears: state.rentalYears + 1,
    };
  }, initial);

  const sale = sellAtHorizon(
    ctx,
    rentOut.yearsOccupied,
    qualifiesForExclusion(rentOut.yearsOccupied, assumptions.horizonYears),
    acc.depreciation,
  );

  return {
    kind: 'buy-and-rent-out',
    yearsOccupied: rentOut.yearsOccupied,
    annualDepreciation: perYearDepreciation,
    years: acc.years,
    cumulativeOccupiedTaxSavings: acc.occupiedTaxSavings,
    cumulativeRentalCashFlow: acc.rentalCashFlow,
    cumulativeDepreciation: acc.depreciation,
    sale,
    initialOutlay: ctx.loan.initialOutlay,
    netGain: sale.afterTaxEquity + acc.rentalCashFlow + acc.occupiedTaxSavings - ctx.loan.initialOutlay,
  };
}

// ─── Comparison ───

export interface ComparisonOptions {
  onDiagnostic?: (diagnostic: EngineDiagnostic) => void;
}

/**
 * Run all applicable scenarios for one assumption set. Each scenario gets its
 * own diagnostics collector; degraded sub-computations never abort the run.
 */
export function computeComparison(assumptions: AssumptionSet, options: ComparisonOptions = {}): ComparisonResult {
  const occupyDiagnostics = new DiagnosticsCollector(options.onDiagnostic);
  const rentDiagnostics = new DiagnosticsCollector(options.onDiagnostic);
  const rentOutDiagnostics = new DiagnosticsCollector(options.onDiagnostic);

  const occupyResult = buyAndOccupy(assumptions, occupyDiagnostics);
  const rentResult = rentAndInvest(assumptions, occupyResult, rentDiagnostics);
  const rentOutResult = buyAndRentOut(assumptions, rentOutDiagnostics);

  return {
    assumptions,
    occupyResult,
    rentResult,
    rentOutResult,
    diagnostics: [
      ...occupyDiagnostics.diagnostics,
      ...rentDiagnostics.diagnostics,
      ...rentOutDiagnostics.diagnostics,
    ],
  };
}
