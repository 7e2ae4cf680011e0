export * from './types.js';
export { computeComparison, buyAndOccupy, rentAndInvest, buyAndRentOut, type ComparisonOptions } from './calculators/scenarios.js';
export { monthlyPayment, remainingBalance, interestPaidInInterval, amortizationSchedule, describeLoan } from './calculators/mortgage.js';
export { valueAtYear, averageMonthlyValue } from './calculators/growth.js';
export { futureValueLumpSum, futureValueAnnuity } from './calculators/compound.js';
export {
  ownerDeduction,
  rentalTaxableIncome,
  annualDepreciation,
  occupiedYearsInSaleWindow,
  qualifiesForExclusion,
  saleTaxes,
} from './calculators/tax.js';
export { DegenerateInputError, DiagnosticsCollector, type Checked } from './calculators/checked.js';
export { assessComparison, isCloseCall } from './analyzers/recommendation.js';
export { validateAssumptions, AssumptionSetSchema } from './config/schema.js';
export { DEFAULT_ASSUMPTIONS, DEFAULT_RENT_OUT, defaultsFor } from './config/defaults.js';
