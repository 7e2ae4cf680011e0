import chalk from 'chalk';
import type {
  AmortizationYear,
  AssumptionSet,
  BuyAndOccupyResult,
  BuyAndRentOutResult,
  ComparisonAssessment,
  ComparisonResult,
  EngineDiagnostic,
  LoanState,
  PropertyTaxBasis,
  RentAndInvestResult,
  SaleOutcome,
} from '../types.js';
import { PROPERTY_TYPES, SCENARIO_LABELS } from '../config/defaults.js';
import { formatPct, formatUsd, formatUsdDetailed, theme } from './colors.js';
import { conclusionText } from './conclusion.js';

/**
 * Pad a string to a given width (right-padded).
 */
function pad(str: string, width: number): string {
  // Strip ANSI codes for length calculation
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? str + ' '.repeat(diff) : str;
}

/**
 * Right-align a string within a given width.
 */
function rpad(str: string, width: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? ' '.repeat(diff) + str : str;
}

function row(label: string, value: string): string {
  return `    ${pad(label + ':', 30)}${value}`;
}

/**
 * Render the assumptions a comparison was run with.
 */
export function renderAssumptions(a: AssumptionSet): string {
  const profile = PROPERTY_TYPES[a.propertyType];
  const lines: string[] = [];
  lines.push(theme.heading(`\n━━━ Rent vs. Buy (${profile.label}, ${a.horizonYears}-year horizon) ━━━\n`));

  lines.push(theme.subheading('  Property & Loan'));
  lines.push(row('Home price', formatUsd(a.homePrice)));
  lines.push(row('Down payment', formatPct(a.downPaymentRate)));
  lines.push(row('Mortgage', `${formatPct(a.mortgageRate, 3)} fixed, ${a.loanTermYears} years`));
  lines.push(row(`${profile.feeLabel} (year 1)`, `${formatUsd(a.monthlyFees)}/mo`));
  lines.push(row('Closing costs', formatPct(a.closingCostRate)));
  lines.push(row('Equivalent rent (year 1)', `${formatUsd(a.monthlyRent)}/mo`));
  lines.push('');

  lines.push(theme.subheading('  Market'));
  lines.push(row('Appreciation', formatPct(a.appreciationRate)));
  lines.push(row('Investment return', formatPct(a.investmentReturnRate)));
  lines.push(row('Rent growth', formatPct(a.rentGrowthRate)));
  lines.push(row(`${profile.feeLabel} growth`, formatPct(a.feeGrowthRate)));
  lines.push(row('Selling costs', formatPct(a.sellingCostRate)));
  lines.push('');

  lines.push(theme.subheading('  Tax'));
  lines.push(row('Marginal rate', formatPct(a.marginalTaxRate)));
  lines.push(row('Long-term capital gains', formatPct(a.capitalGainsTaxRate)));
  lines.push(row('Depreciation recapture', formatPct(a.recaptureTaxRate)));
  lines.push(row('Standard deduction', formatUsd(a.standardDeduction)));
  lines.push(row('Mortgage interest limit', formatUsd(a.mortgageInterestCap)));
  lines.push(row('SALT cap', formatUsd(a.saltCap)));

  if (a.rentOut) {
    lines.push('');
    lines.push(theme.subheading('  Rent-Out'));
    lines.push(row('Years occupied', String(a.rentOut.yearsOccupied)));
    lines.push(row('Vacancy', formatPct(a.rentOut.vacancyRate)));
    lines.push(row('Management fee', formatPct(a.rentOut.managementFeeRate)));
    lines.push(row('Landlord costs (year 1)', `${formatUsd(a.rentOut.annualLandlordCost)}/yr`));
    lines.push(row('Land value', formatPct(a.rentOut.landValueFraction)));
  }

  return lines.join('\n');
}

/**
 * Notes on how the property tax figure was derived.
 */
export function renderPropertyTaxNotes(basis: PropertyTaxBasis): string[] {
  const notes: string[] = [];
  if (basis.source === 'override') {
    notes.push('Using the separate annual property tax instead of the share of maintenance.');
  }
  if (basis.portionIgnored) {
    notes.push('Condo property tax is billed separately; the property-tax share of fees is ignored.');
  }
  return notes;
}

function renderSale(sale: SaleOutcome, lines: string[]): void {
  lines.push(row('Future property value', formatUsd(sale.salePrice)));
  lines.push(row('Remaining loan balance', formatUsd(sale.loanBalance)));
  lines.push(row('Selling costs', formatUsd(sale.sellingCosts)));
  lines.push(row('Equity before tax', formatUsd(sale.preTaxEquity)));
  lines.push(row('Capital gain', formatUsd(sale.capitalGain)));
  lines.push(row('Exclusion applied', formatUsd(sale.exclusionApplied)));
  lines.push(row('Capital gains tax', formatUsd(sale.capitalGainsTax)));
  if (sale.cumulativeDepreciation > 0) {
    lines.push(row('Depreciation taken', formatUsd(sale.cumulativeDepreciation)));
    lines.push(row('Recapture tax', formatUsd(sale.recaptureTax)));
  }
  lines.push(row('Equity after tax', chalk.bold(formatUsd(sale.afterTaxEquity))));
}

function renderLoan(loan: LoanState, lines: string[]): void {
  lines.push(row('Down payment', formatUsd(loan.downPayment)));
  lines.push(row('Closing costs', formatUsd(loan.closingCosts)));
  lines.push(row('Initial cash outlay', chalk.bold(formatUsd(loan.initialOutlay))));
  lines.push(row('Loan amount', formatUsd(loan.principal)));
}

export function renderOccupyBreakdown(result: BuyAndOccupyResult, feeLabel: string): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading(`━━━ ${SCENARIO_LABELS[result.kind]} ━━━`));
  lines.push('');

  lines.push(theme.subheading('  Upfront'));
  renderLoan(result.loan, lines);
  lines.push('');

  const y1 = result.yearOneMonthlyCost;
  lines.push(theme.subheading('  Monthly Costs'));
  lines.push(row('Principal & interest', formatUsdDetailed(y1.principalAndInterest)));
  lines.push(row(`${feeLabel} (year 1)`, formatUsd(y1.fees)));
  if (result.propertyTax.billedSeparately) {
    lines.push(row('Property tax (year 1)', formatUsd(y1.propertyTax)));
  }
  lines.push(row('Year 1 gross cost', chalk.bold(formatUsd(y1.total))));
  lines.push(row('Average gross cost', formatUsd(result.averageMonthlyGrossCost)));
  lines.push(row('Average tax saving', formatUsd(result.averageMonthlyTaxSaving)));
  lines.push(row('Average net cost', formatUsd(result.averageMonthlyNetCost)));
  for (const note of renderPropertyTaxNotes(result.propertyTax)) {
    lines.push(theme.muted(`    ${note}`));
  }
  lines.push('');

  lines.push(theme.subheading(`  Outcome after ${result.years.length} years`));
  renderSale(result.sale, lines);
  lines.push(row('Tax savings (not in gain)', formatUsd(result.cumulativeTaxSavings)));
  lines.push(row('Net financial gain', theme.money(result.netGain)));

  return lines.join('\n');
}

export function renderRentBreakdown(result: RentAndInvestResult): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading(`━━━ ${SCENARIO_LABELS[result.kind]} ━━━`));
  lines.push('');

  lines.push(theme.subheading('  Investment Basis'));
  lines.push(row('Initial investment', formatUsd(result.initialOutlay)));
  lines.push(row('Average rent', `${formatUsd(result.averageMonthlyRent)}/mo`));
  lines.push(row('Average buy cost (gross)', `${formatUsd(result.comparedMonthlyBuyCost)}/mo`));
  lines.push(row('Monthly investment', `${formatUsd(result.monthlyInvestment)}/mo`));
  lines.push(theme.muted(`    (max(0, ${formatUsd(result.comparedMonthlyBuyCost)} - ${formatUsd(result.averageMonthlyRent)}))`));
  lines.push(row('Total rent paid', formatUsd(result.totalRentPaid)));
  lines.push('');

  lines.push(theme.subheading('  Outcome'));
  lines.push(row('FV of initial investment', formatUsd(result.lumpSumFutureValue)));
  lines.push(row('FV of monthly investments', formatUsd(result.contributionsFutureValue)));
  lines.push(row('Total contributed', formatUsd(result.totalContributed)));
  lines.push(row('Investment gain', formatUsd(result.investmentGain)));
  lines.push(row('Tax on gain', formatUsd(result.investmentTax)));
  lines.push(row('Value after tax', chalk.bold(formatUsd(result.afterTaxValue))));
  lines.push(row('Net financial gain', theme.money(result.netGain)));

  return lines.join('\n');
}

export function renderRentOutBreakdown(result: BuyAndRentOutResult): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading(`━━━ ${SCENARIO_LABELS[result.kind]} (occupied ${result.yearsOccupied} yrs) ━━━`));
  lines.push('');

  const cols = [
    pad('Year', 6),
    pad('Phase', 10),
    rpad('Rent', 12),
    rpad('Expenses', 12),
    rpad('Deprec.', 10),
    rpad('Taxable', 12),
    rpad('Tax', 10),
    rpad('Cash Flow', 12),
  ];
  lines.push(chalk.bold(cols.join(' ')));
  lines.push(theme.muted('─'.repeat(92)));

  for (const y of result.years) {
    if (y.phase === 'occupied') {
      lines.push(
        [
          pad(String(y.year), 6),
          pad('Occupied', 10),
          rpad(theme.muted('—'), 12),
          rpad(formatUsd(y.grossCost), 12),
          rpad(theme.muted('—'), 10),
          rpad(theme.muted('—'), 12),
          rpad(formatUsd(-y.taxSaving), 10),
          rpad(theme.muted('—'), 12),
        ].join(' '),
      );
      continue;
    }
    const expenses = y.mortgagePayments + y.fees + y.propertyTax + y.managementFee + y.landlordCost;
    lines.push(
      [
        pad(String(y.year), 6),
        pad('Rental', 10),
        rpad(formatUsd(y.effectiveRent), 12),
        rpad(formatUsd(expenses), 12),
        rpad(formatUsd(y.depreciation), 10),
        rpad(formatUsd(y.taxableIncome), 12),
        rpad(formatUsd(y.rentalTax), 10),
        rpad(theme.money(y.netCashFlow), 12),
      ].join(' '),
    );
  }

  lines.push('');
  lines.push(theme.subheading('  Outcome'));
  lines.push(row('Initial cash outlay', formatUsd(result.initialOutlay)));
  lines.push(row('Occupied-phase tax savings', formatUsd(result.cumulativeOccupiedTaxSavings)));
  lines.push(row('Rental cash flow after tax', theme.money(result.cumulativeRentalCashFlow)));
  lines.push(row('Primary residence years (last 5)', String(result.sale.occupiedYearsInWindow)));
  renderSale(result.sale, lines);
  lines.push(row('Net financial gain', theme.money(result.netGain)));

  return lines.join('\n');
}

/**
 * Render a side-by-side summary of every scenario plus the verdict.
 */
export function renderComparison(comparison: ComparisonResult, assessment: ComparisonAssessment): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading('━━━ Comparison Summary ━━━'));
  lines.push('');
  lines.push(chalk.bold(`  ${pad('Scenario', 20)} ${rpad('Net Gain', 14)}`));
  lines.push(theme.muted('  ' + '─'.repeat(40)));

  for (const r of assessment.ranking) {
    const star = r.kind === assessment.best ? chalk.green.bold(' ★') : '';
    lines.push(`  ${pad(SCENARIO_LABELS[r.kind], 20)} ${rpad(theme.money(r.netGain), 14)}${star}`);
  }

  lines.push('');
  const verdict = conclusionText(assessment, comparison.assumptions.horizonYears);
  lines.push(assessment.close ? theme.warning(`  ${verdict}`) : theme.positive(`  ${verdict}`));
  return lines.join('\n');
}

/**
 * One warning line for a degraded calculation, e.g.
 * "⚠ valueAtYear (Buy & Occupy): valueAtYear produced Infinity".
 */
export function formatDiagnostic(d: EngineDiagnostic): string {
  const where = [d.scenario ? SCENARIO_LABELS[d.scenario] : undefined, d.year ? `year ${d.year}` : undefined]
    .filter((part) => part !== undefined)
    .join(', ');
  return `⚠ ${d.computation}${where ? ` (${where})` : ''}: ${d.message}`;
}

export function renderDiagnostics(diagnostics: EngineDiagnostic[]): string {
  if (diagnostics.length === 0) return '';
  const lines: string[] = [''];
  lines.push(theme.warning('  Degraded calculations (counted as 0)'));
  for (const d of diagnostics) {
    lines.push(theme.warning(`    ${formatDiagnostic(d)}`));
  }
  return lines.join('\n');
}

/**
 * Render a yearly amortization schedule.
 */
export function renderAmortizationSchedule(loan: LoanState, rows: AmortizationYear[]): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading('━━━ Amortization Schedule ━━━'));
  lines.push('');
  lines.push(row('Loan amount', formatUsd(loan.principal)));
  lines.push(row('Rate', `${formatPct(loan.annualRate, 3)} fixed, ${loan.termYears} years`));
  lines.push(row('Monthly payment', formatUsdDetailed(loan.monthlyPayment)));
  lines.push('');

  const cols = [pad('Year', 6), rpad('Payments', 14), rpad('Interest', 14), rpad('Principal', 14), rpad('Balance', 14)];
  lines.push(chalk.bold(cols.join(' ')));
  lines.push(theme.muted('─'.repeat(66)));

  for (const r of rows) {
    lines.push(
      [
        pad(String(r.year), 6),
        rpad(formatUsd(r.payments), 14),
        rpad(formatUsd(r.interest), 14),
        rpad(formatUsd(r.principal), 14),
        rpad(formatUsd(r.endBalance), 14),
      ].join(' '),
    );
  }

  const totalInterest = rows.reduce((s, r) => s + r.interest, 0);
  lines.push('');
  lines.push(`  Total interest over ${rows.length} years: ${chalk.bold(formatUsd(totalInterest))}`);
  return lines.join('\n');
}

export interface SweepLine {
  label: string;
  comparison: ComparisonResult;
  assessment: ComparisonAssessment;
}

/**
 * One line per sweep variant: each scenario's net gain and the winner.
 */
export function renderSweepTable(entries: SweepLine[]): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading('━━━ Assumption Sweep ━━━'));
  lines.push('');
  const header = [
    pad('Variant', 24),
    rpad('Buy & Occupy', 14),
    rpad('Rent & Invest', 14),
    rpad('Rent Out', 14),
    pad('  Best', 18),
  ];
  lines.push(chalk.bold(header.join(' ')));
  lines.push(theme.muted('─'.repeat(88)));

  for (const e of entries) {
    const { occupyResult, rentResult, rentOutResult } = e.comparison;
    const best = SCENARIO_LABELS[e.assessment.best] + (e.assessment.close ? theme.warning(' (close)') : '');
    lines.push(
      [
        pad(e.label, 24),
        rpad(theme.money(occupyResult.netGain), 14),
        rpad(theme.money(rentResult.netGain), 14),
        rpad(rentOutResult ? theme.money(rentOutResult.netGain) : theme.muted('—'), 14),
        pad(`  ${best}`, 18),
      ].join(' '),
    );
  }

  return lines.join('\n');
}
