import type { ComparisonAssessment, ComparisonResult, SaleOutcome } from '../types.js';
import { PROPERTY_TYPES, SCENARIO_LABELS } from '../config/defaults.js';
import { formatPct, formatUsd } from './colors.js';
import { conclusionText } from './conclusion.js';

function saleRows(sale: SaleOutcome): string[] {
  const rows = [
    `| Future property value | ${formatUsd(sale.salePrice)} |`,
    `| Remaining loan balance | ${formatUsd(sale.loanBalance)} |`,
    `| Selling costs | ${formatUsd(sale.sellingCosts)} |`,
    `| Capital gain | ${formatUsd(sale.capitalGain)} |`,
    `| Exclusion applied | ${formatUsd(sale.exclusionApplied)} |`,
    `| Capital gains tax | ${formatUsd(sale.capitalGainsTax)} |`,
  ];
  if (sale.cumulativeDepreciation > 0) {
    rows.push(`| Depreciation taken | ${formatUsd(sale.cumulativeDepreciation)} |`);
    rows.push(`| Recapture tax | ${formatUsd(sale.recaptureTax)} |`);
  }
  rows.push(`| Equity after tax | ${formatUsd(sale.afterTaxEquity)} |`);
  return rows;
}

export function renderMarkdownReport(
  comparison: ComparisonResult,
  assessment: ComparisonAssessment,
  generatedOn: string = new Date().toISOString().slice(0, 10),
): string {
  const a = comparison.assumptions;
  const { occupyResult: occupy, rentResult: rent, rentOutResult: rentOut } = comparison;
  const profile = PROPERTY_TYPES[a.propertyType];
  const lines: string[] = [];

  // ─── Header ───
  lines.push('# Rent vs. Buy Comparison');
  lines.push('');
  lines.push(`Generated: ${generatedOn} | ${profile.label} | ${a.horizonYears}-year horizon`);
  lines.push('');
  lines.push(`> ${conclusionText(assessment, a.horizonYears)}`);
  lines.push('');

  // ─── Summary ───
  lines.push('## Net Financial Gain');
  lines.push('');
  lines.push('| Scenario | Net Gain |');
  lines.push('| --- | --- |');
  for (const r of assessment.ranking) {
    lines.push(`| ${SCENARIO_LABELS[r.kind]} | ${formatUsd(r.netGain)} |`);
  }
  lines.push('');

  // ─── Assumptions ───
  lines.push('## Assumptions');
  lines.push('');
  lines.push('| Parameter | Value |');
  lines.push('| --- | --- |');
  lines.push(`| Home price | ${formatUsd(a.homePrice)} |`);
  lines.push(`| Down payment | ${formatPct(a.downPaymentRate)} |`);
  lines.push(`| Mortgage | ${formatPct(a.mortgageRate, 3)}, ${a.loanTermYears} years |`);
  lines.push(`| ${profile.feeLabel} | ${formatUsd(a.monthlyFees)}/mo |`);
  lines.push(`| Rent | ${formatUsd(a.monthlyRent)}/mo |`);
  lines.push(`| Appreciation | ${formatPct(a.appreciationRate)} |`);
  lines.push(`| Investment return | ${formatPct(a.investmentReturnRate)} |`);
  lines.push(`| Rent growth | ${formatPct(a.rentGrowthRate)} |`);
  lines.push(`| Fee growth | ${formatPct(a.feeGrowthRate)} |`);
  lines.push(`| Marginal tax rate | ${formatPct(a.marginalTaxRate)} |`);
  lines.push(`| Capital gains tax rate | ${formatPct(a.capitalGainsTaxRate)} |`);
  lines.push('');

  // ─── Buy & Occupy ───
  lines.push(`## ${SCENARIO_LABELS[occupy.kind]}`);
  lines.push('');
  lines.push('| Detail | Value |');
  lines.push('| --- | --- |');
  lines.push(`| Initial cash outlay | ${formatUsd(occupy.initialOutlay)} |`);
  lines.push(`| Year 1 gross monthly cost | ${formatUsd(occupy.yearOneMonthlyCost.total)} |`);
  lines.push(`| Average gross monthly cost | ${formatUsd(occupy.averageMonthlyGrossCost)} |`);
  lines.push(`| Average monthly tax saving | ${formatUsd(occupy.averageMonthlyTaxSaving)} |`);
  lines.push(...saleRows(occupy.sale));
  lines.push('');

  // ─── Rent & Invest ───
  lines.push(`## ${SCENARIO_LABELS[rent.kind]}`);
  lines.push('');
  lines.push('| Detail | Value |');
  lines.push('| --- | --- |');
  lines.push(`| Average monthly rent | ${formatUsd(rent.averageMonthlyRent)} |`);
  lines.push(`| Monthly investment | ${formatUsd(rent.monthlyInvestment)} |`);
  lines.push(`| Future value | ${formatUsd(rent.futureValue)} |`);
  lines.push(`| Tax on gain | ${formatUsd(rent.investmentTax)} |`);
  lines.push(`| Value after tax | ${formatUsd(rent.afterTaxValue)} |`);
  lines.push('');

  // ─── Buy & Rent Out ───
  if (rentOut) {
    lines.push(`## ${SCENARIO_LABELS[rentOut.kind]}`);
    lines.push('');
    lines.push('| Year | Phase | Cash Flow After Tax | Tax Saving / Rental Tax |');
    lines.push('| --- | --- | --- | --- |');
    for (const y of rentOut.years) {
      if (y.phase === 'occupied') {
        lines.push(`| ${y.year} | Occupied | — | ${formatUsd(-y.taxSaving)} |`);
      } else {
        lines.push(`| ${y.year} | Rental | ${formatUsd(y.netCashFlow)} | ${formatUsd(y.rentalTax)} |`);
      }
    }
    lines.push('');
    lines.push('| Detail | Value |');
    lines.push('| --- | --- |');
    lines.push(`| Rental cash flow after tax | ${formatUsd(rentOut.cumulativeRentalCashFlow)} |`);
    lines.push(`| Occupied-phase tax savings | ${formatUsd(rentOut.cumulativeOccupiedTaxSavings)} |`);
    lines.push(...saleRows(rentOut.sale));
    lines.push('');
  }

  if (comparison.diagnostics.length > 0) {
    lines.push('## Degraded Calculations');
    lines.push('');
    for (const d of comparison.diagnostics) {
      lines.push(`- \`${d.computation}\`${d.year ? ` (year ${d.year})` : ''}: ${d.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
