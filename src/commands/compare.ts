import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { assessComparison } from '../analyzers/recommendation.js';
import { computeComparison } from '../calculators/scenarios.js';
import { collectAssumptions, type AssumptionOptions } from '../config/collect.js';
import { PROPERTY_TYPES } from '../config/defaults.js';
import { theme } from '../formatters/colors.js';
import { renderMarkdownReport } from '../formatters/markdown.js';
import {
  formatDiagnostic,
  renderAssumptions,
  renderComparison,
  renderOccupyBreakdown,
  renderRentBreakdown,
  renderRentOutBreakdown,
} from '../formatters/table.js';

export interface CompareOptions extends AssumptionOptions {
  markdown?: string;
}

export function compareCommand(opts: CompareOptions): void {
  const assumptions = collectAssumptions(opts);
  const comparison = computeComparison(assumptions, {
    onDiagnostic: (d) => console.log(theme.warning(`  ${formatDiagnostic(d)}`)),
  });
  const assessment = assessComparison(comparison);

  console.log(renderAssumptions(assumptions));
  console.log(renderOccupyBreakdown(comparison.occupyResult, PROPERTY_TYPES[assumptions.propertyType].feeLabel));
  console.log(renderRentBreakdown(comparison.rentResult));
  if (comparison.rentOutResult) {
    console.log(renderRentOutBreakdown(comparison.rentOutResult));
  }
  console.log(renderComparison(comparison, assessment));
  if (comparison.diagnostics.length > 0) {
    console.log(theme.warning(`\n  ${comparison.diagnostics.length} calculation(s) degraded and counted as 0 (see warnings above)`));
  }

  if (opts.markdown) {
    const outputPath = resolve(opts.markdown);
    writeFileSync(outputPath, renderMarkdownReport(comparison, assessment), 'utf-8');
    console.log(theme.muted(`\n  Report written to ${outputPath}`));
  }

  console.log('');
}
