import { assessComparison } from '../analyzers/recommendation.js';
import { computeComparison } from '../calculators/scenarios.js';
import { collectAssumptions, variantAssumptions, type AssumptionOptions } from '../config/collect.js';
import { theme } from '../formatters/colors.js';
import { formatDiagnostic, renderSweepTable, type SweepLine } from '../formatters/table.js';
import { parseSweepCsv, type SweepRowError } from '../parsers/sweep-csv.js';

export function sweepCommand(csvPath: string, opts: AssumptionOptions): void {
  // fails fast on a bad config file or flags before any row is read
  collectAssumptions(opts);
  const file = parseSweepCsv(csvPath);
  console.log(theme.muted(`\n  Parsed ${file.rows.length + file.errors.length} variants from ${csvPath}`));

  const entries: SweepLine[] = [];
  const rejected: SweepRowError[] = [...file.errors];

  for (const variant of file.rows) {
    const result = variantAssumptions(opts, variant.overrides);
    if (!result.ok) {
      rejected.push({ row: variant.row, label: variant.label, issues: result.issues });
      continue;
    }

    const comparison = computeComparison(result.value, {
      onDiagnostic: (d) => console.log(theme.warning(`  ${variant.label}: ${formatDiagnostic(d)}`)),
    });
    entries.push({ label: variant.label, comparison, assessment: assessComparison(comparison) });
  }

  console.log(renderSweepTable(entries));

  if (rejected.length > 0) {
    console.log('');
    console.log(theme.warning(`  Skipped ${rejected.length} invalid row${rejected.length === 1 ? '' : 's'}:`));
    for (const r of rejected.sort((x, y) => x.row - y.row)) {
      console.log(theme.warning(`    Row ${r.row} (${r.label}): ${r.issues.join('; ')}`));
    }
  }
  console.log('');
}
