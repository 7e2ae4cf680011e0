import { DiagnosticsCollector } from '../calculators/checked.js';
import { amortizationSchedule, describeLoan } from '../calculators/mortgage.js';
import { collectAssumptions, type AssumptionOptions } from '../config/collect.js';
import { renderAmortizationSchedule, renderDiagnostics } from '../formatters/table.js';

export interface AmortizeOptions extends AssumptionOptions {
  scheduleYears?: string;
}

export function amortizeCommand(opts: AmortizeOptions): void {
  const assumptions = collectAssumptions(opts);
  const diagnostics = new DiagnosticsCollector();
  const loan = describeLoan(assumptions, diagnostics);

  const requested = opts.scheduleYears ? parseInt(opts.scheduleYears, 10) : NaN;
  const years = Number.isNaN(requested) ? loan.termYears : Math.min(Math.max(1, requested), loan.termYears);
  const rows = amortizationSchedule(loan.principal, loan.annualRate, loan.termYears, years);

  console.log(renderAmortizationSchedule(loan, rows));
  const notes = renderDiagnostics(diagnostics.diagnostics);
  if (notes) console.log(notes);
  console.log('');
}
