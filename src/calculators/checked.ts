import type { DegradedReason, EngineDiagnostic, ScenarioKind } from '../types.js';

/**
 * Thrown by a calculator when its inputs put the formula outside its domain
 * (NaN/Infinity arguments, a monthly rate at or below -100%).
 */
export class DegenerateInputError extends Error {
  readonly reason: DegradedReason;

  constructor(reason: DegradedReason, message: string) {
    super(message);
    this.name = 'DegenerateInputError';
    this.reason = reason;
  }
}

export type Checked<T> =
  | { ok: true; value: T }
  | { ok: false; value: T; reason: DegradedReason; message: string };

/**
 * Throw a DegenerateInputError unless every named argument is a finite number.
 */
export function requireFinite(computation: string, args: Record<string, number>): void {
  for (const [name, value] of Object.entries(args)) {
    if (!Number.isFinite(value)) {
      throw new DegenerateInputError('non-finite-input', `${computation}: ${name} is ${value}`);
    }
  }
}

export interface AttemptContext {
  scenario?: ScenarioKind;
  year?: number;
}

/**
 * Runs sub-computations for one comparison and records every one that had to
 * fall back to zero. Errors other than DegenerateInputError propagate.
 */
export class DiagnosticsCollector {
  private readonly entries: EngineDiagnostic[] = [];

  constructor(private readonly onDiagnostic?: (diagnostic: EngineDiagnostic) => void) {}

  attempt(computation: string, fn: () => number, context: AttemptContext = {}): Checked<number> {
    let value: number;
    try {
      value = fn();
    } catch (err) {
      if (err instanceof DegenerateInputError) {
        return this.degrade(computation, err.reason, err.message, context);
      }
      throw err;
    }

    if (!Number.isFinite(value)) {
      return this.degrade(computation, 'non-finite-result', `${computation} produced ${value}`, context);
    }
    return { ok: true, value };
  }

  /** Shorthand for `attempt(...).value`. */
  value(computation: string, fn: () => number, context: AttemptContext = {}): number {
    return this.attempt(computation, fn, context).value;
  }

  get diagnostics(): EngineDiagnostic[] {
    return [...this.entries];
  }

  private degrade(
    computation: string,
    reason: DegradedReason,
    message: string,
    context: AttemptContext,
  ): Checked<number> {
    const diagnostic: EngineDiagnostic = { computation, reason, message, ...context };
    this.entries.push(diagnostic);
    this.onDiagnostic?.(diagnostic);
    return { ok: false, value: 0, reason, message };
  }
}
