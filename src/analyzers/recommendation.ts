import type { ComparisonAssessment, ComparisonResult, ScenarioKind } from '../types.js';
import { CLOSE_CALL_RATIO, CLOSE_CALL_ZERO_BAND } from '../config/defaults.js';

/**
 * Net gains of every scenario that was computed, highest first.
 * Ties keep the order occupy, rent, rent-out.
 */
export function rankScenarios(comparison: ComparisonResult): { kind: ScenarioKind; netGain: number }[] {
  const active: { kind: ScenarioKind; netGain: number }[] = [
    { kind: 'buy-and-occupy', netGain: comparison.occupyResult.netGain },
    { kind: 'rent-and-invest', netGain: comparison.rentResult.netGain },
  ];
  if (comparison.rentOutResult) {
    active.push({ kind: 'buy-and-rent-out', netGain: comparison.rentOutResult.netGain });
  }
  return active.sort((a, b) => b.netGain - a.netGain);
}

/**
 * Whether `other` is within the close-call band around `best`: 5% of the best
 * gain, or an absolute 1,000 when the best gain is exactly zero.
 */
export function isCloseCall(best: number, other: number): boolean {
  if (best === 0) return Math.abs(other) <= CLOSE_CALL_ZERO_BAND;
  return Math.abs(best - other) <= Math.abs(best) * CLOSE_CALL_RATIO;
}

export function assessComparison(comparison: ComparisonResult): ComparisonAssessment {
  const ranking = rankScenarios(comparison);
  const [best, ...rest] = ranking;
  const closeTo = rest.filter((r) => isCloseCall(best.netGain, r.netGain)).map((r) => r.kind);

  return {
    best: best.kind,
    ranking,
    margin: rest.length > 0 ? best.netGain - rest[0].netGain : 0,
    close: closeTo.length > 0,
    closeTo,
  };
}
