import type { ComparisonAssessment } from '../types.js';
import { SCENARIO_LABELS } from '../config/defaults.js';
import { formatUsd } from './colors.js';

/**
 * One-sentence verdict shared by the terminal and Markdown output.
 */
export function conclusionText(assessment: ComparisonAssessment, horizonYears: number): string {
  const best = SCENARIO_LABELS[assessment.best];
  const span = `${horizonYears} year${horizonYears === 1 ? '' : 's'}`;

  if (assessment.close) {
    const others = assessment.closeTo.map((kind) => SCENARIO_LABELS[kind]).join(' and ');
    return `Too close to call: ${best} leads ${others} by about ${formatUsd(assessment.margin)} over ${span}.`;
  }
  return `${best} comes out ahead by about ${formatUsd(assessment.margin)} over ${span}, based on these assumptions.`;
}
