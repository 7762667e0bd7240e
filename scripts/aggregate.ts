import { DIMENSIONS } from './types.js';
import type {
  AggregateScores,
  Assessment,
  Dimension,
  DimensionAggregate,
  EvaluationResult,
  PromptResult,
  ReportSummary,
} from './types.js';

// Ordered high to low; the first threshold the score reaches wins.
export const ASSESSMENT_THRESHOLDS: { min: number; label: Assessment }[] = [
  { min: 4.5, label: 'Excellent' },
  { min: 4.0, label: 'Very Good' },
  { min: 3.5, label: 'Good' },
  { min: 3.0, label: 'Acceptable' },
];

const LOWEST_ASSESSMENT: Assessment = 'Needs Improvement';

const RECOMMENDATIONS: Record<Assessment, (useCase: string) => string> = {
  Excellent: (uc) => `The model is an excellent fit for ${uc}. Deploy with confidence.`,
  'Very Good': (uc) =>
    `The model performs very well for ${uc}. Recommended for production use with standard monitoring.`,
  Good: (uc) =>
    `The model is suitable for ${uc} with some customization. Consider prompt engineering optimization.`,
  Acceptable: (uc) =>
    `The model can handle ${uc} but may need significant prompt tuning and an evaluation framework.`,
  'Needs Improvement': (uc) => `Consider alternative approaches or significant customization for ${uc}.`,
};

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

export function assess(score: number): Assessment {
  return ASSESSMENT_THRESHOLDS.find((t) => score >= t.min)?.label ?? LOWEST_ASSESSMENT;
}

export function recommend(assessment: Assessment, useCase: string): string {
  return RECOMMENDATIONS[assessment](useCase);
}

/**
 * Mean/min/max per dimension across all prompts, plus an overall mean that is
 * the plain average of the six dimension means.
 */
export function aggregate(results: PromptResult[]): AggregateScores {
  const dimension = (dim: Dimension): DimensionAggregate => {
    const values = results.map((r) => r.scores[dim]);
    return {
      mean: round2(mean(values)),
      min: values.length > 0 ? round2(Math.min(...values)) : 0,
      max: values.length > 0 ? round2(Math.max(...values)) : 0,
    };
  };

  // Overall uses the unrounded means so rounding is applied once; the label
  // follows the rounded figure that the report shows
  const overall = round2(mean(DIMENSIONS.map((dim) => mean(results.map((r) => r.scores[dim])))));

  return {
    completeness: dimension('completeness'),
    professional_tone: dimension('professional_tone'),
    safety: dimension('safety'),
    helpfulness: dimension('helpfulness'),
    format: dimension('format'),
    characteristics_match: dimension('characteristics_match'),
    overall: {
      mean: overall,
      assessment: assess(overall),
    },
  };
}

export function summarize(results: EvaluationResult[]): ReportSummary | null {
  if (results.length === 0) return null;

  let best = results[0];
  for (const r of results) {
    if (r.aggregate_scores.overall.mean > best.aggregate_scores.overall.mean) best = r;
  }

  return {
    average_overall_score: round2(mean(results.map((r) => r.aggregate_scores.overall.mean))),
    best_use_case: best.use_case,
    evaluation_count: results.length,
  };
}
