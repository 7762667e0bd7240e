import { readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { summarize } from './aggregate.js';
import { ConfigError } from './errors.js';
import type { ComparisonReport, EvaluationReport, EvaluationResult } from './types.js';

export const EVALUATION_REPORT_FILE = 'evaluation_report.json';
export const COMPARISON_REPORT_FILE = 'model_comparison_report.json';

export function buildEvaluationReport(results: EvaluationResult[], date = new Date()): EvaluationReport {
  return {
    evaluation_date: date.toISOString(),
    total_use_cases_evaluated: results.length,
    results,
    summary: summarize(results),
  };
}

/** File name for a per-model report, e.g. "evaluation_sonnet-4.5.json". */
export function modelReportFile(modelName: string): string {
  const slug = modelName
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9.-]+/g, '_');
  return `evaluation_${slug}.json`;
}

export function writeReport(path: string, report: EvaluationReport | ComparisonReport): void {
  writeFileSync(path, JSON.stringify(report, null, 2));
}

// Saved reports are validated down to every field the renderers read, so a
// hand-edited or stale file fails as a ConfigError rather than mid-render.
const score = z.number().finite();

const DimensionScoresSchema = z.object({
  completeness: score,
  professional_tone: score,
  safety: score,
  helpfulness: score,
  format: score,
  characteristics_match: score,
});

const DimensionAggregateSchema = z.object({ mean: score, min: score, max: score });

const AssessmentSchema = z.enum(['Excellent', 'Very Good', 'Good', 'Acceptable', 'Needs Improvement']);

const AggregateScoresSchema = z.object({
  completeness: DimensionAggregateSchema,
  professional_tone: DimensionAggregateSchema,
  safety: DimensionAggregateSchema,
  helpfulness: DimensionAggregateSchema,
  format: DimensionAggregateSchema,
  characteristics_match: DimensionAggregateSchema,
  overall: z.object({ mean: score, assessment: AssessmentSchema }),
});

const PromptResultSchema = z.object({
  scenario: z.string(),
  prompt: z.string(),
  response: z.string(),
  response_time: z.number(),
  scores: DimensionScoresSchema,
  expected_characteristics: z.array(z.string()),
  status: z.enum(['success', 'failed']),
  error: z.string().optional(),
});

const EvaluationResultSchema = z.object({
  use_case: z.string(),
  description: z.string(),
  model: z.string(),
  model_name: z.string().optional(),
  timestamp: z.string(),
  prompt_results: z.array(PromptResultSchema),
  aggregate_scores: AggregateScoresSchema,
  recommendation: z.string(),
});

const EvaluationReportSchema = z.object({
  evaluation_date: z.string(),
  total_use_cases_evaluated: z.number().int().nonnegative(),
  results: z.array(EvaluationResultSchema),
  summary: z
    .object({
      average_overall_score: score,
      best_use_case: z.string(),
      evaluation_count: z.number().int().nonnegative(),
    })
    .nullable(),
});

const RankedModelSchema = z.object({
  rank: z.number().int().positive(),
  model_name: z.string(),
  model_id: z.string(),
  overall_score: score,
  assessment: AssessmentSchema,
  recommendation: z.string(),
  nominal_cost_per_million_tokens: z.number().nullable(),
  dimension_scores: DimensionScoresSchema,
});

const ComparisonReportSchema = z.object({
  comparison_date: z.string(),
  use_case_comparisons: z.array(
    z.object({
      use_case: z.string(),
      best_model: z.string(),
      models: z.array(RankedModelSchema),
    }),
  ),
  summary: z.object({
    total_use_cases_compared: z.number().int().nonnegative(),
    model_wins: z.record(z.number().int().nonnegative()),
    overall_best_model: z.string().nullable(),
  }),
});

function issuesOf(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Could not read report at ${path}`, { cause: e });
  }
}

export function readEvaluationReport(path: string): EvaluationReport {
  const parsed = EvaluationReportSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new ConfigError(`${path} is not an evaluation report (${issuesOf(parsed.error)})`);
  }
  return parsed.data;
}

export function readComparisonReport(path: string): ComparisonReport {
  const parsed = ComparisonReportSchema.safeParse(readJson(path));
  if (!parsed.success) {
    throw new ConfigError(`${path} is not a model comparison report (${issuesOf(parsed.error)})`);
  }
  return parsed.data;
}
