export const DIMENSIONS = [
  'completeness',
  'professional_tone',
  'safety',
  'helpfulness',
  'format',
  'characteristics_match',
] as const;

export type Dimension = (typeof DIMENSIONS)[number];

export type DimensionScores = Record<Dimension, number>;

export interface PromptSpec {
  scenario: string;
  prompt: string;
  expected_characteristics: string[];
}

export interface UseCaseMetadata {
  typical_volume: string;
  business_impact: string;
  key_considerations: string[];
  integration_points: string[];
}

export interface UseCase {
  name: string;
  description: string;
  test_prompts: PromptSpec[];
  metadata?: UseCaseMetadata;
}

export interface ModelEntry {
  name: string;
  modelId: string; // AI Gateway format: 'provider/model-id'
}

export interface PromptResult {
  scenario: string;
  prompt: string;
  response: string;
  response_time: number;
  scores: DimensionScores;
  expected_characteristics: string[];
  status: 'success' | 'failed';
  error?: string;
}

export interface DimensionAggregate {
  mean: number;
  min: number;
  max: number;
}

export type Assessment = 'Excellent' | 'Very Good' | 'Good' | 'Acceptable' | 'Needs Improvement';

export interface OverallAggregate {
  mean: number;
  assessment: Assessment;
}

export type AggregateScores = Record<Dimension, DimensionAggregate> & {
  overall: OverallAggregate;
};

export interface EvaluationResult {
  use_case: string;
  description: string;
  model: string;
  model_name?: string;
  timestamp: string;
  prompt_results: PromptResult[];
  aggregate_scores: AggregateScores;
  recommendation: string;
}

export interface ReportSummary {
  average_overall_score: number;
  best_use_case: string;
  evaluation_count: number;
}

export interface EvaluationReport {
  evaluation_date: string;
  total_use_cases_evaluated: number;
  results: EvaluationResult[];
  summary: ReportSummary | null;
}

export interface RankedModel {
  rank: number;
  model_name: string;
  model_id: string;
  overall_score: number;
  assessment: Assessment;
  recommendation: string;
  nominal_cost_per_million_tokens: number | null;
  dimension_scores: DimensionScores;
}

export interface UseCaseComparison {
  use_case: string;
  best_model: string;
  models: RankedModel[];
}

export interface ComparisonSummary {
  total_use_cases_compared: number;
  model_wins: Record<string, number>;
  overall_best_model: string | null;
}

export interface ComparisonReport {
  comparison_date: string;
  use_case_comparisons: UseCaseComparison[];
  summary: ComparisonSummary;
}
