import { evaluateAll, evaluateUseCase } from './pipeline.js';
import type { PipelineOptions } from './pipeline.js';
import { nominalCostPerMillion } from './providers/registry.js';
import type {
  ComparisonReport,
  ComparisonSummary,
  DimensionScores,
  EvaluationResult,
  ModelEntry,
  RankedModel,
  UseCase,
  UseCaseComparison,
} from './types.js';

export interface CompareOptions extends PipelineOptions {
  /** Run models concurrently. Output order still follows the model list. */
  parallel?: boolean;
}

async function perModel<T>(
  models: ModelEntry[],
  parallel: boolean,
  run: (model: ModelEntry) => Promise<T>,
): Promise<T[]> {
  if (parallel) {
    return Promise.all(models.map(run));
  }
  const out: T[] = [];
  for (const model of models) {
    out.push(await run(model));
  }
  return out;
}

function dimensionMeans(result: EvaluationResult): DimensionScores {
  const scores = result.aggregate_scores;
  return {
    completeness: scores.completeness.mean,
    professional_tone: scores.professional_tone.mean,
    safety: scores.safety.mean,
    helpfulness: scores.helpfulness.mean,
    format: scores.format.mean,
    characteristics_match: scores.characteristics_match.mean,
  };
}

/**
 * Rank one use case's results: overall mean descending, then cheaper model
 * first. Models without a known price sort after priced ones on a tie.
 * The sort is stable, so anything still tied keeps its input order.
 */
export function rankResults(results: EvaluationResult[]): RankedModel[] {
  return results
    .map((result) => ({ result, cost: nominalCostPerMillion(result.model) }))
    .sort((a, b) => {
      const scoreA = a.result.aggregate_scores.overall.mean;
      const scoreB = b.result.aggregate_scores.overall.mean;
      if (scoreB !== scoreA) return scoreB - scoreA;
      const costA = a.cost ?? Infinity;
      const costB = b.cost ?? Infinity;
      if (costA === costB) return 0;
      return costA < costB ? -1 : 1;
    })
    .map(({ result, cost }, idx) => ({
      rank: idx + 1,
      model_name: result.model_name ?? result.model,
      model_id: result.model,
      overall_score: result.aggregate_scores.overall.mean,
      assessment: result.aggregate_scores.overall.assessment,
      recommendation: result.recommendation,
      nominal_cost_per_million_tokens: cost,
      dimension_scores: dimensionMeans(result),
    }));
}

export function toUseCaseComparison(useCase: string, results: EvaluationResult[]): UseCaseComparison {
  const models = rankResults(results);
  return {
    use_case: useCase,
    best_model: models[0]?.model_name ?? '',
    models,
  };
}

/** Run one use case against every model and rank them. */
export async function compareUseCase(
  useCase: UseCase,
  models: ModelEntry[],
  options: CompareOptions,
): Promise<UseCaseComparison> {
  const results = await perModel(models, options.parallel ?? false, (model) =>
    evaluateUseCase(useCase, model, options),
  );
  return toUseCaseComparison(useCase.name, results);
}

export function summarizeComparisons(comparisons: UseCaseComparison[]): ComparisonSummary {
  const modelWins: Record<string, number> = {};
  for (const c of comparisons) {
    if (!c.best_model) continue;
    modelWins[c.best_model] = (modelWins[c.best_model] ?? 0) + 1;
  }

  let overallBest: string | null = null;
  for (const [model, wins] of Object.entries(modelWins)) {
    if (overallBest === null || wins > modelWins[overallBest]) overallBest = model;
  }

  return {
    total_use_cases_compared: comparisons.length,
    model_wins: modelWins,
    overall_best_model: overallBest,
  };
}

export function buildComparisonReport(comparisons: UseCaseComparison[], date = new Date()): ComparisonReport {
  return {
    comparison_date: date.toISOString(),
    use_case_comparisons: comparisons,
    summary: summarizeComparisons(comparisons),
  };
}

export interface ComparisonRun {
  /** Every model's results, in model order; each list follows catalog order */
  byModel: { model: ModelEntry; results: EvaluationResult[] }[];
  report: ComparisonReport;
}

/**
 * Evaluate every use case with every model, then rank per use case. Each
 * model's run is sequential; with `parallel` the model runs overlap.
 */
export async function runComparison(
  useCases: UseCase[],
  models: ModelEntry[],
  options: CompareOptions,
): Promise<ComparisonRun> {
  const byModel = await perModel(models, options.parallel ?? false, async (model) => ({
    model,
    results: await evaluateAll(useCases, model, options),
  }));

  const comparisons = useCases.map((useCase, i) =>
    toUseCaseComparison(
      useCase.name,
      byModel.map((m) => m.results[i]),
    ),
  );

  return { byModel, report: buildComparisonReport(comparisons) };
}
