import { DIMENSIONS } from './types.js';
import type { ComparisonReport, Dimension, EvaluationResult, UseCase } from './types.js';

// Renderers return lines so callers decide where they go.

export function dimensionLabel(dim: Dimension): string {
  return dim
    .split('_')
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');
}

/** Ten-cell bar for a 0-5 score. */
export function scoreBar(score: number): string {
  const filled = Math.max(0, Math.min(10, Math.round(score * 2)));
  return '█'.repeat(filled) + '░'.repeat(10 - filled);
}

export function renderEvaluationSummary(results: EvaluationResult[], useCases: UseCase[] = []): string[] {
  const lines: string[] = [];
  lines.push('', '='.repeat(60), 'EVALUATION SUMMARY', '='.repeat(60), '');

  for (const result of results) {
    const overall = result.aggregate_scores.overall;
    const failed = result.prompt_results.filter((p) => p.status === 'failed').length;

    lines.push(`Use Case: ${result.use_case}`);
    lines.push(`Model: ${result.model_name ?? result.model}`);
    lines.push(`Overall Score: ${overall.mean}/5.0 (${overall.assessment})`);
    lines.push(`Recommendation: ${result.recommendation}`);
    lines.push(`Tests Run: ${result.prompt_results.length}${failed > 0 ? ` (${failed} failed)` : ''}`);
    lines.push('', 'Dimension Scores:');
    for (const dim of DIMENSIONS) {
      lines.push(`  • ${dimensionLabel(dim)}: ${result.aggregate_scores[dim].mean}/5.0`);
    }

    const considerations = useCases.find((uc) => uc.name === result.use_case)?.metadata?.key_considerations;
    if (considerations?.length) {
      lines.push('', `Key Considerations: ${considerations.join(', ')}`);
    }
    lines.push('', '-'.repeat(60), '');
  }

  return lines;
}

/** Use case × dimension table of means, with a bar for the overall score. */
export function renderDimensionTable(results: EvaluationResult[]): string[] {
  const header = ['Use Case', ...DIMENSIONS.map(dimensionLabel), 'Overall'];
  const lines = [`| ${header.join(' | ')} |`, `|${header.map(() => '---').join('|')}|`];

  for (const r of results) {
    const cells = [
      r.use_case,
      ...DIMENSIONS.map((d) => String(r.aggregate_scores[d].mean)),
      `${r.aggregate_scores.overall.mean} ${scoreBar(r.aggregate_scores.overall.mean)}`,
    ];
    lines.push(`| ${cells.join(' | ')} |`);
  }
  return lines;
}

export function renderComparisonSummary(report: ComparisonReport): string[] {
  const lines: string[] = [];
  lines.push('', '='.repeat(60), 'MODEL COMPARISON SUMMARY', '='.repeat(60), '');

  for (const comparison of report.use_case_comparisons) {
    lines.push(`Use Case: ${comparison.use_case}`);
    lines.push(`Best Model: ${comparison.best_model}`);
    lines.push('', 'Model Rankings:');

    for (const model of comparison.models) {
      const cost =
        model.nominal_cost_per_million_tokens === null ? 'n/a' : `$${model.nominal_cost_per_million_tokens}/M tokens`;
      lines.push(`  ${model.rank}. ${model.model_name} (${cost})`);
      lines.push(`     Score: ${model.overall_score}/5.0 (${model.assessment})`);
      lines.push(`     Recommendation: ${model.recommendation}`);
    }
    lines.push('', '-'.repeat(60), '');
  }

  const summary = report.summary;
  lines.push('OVERALL INSIGHTS:');
  lines.push(`  • Use cases evaluated: ${summary.total_use_cases_compared}`);
  lines.push(`  • Overall best performing model: ${summary.overall_best_model ?? 'none'}`);
  lines.push('', '  Model Win Count:');
  for (const [model, wins] of Object.entries(summary.model_wins)) {
    lines.push(`    • ${model}: ${wins} use case(s)`);
  }
  return lines;
}
