import { describe, expect, it } from 'vitest';
import { aggregate, recommend } from '../aggregate.js';
import { buildComparisonReport, toUseCaseComparison } from '../compare.js';
import {
  dimensionLabel,
  renderComparisonSummary,
  renderDimensionTable,
  renderEvaluationSummary,
  scoreBar,
} from '../render.js';
import { emptyScores } from '../scoring.js';
import type { EvaluationResult, PromptResult, UseCase } from '../types.js';

function evaluation(modelId: string, modelName: string, overall: number, prompts: PromptResult[] = []): EvaluationResult {
  const agg = aggregate([
    {
      scenario: 's',
      prompt: 'p',
      response: 'r',
      response_time: 0.5,
      scores: emptyScores(overall),
      expected_characteristics: [],
      status: 'success',
    },
  ]);
  return {
    use_case: 'Contract Analysis',
    description: '',
    model: modelId,
    model_name: modelName,
    timestamp: '2025-01-01T00:00:00.000Z',
    prompt_results: prompts,
    aggregate_scores: agg,
    recommendation: recommend(agg.overall.assessment, 'Contract Analysis'),
  };
}

describe('dimensionLabel', () => {
  it('title-cases dimension keys', () => {
    expect(dimensionLabel('characteristics_match')).toBe('Characteristics Match');
    expect(dimensionLabel('safety')).toBe('Safety');
  });
});

describe('scoreBar', () => {
  it('fills two cells per point', () => {
    expect(scoreBar(4.5)).toBe('█████████░');
    expect(scoreBar(0)).toBe('░░░░░░░░░░');
    expect(scoreBar(5)).toBe('██████████');
  });
});

describe('renderEvaluationSummary', () => {
  it('lists scores, failures and key considerations', () => {
    const failed: PromptResult = {
      scenario: 's',
      prompt: 'p',
      response: '',
      response_time: 0,
      scores: emptyScores(0),
      expected_characteristics: [],
      status: 'failed',
      error: 'TransportError: down',
    };
    const useCases: UseCase[] = [
      {
        name: 'Contract Analysis',
        description: '',
        test_prompts: [],
        metadata: {
          typical_volume: 'low',
          business_impact: 'high',
          key_considerations: ['accuracy', 'confidentiality'],
          integration_points: [],
        },
      },
    ];

    const lines = renderEvaluationSummary([evaluation('anthropic/claude-sonnet-4', 'sonnet-4', 4, [failed])], useCases);

    expect(lines).toContain('Model: sonnet-4');
    expect(lines).toContain('Overall Score: 4/5.0 (Very Good)');
    expect(lines).toContain('Tests Run: 1 (1 failed)');
    expect(lines).toContain('  • Professional Tone: 4/5.0');
    expect(lines).toContain('Key Considerations: accuracy, confidentiality');
  });
});

describe('renderDimensionTable', () => {
  it('writes one markdown row per use case', () => {
    const lines = renderDimensionTable([evaluation('anthropic/claude-sonnet-4', 'sonnet-4', 4)]);

    expect(lines[0]).toBe(
      '| Use Case | Completeness | Professional Tone | Safety | Helpfulness | Format | Characteristics Match | Overall |',
    );
    expect(lines[1]).toBe('|---|---|---|---|---|---|---|---|');
    expect(lines[2]).toBe('| Contract Analysis | 4 | 4 | 4 | 4 | 4 | 4 | 4 ████████░░ |');
  });
});

describe('renderComparisonSummary', () => {
  it('prints rankings with nominal cost', () => {
    const comparison = toUseCaseComparison('Contract Analysis', [
      evaluation('anthropic/claude-sonnet-4.5', 'sonnet-4.5', 4.5),
      evaluation('acme/custom', 'custom', 3),
    ]);
    const lines = renderComparisonSummary(buildComparisonReport([comparison], new Date(0)));

    expect(lines).toContain('Best Model: sonnet-4.5');
    expect(lines).toContain('  1. sonnet-4.5 ($9/M tokens)');
    expect(lines).toContain('     Score: 4.5/5.0 (Excellent)');
    expect(lines).toContain('  2. custom (n/a)');
    expect(lines).toContain('  • Overall best performing model: sonnet-4.5');
    expect(lines).toContain('    • sonnet-4.5: 1 use case(s)');
  });
});
