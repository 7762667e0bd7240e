import { aggregate, recommend, round2 } from './aggregate.js';
import { heuristicBackend } from './backends.js';
import type { ScoringBackend } from './backends.js';
import type { ClientResponse, ResponseClient } from './client.js';
import { isCallFailure, reportError } from './errors.js';
import { emptyScores } from './scoring.js';
import type { EvaluationResult, ModelEntry, PromptResult, PromptSpec, UseCase } from './types.js';

export interface PipelineOptions {
  client: ResponseClient;
  backend?: ScoringBackend;
  /** Progress output; defaults to console.log */
  log?: (line: string) => void;
  /** Clock for result timestamps */
  now?: () => number;
}

// Failed prompts keep their slot with zero scores so aggregates stay computable.
// No call completed, so there is no response time to report.
function failedResult(testPrompt: PromptSpec, error: string): PromptResult {
  return {
    scenario: testPrompt.scenario,
    prompt: testPrompt.prompt,
    response: '',
    response_time: 0,
    scores: emptyScores(0),
    expected_characteristics: testPrompt.expected_characteristics,
    status: 'failed',
    error,
  };
}

export async function evaluateUseCase(
  useCase: UseCase,
  model: ModelEntry,
  options: PipelineOptions,
): Promise<EvaluationResult> {
  const { client } = options;
  const backend = options.backend ?? heuristicBackend();
  const log = options.log ?? console.log;
  const now = options.now ?? Date.now;

  log(`\n${'='.repeat(60)}`);
  log(`Evaluating Use Case: ${useCase.name}`);
  log(`Model: ${model.name} (${model.modelId})${client.mode === 'mock' ? ' [mock]' : ''}`);
  log(`${'='.repeat(60)}\n`);

  const promptResults: PromptResult[] = [];
  const total = useCase.test_prompts.length;

  for (const [idx, testPrompt] of useCase.test_prompts.entries()) {
    log(`  [${idx + 1}/${total}] ${testPrompt.scenario}`);

    let response: ClientResponse;
    try {
      response = await client.getResponse(testPrompt.prompt, model.modelId);
    } catch (e) {
      if (!isCallFailure(e)) throw e;
      reportError(e, {
        context: 'evaluate',
        use_case: useCase.name,
        scenario: testPrompt.scenario,
        model: model.modelId,
      });
      promptResults.push(failedResult(testPrompt, `${e.name}: ${e.message}`));
      continue;
    }

    const scores = await backend.score({
      response: response.text,
      scenario: testPrompt.scenario,
      expected: testPrompt.expected_characteristics,
    });

    promptResults.push({
      scenario: testPrompt.scenario,
      prompt: testPrompt.prompt,
      response: response.text,
      response_time: round2(response.durationMs / 1000),
      scores,
      expected_characteristics: testPrompt.expected_characteristics,
      status: 'success',
    });
  }

  const failed = promptResults.filter((r) => r.status === 'failed').length;
  if (failed > 0) {
    log(`  ${failed}/${total} prompt(s) failed and were scored 0`);
  }

  const aggregateScores = aggregate(promptResults);

  return {
    use_case: useCase.name,
    description: useCase.description,
    model: model.modelId,
    model_name: model.name,
    timestamp: new Date(now()).toISOString(),
    prompt_results: promptResults,
    aggregate_scores: aggregateScores,
    recommendation: recommend(aggregateScores.overall.assessment, useCase.name),
  };
}

/** Evaluate use cases one after another, in catalog order. */
export async function evaluateAll(
  useCases: UseCase[],
  model: ModelEntry,
  options: PipelineOptions,
): Promise<EvaluationResult[]> {
  const results: EvaluationResult[] = [];
  for (const useCase of useCases) {
    results.push(await evaluateUseCase(useCase, model, options));
  }
  return results;
}
