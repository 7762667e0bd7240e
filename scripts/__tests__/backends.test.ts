import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  buildJudgePrompt,
  createScoringBackend,
  heuristicBackend,
  judgeBackend,
  parseJudgeScores,
} from '../backends.js';
import { MockResponseClient } from '../client.js';
import type { ResponseClient } from '../client.js';
import { TransportError } from '../errors.js';
import { scoreResponse } from '../scoring.js';

function fixedClient(reply: string | Error): ResponseClient & { prompts: string[]; models: string[] } {
  const prompts: string[] = [];
  const models: string[] = [];
  return {
    mode: 'live',
    prompts,
    models,
    async getResponse(prompt, modelId) {
      prompts.push(prompt);
      models.push(modelId);
      if (reply instanceof Error) throw reply;
      return { text: reply, durationMs: 10 };
    },
  };
}

const input = {
  response: 'Here are the steps to return your laptop.',
  scenario: 'Product return request',
  expected: ['steps', 'refund'],
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseJudgeScores', () => {
  it('reads a bare JSON object', () => {
    expect(parseJudgeScores('{"completeness": 4, "safety": 5}')).toEqual({ completeness: 4, safety: 5 });
  });

  it('strips markdown fences and surrounding prose', () => {
    const text = 'Sure, here you go:\n```json\n{"helpfulness": 3.5, "format": 4}\n```\nHope that helps.';
    expect(parseJudgeScores(text)).toEqual({ helpfulness: 3.5, format: 4 });
  });

  it('clamps out-of-range scores', () => {
    expect(parseJudgeScores('{"completeness": 7, "format": 0}')).toEqual({ completeness: 5, format: 1 });
  });

  it('returns null for unreadable replies', () => {
    expect(parseJudgeScores('I cannot grade this.')).toBeNull();
    expect(parseJudgeScores('{"completeness": "high"}')).toBeNull();
    expect(parseJudgeScores('{completeness: 4}')).toBeNull();
  });
});

describe('buildJudgePrompt', () => {
  it('includes the scenario, expectations and response', () => {
    const prompt = buildJudgePrompt(input);

    expect(prompt).toContain('## Scenario\nProduct return request');
    expect(prompt).toContain('## Expected Characteristics\nsteps, refund');
    expect(prompt).toContain('## Response to Grade\nHere are the steps to return your laptop.');
  });

  it('marks empty responses and missing expectations', () => {
    const prompt = buildJudgePrompt({ response: '', scenario: 's', expected: [] });

    expect(prompt).toContain('## Expected Characteristics\nNone specified.');
    expect(prompt).toContain('## Response to Grade\n(empty response)');
  });
});

describe('heuristicBackend', () => {
  it('matches scoreResponse', async () => {
    const scores = await heuristicBackend().score(input);
    expect(scores).toEqual(scoreResponse(input.response, input.scenario, input.expected));
  });
});

describe('judgeBackend', () => {
  it('overrides heuristic scores with the dimensions the judge returns', async () => {
    const client = fixedClient('{"completeness": 2, "characteristics_match": 4.5}');
    const backend = judgeBackend(client, 'openai/gpt-5');

    const scores = await backend.score(input);
    const heuristic = scoreResponse(input.response, input.scenario, input.expected);

    expect(backend.name).toBe('judge:openai/gpt-5');
    expect(client.models).toEqual(['openai/gpt-5']);
    expect(scores).toEqual({ ...heuristic, completeness: 2, characteristics_match: 4.5 });
  });

  it('falls back to heuristic scores when the reply is unreadable', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const scores = await judgeBackend(fixedClient('no idea'), 'openai/gpt-5').score(input);

    expect(scores).toEqual(scoreResponse(input.response, input.scenario, input.expected));
  });

  it('falls back to heuristic scores when the judge call fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const scores = await judgeBackend(fixedClient(new TransportError('down')), 'openai/gpt-5').score(input);

    expect(scores).toEqual(scoreResponse(input.response, input.scenario, input.expected));
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('lets errors other than call failures surface', async () => {
    const backend = judgeBackend(fixedClient(new TypeError('bad client')), 'openai/gpt-5');
    await expect(backend.score(input)).rejects.toThrow(TypeError);
  });
});

describe('createScoringBackend', () => {
  it('uses heuristics when no judge is named', () => {
    expect(createScoringBackend(fixedClient('{}')).name).toBe('heuristic');
  });

  it('uses the judge with a live client', () => {
    expect(createScoringBackend(fixedClient('{}'), 'openai/gpt-5').name).toBe('judge:openai/gpt-5');
  });

  it('skips the judge in mock mode with a single warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const backend = createScoringBackend(new MockResponseClient(), 'openai/gpt-5');

    expect(backend.name).toBe('heuristic');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
