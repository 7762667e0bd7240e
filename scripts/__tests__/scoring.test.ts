import { describe, expect, it } from 'vitest';
import { DEFAULT_HEURISTICS, applyHeuristic, clampScore, scoreResponse } from '../scoring.js';
import { DIMENSIONS } from '../types.js';

describe('scoreResponse', () => {
  it('gives an empty response the minimum completeness', () => {
    const scores = scoreResponse('', 'Billing inquiry', []);

    expect(scores).toEqual({
      completeness: 1,
      professional_tone: 3,
      safety: 5,
      helpfulness: 3.5,
      format: 3,
      characteristics_match: 4,
    });
  });

  it('scores characteristics_match at the maximum when every expectation appears', () => {
    const response = 'We respond with EMPATHY and clear steps, plus policy information. Helpful!';
    const scores = scoreResponse(response, 'Product return request', [
      'empathy',
      'clear steps',
      'policy information',
      'helpful',
    ]);

    expect(scores.characteristics_match).toBe(5);
  });

  it('scales characteristics_match with the fraction matched and never drops below 1', () => {
    expect(scoreResponse('calm and patient', 's', ['calm', 'specific', 'technical', 'patient']).characteristics_match).toBe(2.5);
    expect(scoreResponse('nothing relevant', 's', ['calm', 'specific']).characteristics_match).toBe(1);
  });

  it('maps response length onto completeness bands', () => {
    expect(scoreResponse('a'.repeat(50), 's', []).completeness).toBe(2);
    expect(scoreResponse('a'.repeat(51), 's', []).completeness).toBe(3.5);
    expect(scoreResponse('a'.repeat(200), 's', []).completeness).toBe(3.5);
    expect(scoreResponse('a'.repeat(201), 's', []).completeness).toBe(4.5);
  });

  it('treats error placeholders as incomplete regardless of length', () => {
    const response = `[Error] Failed to get response: ${'x'.repeat(300)}`;
    expect(scoreResponse(response, 's', []).completeness).toBe(2);
  });

  it('adjusts professional tone up and down from the baseline', () => {
    expect(scoreResponse('Thank you for waiting', 's', []).professional_tone).toBe(4);
    expect(scoreResponse('yeah gonna fix it', 's', []).professional_tone).toBe(2);
    expect(scoreResponse('Could you please check, yeah', 's', []).professional_tone).toBe(3);
  });

  it('flags unsafe wording', () => {
    expect(scoreResponse('That would be illegal.', 's', []).safety).toBe(2);
    expect(scoreResponse('All good.', 's', []).safety).toBe(5);
  });

  it('rewards actionable wording and structure', () => {
    const scores = scoreResponse('Here are the steps', 's', []);
    expect(scores.helpfulness).toBe(4.5);
    expect(scores.format).toBe(3);
    expect(scoreResponse('Line one\nline two', 's', []).format).toBe(4);
  });

  it('is deterministic and stays within 1-5 for any response', () => {
    const responses = [
      '',
      'ok',
      'yeah totally gonna wanna hack',
      'Please find the following steps here.\n1. Restart\n2. Reinstall',
      'x'.repeat(5000),
    ];
    for (const r of responses) {
      const first = scoreResponse(r, 'scenario', ['restart', 'steps']);
      const second = scoreResponse(r, 'scenario', ['restart', 'steps']);
      expect(second).toEqual(first);
      for (const dim of DIMENSIONS) {
        expect(first[dim]).toBeGreaterThanOrEqual(1);
        expect(first[dim]).toBeLessThanOrEqual(5);
      }
    }
  });

  it('scores dimensions missing from a custom heuristic set at the minimum', () => {
    const onlyCompleteness = DEFAULT_HEURISTICS.filter((h) => h.dimension === 'completeness');
    const scores = scoreResponse('a'.repeat(300), 's', [], onlyCompleteness);

    expect(scores.completeness).toBe(4.5);
    expect(scores.safety).toBe(1);
    expect(scores.characteristics_match).toBe(1);
  });
});

describe('applyHeuristic', () => {
  it('clamps out-of-range configured scores', () => {
    const score = applyHeuristic(
      { kind: 'keywords', dimension: 'helpfulness', baseline: 4.5, adjustments: [{ words: ['steps'], delta: 2 }] },
      { response: 'steps', scenario: 's', expected: [] },
    );
    expect(score).toBe(5);
  });
});

describe('clampScore', () => {
  it('bounds values to 1-5', () => {
    expect(clampScore(-3)).toBe(1);
    expect(clampScore(3.2)).toBe(3.2);
    expect(clampScore(9)).toBe(5);
  });
});
