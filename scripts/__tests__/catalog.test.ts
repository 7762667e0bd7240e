import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { findUseCase, loadCatalog, parseCatalog } from '../catalog.js';
import { ConfigError } from '../errors.js';

describe('loadCatalog', () => {
  it('loads the built-in catalog', () => {
    const useCases = loadCatalog();

    expect(useCases.map((uc) => uc.name)).toEqual([
      'Customer Support Automation',
      'Contract Analysis',
      'Data Extraction and Analysis',
      'Content Generation',
      'Code Documentation and Explanation',
    ]);
    for (const uc of useCases) {
      expect(uc.test_prompts).toHaveLength(5);
    }
    expect(useCases[0].test_prompts[0].scenario).toBe('Product return request');
    expect(useCases[1].metadata?.key_considerations).toEqual([
      'Accuracy critical',
      'Legal review still required',
      'Liability concerns',
    ]);
  });

  it('fails with ConfigError when the file is missing', () => {
    expect(() => loadCatalog('/nonexistent/use-cases.json')).toThrow(ConfigError);
  });

  it('fails with ConfigError when the file is not JSON', () => {
    const dir = mkdtempSync(join(tmpdir(), 'catalog-'));
    const path = join(dir, 'broken.json');
    writeFileSync(path, '[{ not json');

    expect(() => loadCatalog(path)).toThrow(/not valid JSON/);
  });
});

describe('parseCatalog', () => {
  it('fills defaults for optional fields', () => {
    const [useCase] = parseCatalog([
      { name: 'Triage', test_prompts: [{ scenario: 'One', prompt: 'Do the thing' }] },
    ]);

    expect(useCase).toEqual({
      name: 'Triage',
      description: '',
      test_prompts: [{ scenario: 'One', prompt: 'Do the thing', expected_characteristics: [] }],
    });
  });

  it('names the malformed field', () => {
    const data = [{ name: 'Triage', test_prompts: [{ scenario: 'One' }] }];

    expect(() => parseCatalog(data)).toThrow(ConfigError);
    expect(() => parseCatalog(data)).toThrow(/0\.test_prompts\.0\.prompt/);
  });

  it('rejects use cases without prompts', () => {
    expect(() => parseCatalog([{ name: 'Empty', test_prompts: [] }])).toThrow(ConfigError);
  });

  it('rejects an empty catalog', () => {
    expect(() => parseCatalog([])).toThrow(ConfigError);
  });

  it('rejects duplicate use-case names', () => {
    const prompt = { scenario: 'One', prompt: 'Do it' };
    expect(() =>
      parseCatalog([
        { name: 'Same', test_prompts: [prompt] },
        { name: 'Same', test_prompts: [prompt] },
      ]),
    ).toThrow(/duplicate use case "Same"/);
  });
});

describe('findUseCase', () => {
  it('matches by exact name', () => {
    const useCases = loadCatalog();
    expect(findUseCase(useCases, 'Contract Analysis')?.description).toContain('legal documents');
    expect(findUseCase(useCases, 'contract analysis')).toBeUndefined();
  });
});
