import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { UseCase } from './types.js';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('./data/use-cases.json', import.meta.url));

const PromptSpecSchema = z.object({
  scenario: z.string().min(1),
  prompt: z.string().min(1),
  expected_characteristics: z.array(z.string().min(1)).default([]),
});

const UseCaseMetadataSchema = z.object({
  typical_volume: z.string(),
  business_impact: z.string(),
  key_considerations: z.array(z.string()),
  integration_points: z.array(z.string()),
});

const UseCaseSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  test_prompts: z.array(PromptSpecSchema).min(1),
  metadata: UseCaseMetadataSchema.optional(),
});

const CatalogSchema = z.array(UseCaseSchema).min(1);

/**
 * Validate catalog data up front. Any malformed entry fails the whole
 * catalog, so no model call is made against a half-valid run.
 */
export function parseCatalog(data: unknown, source = 'catalog'): UseCase[] {
  const parsed = CatalogSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError(`Invalid use-case catalog in ${source}:\n  ${issues.join('\n  ')}`);
  }

  const seen = new Set<string>();
  for (const useCase of parsed.data) {
    if (seen.has(useCase.name)) {
      throw new ConfigError(`Invalid use-case catalog in ${source}: duplicate use case "${useCase.name}"`);
    }
    seen.add(useCase.name);
  }

  return parsed.data;
}

export function loadCatalog(path = DEFAULT_CATALOG_PATH): UseCase[] {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Could not read use-case catalog at ${path}`, { cause: e });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Use-case catalog at ${path} is not valid JSON`, { cause: e });
  }

  return parseCatalog(json, path);
}

export function findUseCase(useCases: UseCase[], name: string): UseCase | undefined {
  return useCases.find((uc) => uc.name === name);
}
