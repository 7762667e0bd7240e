import { readFileSync, writeFileSync, mkdirSync, chmodSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { reportWarning } from './errors.js';
import { DEFAULT_MODEL, defaultCompareModels, resolveModel } from './providers/registry.js';
import type { ModelEntry } from './types.js';

const ModelEntrySchema = z.object({
  name: z.string().min(1),
  modelId: z.string().min(1),
});

export const MIN_COMPARE_MODELS = 2;
export const MAX_COMPARE_MODELS = 4;

// Report file names and win counts are keyed by model name
const CompareModelsSchema = z
  .array(ModelEntrySchema)
  .min(MIN_COMPARE_MODELS)
  .max(MAX_COMPARE_MODELS)
  .refine((models) => new Set(models.map((m) => m.name)).size === models.length, {
    message: 'model names must be unique',
  });

const EvaluatorConfigSchema = z.object({
  apiKey: z.string().optional(),
  defaultModel: z.string().optional(),
  compareModels: CompareModelsSchema.optional(),
  requestIntervalMs: z.number().int().nonnegative().optional(),
  maxRetries: z.number().int().nonnegative().max(10).optional(),
  retryBackoffMs: z.number().int().nonnegative().optional(),
});

export type EvaluatorConfig = z.infer<typeof EvaluatorConfigSchema>;

export function configPath(): string {
  return process.env.USECASE_EVAL_CONFIG ?? join(homedir(), '.config', 'usecase-eval', 'config.json');
}

/** Returns null when the file is absent; an invalid file is ignored with a warning. */
export function loadConfig(path = configPath()): EvaluatorConfig | null {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    reportWarning('Config file is not valid JSON; ignoring it', {
      context: 'config',
      path,
      reason: e instanceof Error ? e.message : String(e),
    });
    return null;
  }

  const parsed = EvaluatorConfigSchema.safeParse(json);
  if (!parsed.success) {
    reportWarning('Config file failed validation; ignoring it', {
      context: 'config',
      path,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }
  return parsed.data;
}

export function saveConfig(config: EvaluatorConfig, path = configPath()): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  writeFileSync(path, JSON.stringify(config, null, 2));
  chmodSync(path, 0o600);
}

export function getApiKey(config: EvaluatorConfig | null): string | null {
  if (config?.apiKey) {
    return config.apiKey;
  }
  return process.env.AI_GATEWAY_API_KEY || null;
}

export function getDefaultModel(config: EvaluatorConfig | null): ModelEntry {
  return resolveModel(config?.defaultModel ?? DEFAULT_MODEL);
}

export function getCompareModels(config: EvaluatorConfig | null): ModelEntry[] {
  if (config?.compareModels && config.compareModels.length >= MIN_COMPARE_MODELS) {
    return config.compareModels;
  }
  return defaultCompareModels();
}
