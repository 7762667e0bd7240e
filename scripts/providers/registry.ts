import { createGateway } from '@ai-sdk/gateway';
import type { ModelEntry } from '../types.js';

// Model catalog across 3 providers, frontier + flash tiers.
// Model IDs use AI Gateway format: 'provider/model-id'.
// Prices are nominal list prices in USD per million tokens, used only to
// break ranking ties.

export interface PricedModel extends ModelEntry {
  price: { input: number; output: number };
}

export interface ModelGroup {
  provider: string;
  tier: 'frontier' | 'flash';
  models: PricedModel[];
}

export const MODEL_CATALOG: ModelGroup[] = [
  // ── Anthropic ──────────────────────────────────────────
  {
    provider: 'Anthropic',
    tier: 'frontier',
    models: [
      { name: 'opus-4.5', modelId: 'anthropic/claude-opus-4.5', price: { input: 5, output: 25 } },
      { name: 'sonnet-4.5', modelId: 'anthropic/claude-sonnet-4.5', price: { input: 3, output: 15 } },
      { name: 'sonnet-4', modelId: 'anthropic/claude-sonnet-4', price: { input: 3, output: 15 } },
    ],
  },
  {
    provider: 'Anthropic',
    tier: 'flash',
    models: [
      { name: 'haiku-4.5', modelId: 'anthropic/claude-haiku-4.5', price: { input: 1, output: 5 } },
      { name: 'haiku-3.5', modelId: 'anthropic/claude-3.5-haiku', price: { input: 0.8, output: 4 } },
    ],
  },
  // ── OpenAI ─────────────────────────────────────────────
  {
    provider: 'OpenAI',
    tier: 'frontier',
    models: [{ name: 'gpt-5', modelId: 'openai/gpt-5', price: { input: 1.25, output: 10 } }],
  },
  {
    provider: 'OpenAI',
    tier: 'flash',
    models: [
      { name: 'gpt-5-mini', modelId: 'openai/gpt-5-mini', price: { input: 0.25, output: 2 } },
      { name: 'gpt-4.1-mini', modelId: 'openai/gpt-4.1-mini', price: { input: 0.4, output: 1.6 } },
    ],
  },
  // ── Google ─────────────────────────────────────────────
  {
    provider: 'Google',
    tier: 'frontier',
    models: [{ name: 'gemini-2.5-pro', modelId: 'google/gemini-2.5-pro', price: { input: 1.25, output: 10 } }],
  },
  {
    provider: 'Google',
    tier: 'flash',
    models: [
      { name: 'gemini-2.5-flash', modelId: 'google/gemini-2.5-flash', price: { input: 0.3, output: 2.5 } },
    ],
  },
];

export const DEFAULT_MODEL = 'sonnet-4';

// Default comparison roster: the current Anthropic family
export const DEFAULT_COMPARE_SELECTION = ['sonnet-4.5', 'haiku-4.5', 'opus-4.5'];

// Flat list for lookups
const ALL_CATALOG_MODELS = MODEL_CATALOG.flatMap((g) => g.models);

export function findModel(nameOrId: string): PricedModel | undefined {
  return ALL_CATALOG_MODELS.find((m) => m.name === nameOrId || m.modelId === nameOrId);
}

/** Resolve a CLI argument to a model entry; unknown ids pass through as custom models. */
export function resolveModel(nameOrId: string): ModelEntry {
  const known = findModel(nameOrId);
  if (known) return { name: known.name, modelId: known.modelId };
  const name = nameOrId.split('/').pop() ?? nameOrId;
  return { name, modelId: nameOrId };
}

export function defaultCompareModels(): ModelEntry[] {
  return DEFAULT_COMPARE_SELECTION.map(resolveModel);
}

/** Blended input/output price per million tokens, or null for models outside the catalog. */
export function nominalCostPerMillion(modelId: string): number | null {
  const model = findModel(modelId);
  if (!model) return null;
  return (model.price.input + model.price.output) / 2;
}

export function createModelFactory(apiKey: string) {
  const gateway = createGateway({ apiKey });
  return (modelId: string) => gateway(modelId);
}
