import { MAX_COMPARE_MODELS, MIN_COMPARE_MODELS } from './config.js';
import { resolveModel } from './providers/registry.js';
import type { ModelEntry } from './types.js';

export type RosterChange = { ok: true; models: ModelEntry[]; changed: ModelEntry } | { ok: false; reason: string };

export function addToRoster(roster: ModelEntry[], nameOrId: string): RosterChange {
  const entry = resolveModel(nameOrId.trim());
  if (!entry.modelId.includes('/')) {
    return { ok: false, reason: 'Invalid format. Must be a catalog name or provider/model-id (e.g. xai/grok-3)' };
  }
  if (roster.some((m) => m.modelId === entry.modelId)) {
    return { ok: false, reason: `${entry.modelId} is already in the roster.` };
  }
  // Names key the per-model report files and the win counts
  const clash = roster.find((m) => m.name === entry.name);
  if (clash) {
    return { ok: false, reason: `A model named "${entry.name}" (${clash.modelId}) is already in the roster.` };
  }
  if (roster.length >= MAX_COMPARE_MODELS) {
    return { ok: false, reason: `Maximum ${MAX_COMPARE_MODELS} models. Remove one first.` };
  }
  return { ok: true, models: [...roster, entry], changed: entry };
}

export function removeFromRoster(roster: ModelEntry[], name: string): RosterChange {
  const idx = roster.findIndex((m) => m.name === name);
  if (idx === -1) {
    return { ok: false, reason: `"${name}" not found. Current: ${roster.map((m) => m.name).join(', ')}` };
  }
  if (roster.length <= MIN_COMPARE_MODELS) {
    return { ok: false, reason: `Cannot remove: minimum ${MIN_COMPARE_MODELS} models required.` };
  }
  return { ok: true, models: roster.filter((_, i) => i !== idx), changed: roster[idx] };
}
