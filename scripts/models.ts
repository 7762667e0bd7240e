import { parseArgs, runMain } from './cli.js';
import { configPath, getCompareModels, loadConfig, saveConfig } from './config.js';
import { ConfigError } from './errors.js';
import { MODEL_CATALOG, nominalCostPerMillion } from './providers/registry.js';
import { addToRoster, removeFromRoster } from './roster.js';
import type { RosterChange } from './roster.js';

// Usage: npx tsx models.ts [list | add <name|provider/model-id> | remove <name>]

function listModels() {
  console.log('\n  Model Catalog\n');
  let n = 1;
  let lastProvider = '';
  const allModels = MODEL_CATALOG.flatMap((g) => g.models);
  const maxNameLen = Math.max(...allModels.map((m) => m.name.length));
  const maxIdLen = Math.max(...allModels.map((m) => m.modelId.length));

  for (const group of MODEL_CATALOG) {
    if (group.provider !== lastProvider) {
      if (lastProvider) console.log('');
      console.log(`  ${group.provider}`);
      lastProvider = group.provider;
    }
    for (const model of group.models) {
      const name = model.name.padEnd(maxNameLen + 2);
      const id = model.modelId.padEnd(maxIdLen + 2);
      const cost = `$${model.price.input}/$${model.price.output} per M in/out`;
      console.log(`    ${String(n).padStart(2)}. ${name}${id}[${group.tier}]  ${cost}`);
      n++;
    }
  }

  const roster = getCompareModels(loadConfig());
  console.log(`\n  Comparison roster: ${roster.map((m) => m.name).join(', ')}`);
  const customs = roster.filter((m) => nominalCostPerMillion(m.modelId) === null);
  if (customs.length) {
    console.log(`  Custom (unpriced): ${customs.map((m) => `${m.name} (${m.modelId})`).join(', ')}`);
  }
  console.log();
}

function applyChange(change: RosterChange, verb: string) {
  if (!change.ok) {
    throw new ConfigError(change.reason);
  }
  const config = loadConfig() ?? {};
  saveConfig({ ...config, compareModels: change.models });
  console.log(`\n  ${verb}: ${change.changed.name} (${change.changed.modelId})`);
  console.log(`  Roster: ${change.models.map((m) => m.name).join(', ')}`);
  console.log(`  Config saved to ${configPath()}\n`);
}

async function main() {
  const { positionals } = parseArgs(process.argv.slice(2));
  const [command = 'list', target] = positionals;

  if (command === 'list') {
    listModels();
    return;
  }

  if (!target) {
    throw new ConfigError(`Usage: models ${command} <model>`);
  }

  const roster = getCompareModels(loadConfig());
  if (command === 'add') {
    applyChange(addToRoster(roster, target), 'Added');
    return;
  }
  if (command === 'remove') {
    applyChange(removeFromRoster(roster, target), 'Removed');
    return;
  }

  throw new ConfigError(`Unknown command "${command}". Use list, add or remove.`);
}

runMain(main, 'models');
