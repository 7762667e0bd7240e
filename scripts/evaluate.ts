import { createScoringBackend } from './backends.js';
import { loadCatalog } from './catalog.js';
import { parseArgs, runMain } from './cli.js';
import { createResponseClient } from './client.js';
import { getApiKey, getDefaultModel, loadConfig } from './config.js';
import { evaluateAll } from './pipeline.js';
import { resolveModel } from './providers/registry.js';
import { renderEvaluationSummary } from './render.js';
import { buildEvaluationReport, EVALUATION_REPORT_FILE, writeReport } from './report.js';

// Usage: npx tsx evaluate.ts [--catalog path] [--model name|id] [--output path] [--judge name|id]

async function main() {
  const args = parseArgs(process.argv.slice(2), ['catalog', 'model', 'output', 'judge']);

  // 1. Load and validate the catalog before any call is made
  const useCases = loadCatalog(args.options.catalog);

  // 2. Credential decides live or mock mode for the whole run
  const config = loadConfig();
  const apiKey = getApiKey(config);
  if (!apiKey) {
    console.log('\nNo AI_GATEWAY_API_KEY found in config or environment.');
    console.log('Running in MOCK MODE for demonstration purposes.\n');
    console.log('To run with real API calls:');
    console.log('  export AI_GATEWAY_API_KEY=your-key-here\n');
  } else {
    console.log('\nAPI key found. Running with live model calls via AI Gateway.\n');
  }

  const client = createResponseClient({
    apiKey,
    requestIntervalMs: config?.requestIntervalMs,
    maxRetries: config?.maxRetries,
    retryBackoffMs: config?.retryBackoffMs,
  });

  const model = args.options.model ? resolveModel(args.options.model) : getDefaultModel(config);

  const judge = args.options.judge ? resolveModel(args.options.judge) : undefined;
  const backend = createScoringBackend(client, judge?.modelId);
  if (judge && backend.name !== 'heuristic') {
    console.log(`Scoring with judge model: ${judge.name}`);
  }

  // 3. Run every use case in catalog order
  const startTime = Date.now();
  const results = await evaluateAll(useCases, model, { client, backend });

  // 4. Write the report
  const output = args.options.output ?? EVALUATION_REPORT_FILE;
  writeReport(output, buildEvaluationReport(results));

  for (const line of renderEvaluationSummary(results, useCases)) {
    console.log(line);
  }

  const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\nEvaluation complete in ${totalTime}s`);
  console.log(`Report written to ${output}`);
}

runMain(main, 'evaluate');
