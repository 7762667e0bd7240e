import { findUseCase, loadCatalog } from './catalog.js';
import { parseArgs, runMain } from './cli.js';
import { createResponseClient } from './client.js';
import { runComparison } from './compare.js';
import { getApiKey, getCompareModels, loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { renderComparisonSummary } from './render.js';
import { buildEvaluationReport, COMPARISON_REPORT_FILE, modelReportFile, writeReport } from './report.js';

// Usage: npx tsx compare-models.ts [use case name...] [--catalog path] [--parallel]

async function main() {
  const args = parseArgs(process.argv.slice(2), ['catalog']);

  let useCases = loadCatalog(args.options.catalog);

  // Optional positional words name a single use case
  const useCaseName = args.positionals.join(' ').trim();
  if (useCaseName) {
    const match = findUseCase(useCases, useCaseName);
    if (!match) {
      const available = useCases.map((uc) => uc.name).join(', ');
      throw new ConfigError(`Use case "${useCaseName}" not found. Available: ${available}`);
    }
    console.log(`\nEvaluating specific use case: ${useCaseName}\n`);
    useCases = [match];
  }

  const config = loadConfig();
  const apiKey = getApiKey(config);
  if (!apiKey) {
    console.log('\nNo AI_GATEWAY_API_KEY found.');
    console.log('Running in MOCK MODE for demonstration.\n');
  }

  const client = createResponseClient({
    apiKey,
    requestIntervalMs: config?.requestIntervalMs,
    maxRetries: config?.maxRetries,
    retryBackoffMs: config?.retryBackoffMs,
  });

  const models = getCompareModels(config);
  const parallel = args.flags.has('parallel');
  console.log(`Comparing ${models.length} models: ${models.map((m) => m.name).join(', ')}`);
  if (parallel) console.log('Model runs will overlap (--parallel).');

  const startTime = Date.now();
  const { byModel, report } = await runComparison(useCases, models, { client, parallel });

  // Per-model detail reports, then the side-by-side comparison
  const written: string[] = [];
  for (const { model, results } of byModel) {
    const file = modelReportFile(model.name);
    writeReport(file, buildEvaluationReport(results));
    written.push(`${file} - ${model.name} detailed results`);
  }
  writeReport(COMPARISON_REPORT_FILE, report);

  for (const line of renderComparisonSummary(report)) {
    console.log(line);
  }

  const totalTime = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\nModel comparison complete in ${totalTime}s`);
  console.log('\nGenerated files:');
  console.log(`  • ${COMPARISON_REPORT_FILE} - Side-by-side comparison`);
  for (const line of written) {
    console.log(`  • ${line}`);
  }
}

runMain(main, 'compare-models');
