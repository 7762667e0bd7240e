import { parseArgs, runMain } from './cli.js';
import { ConfigError } from './errors.js';
import { renderComparisonSummary, renderDimensionTable, renderEvaluationSummary } from './render.js';
import {
  COMPARISON_REPORT_FILE,
  EVALUATION_REPORT_FILE,
  readComparisonReport,
  readEvaluationReport,
} from './report.js';

// Usage: npx tsx display.ts [summary|dimensions|comparison] [--file path]

async function main() {
  const args = parseArgs(process.argv.slice(2), ['file']);
  const mode = args.positionals[0] ?? 'summary';

  if (mode === 'comparison') {
    const report = readComparisonReport(args.options.file ?? COMPARISON_REPORT_FILE);
    for (const line of renderComparisonSummary(report)) {
      console.log(line);
    }
    return;
  }

  if (mode !== 'summary' && mode !== 'dimensions') {
    throw new ConfigError(`Unknown mode "${mode}". Use summary, dimensions or comparison.`);
  }

  const path = args.options.file ?? EVALUATION_REPORT_FILE;
  const report = readEvaluationReport(path);
  console.log(`\n# Evaluation of ${report.evaluation_date}`);
  console.log(`Use cases evaluated: ${report.total_use_cases_evaluated}`);
  if (report.summary) {
    console.log(`Average overall score: ${report.summary.average_overall_score}/5.0`);
    console.log(`Best use case: ${report.summary.best_use_case}`);
  }

  const lines = mode === 'dimensions' ? renderDimensionTable(report.results) : renderEvaluationSummary(report.results);
  console.log('');
  for (const line of lines) {
    console.log(line);
  }
}

runMain(main, 'display');
