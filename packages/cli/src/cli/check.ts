import chalk from 'chalk';
import { SAMPLE_QUESTIONS, type CategorizationEngine } from '@quecat/core';
import { formatCheckRow, formatCheckSummary, summarizeCheck, type CheckRow } from './format.js';
import { withEngine, type EngineCommandOptions } from './engine.js';

/**
 * Categorize each sample question and pair it with the category it was
 * written for.
 */
export async function runSampleCheck(
  engine: CategorizationEngine,
  samples: Readonly<Record<string, string>> = SAMPLE_QUESTIONS
): Promise<CheckRow[]> {
  const entries = Object.entries(samples);
  const outcomes = await engine.categorizeMany(entries.map(([, question]) => question));

  return entries.map(([expected, question], i) => ({ question, expected, outcome: outcomes[i] }));
}

export async function checkCommand(options: EngineCommandOptions & { json?: boolean }): Promise<void> {
  await withEngine(options, async engine => {
    const rows = await runSampleCheck(engine);
    const summary = summarizeCheck(rows);

    if (options.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      console.log(chalk.bold('\nSample questions\n'));
      for (const row of rows) {
        console.log(formatCheckRow(row));
      }
      console.log();
      console.log(formatCheckSummary(summary).join('\n'));
    }

    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  });
}
