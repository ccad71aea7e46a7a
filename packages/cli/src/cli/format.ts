import chalk from 'chalk';
import {
  isErr,
  type Category,
  type CategorizationError,
  type ClassificationResult,
  type Result,
} from '@quecat/core';

export interface CheckRow {
  question: string;
  /** Category the sample question was written for */
  expected: string;
  outcome: Result<ClassificationResult, CategorizationError>;
}

export interface CheckSummary {
  total: number;
  failed: number;
  matched: number;
  highSimilarity: number;
  /** Mean confidence over the questions that were categorized */
  averageConfidence: number;
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function colorConfidence(result: ClassificationResult): string {
  const text = formatPercent(result.confidence);
  if (result.isHighSimilarity) return chalk.green(text);
  return result.confidence >= 0.4 ? chalk.yellow(text) : chalk.red(text);
}

/**
 * Human-readable rendering of one classification: the winner, then every
 * category's similarity from best to worst.
 */
export function formatResult(question: string, result: ClassificationResult): string[] {
  const lines = [
    `${chalk.bold('Question:')}   ${question}`,
    `${chalk.bold('Category:')}   ${result.displayName} ${chalk.dim(`(${result.categoryId})`)}`,
    `${chalk.bold('Confidence:')} ${colorConfidence(result)}${result.isHighSimilarity ? chalk.dim(' · high similarity') : ''}`,
    '',
    chalk.bold('Similarities:'),
  ];

  const entries = [...result.similarities];
  const width = Math.max(...entries.map(([id]) => id.length));
  // Stable sort keeps canonical order among equal scores
  for (const [id, score] of entries.sort((a, b) => b[1] - a[1])) {
    const marker = id === result.categoryId ? chalk.cyan('›') : ' ';
    lines.push(`  ${marker} ${id.padEnd(width)}  ${score.toFixed(3)}`);
  }

  return lines;
}

export function formatCategories(categories: readonly Category[]): string[] {
  const width = Math.max(...categories.map(category => category.id.length));
  return categories.map(
    category =>
      `  ${chalk.cyan(category.id.padEnd(width))}  ${category.displayName} ${chalk.dim(
        `(${category.examples.length} example${category.examples.length === 1 ? '' : 's'})`
      )}`
  );
}

export function summarizeCheck(rows: readonly CheckRow[]): CheckSummary {
  let failed = 0;
  let matched = 0;
  let highSimilarity = 0;
  let confidenceSum = 0;

  for (const row of rows) {
    if (isErr(row.outcome)) {
      failed++;
      continue;
    }
    const result = row.outcome.value;
    confidenceSum += result.confidence;
    if (result.categoryId === row.expected) matched++;
    if (result.isHighSimilarity) highSimilarity++;
  }

  const succeeded = rows.length - failed;
  return {
    total: rows.length,
    failed,
    matched,
    highSimilarity,
    averageConfidence: succeeded === 0 ? 0 : confidenceSum / succeeded,
  };
}

export function formatCheckRow(row: CheckRow): string {
  if (isErr(row.outcome)) {
    return `${chalk.red('✗')} ${row.question} ${chalk.red(row.outcome.error.message)}`;
  }
  const result = row.outcome.value;
  const mark = result.categoryId === row.expected ? chalk.green('✓') : chalk.yellow('≠');
  return `${mark} ${row.question} ${chalk.dim('→')} ${result.categoryId} ${chalk.dim(formatPercent(result.confidence))}`;
}

export function formatCheckSummary(summary: CheckSummary): string[] {
  const share = summary.total === 0 ? 0 : summary.highSimilarity / summary.total;
  const lines = [
    `Questions:          ${summary.total}`,
    `Matched expected:   ${summary.matched}/${summary.total}`,
    `High similarity:    ${summary.highSimilarity}/${summary.total} (${formatPercent(share)})`,
    `Average confidence: ${formatPercent(summary.averageConfidence)}`,
  ];
  if (summary.failed > 0) {
    lines.push(chalk.red(`Failed:             ${summary.failed}`));
  }
  return lines;
}
