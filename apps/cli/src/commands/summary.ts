/**
 * Summary Command
 *
 * Mean U/R/G/F over a score JSONL file, overall and per family.
 *
 * Usage:
 *   worldgrade summary --scores scores.jsonl
 */

import chalk from 'chalk';
import { toWorldgradeError } from '@worldgrade/core';
import { readScores, summarizeReports, type ScoreSummary, type ScoreSummaryRow } from '@worldgrade/engine';

export interface SummaryCommandOptions {
  scores: string;
  json?: boolean;
}

// =============================================================================
// Output Helpers
// =============================================================================

function formatRow(row: ScoreSummaryRow): string {
  const scores = [row.U, row.R, row.G, row.F].map((s) => s.toFixed(3).padStart(7)).join('');
  return `    ${row.family.padEnd(10)}${String(row.count).padStart(6)}${scores}`;
}

export function printSummary(summary: ScoreSummary): void {
  console.log();
  console.log(chalk.bold('  Scores'));
  console.log();
  console.log(chalk.dim(`    ${'family'.padEnd(10)}${'n'.padStart(6)}${['U', 'R', 'G', 'F'].map((h) => h.padStart(7)).join('')}`));
  for (const row of summary.families) {
    console.log(formatRow(row));
  }
  console.log(chalk.bold(formatRow(summary.overall)));
  console.log();
}

// =============================================================================
// Command
// =============================================================================

export async function summaryCommand(options: SummaryCommandOptions): Promise<void> {
  try {
    const summary = summarizeReports(readScores(options.scores));

    if (options.json) {
      console.log(JSON.stringify(summary));
    } else if (summary.overall.count === 0) {
      console.log();
      console.log(chalk.yellow(`  No scores found in ${options.scores}`));
      console.log();
    } else {
      printSummary(summary);
    }
  } catch (error) {
    const { message } = toWorldgradeError(error);
    if (options.json) {
      console.log(JSON.stringify({ status: 'error', error: message }));
    } else {
      console.error(chalk.red(`Error: ${message}`));
    }
    process.exit(1);
  }
}
