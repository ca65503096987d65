#!/usr/bin/env -S node --import tsx

/**
 * Worldgrade CLI
 *
 * Generates synthetic planning worlds and scores recorded model outputs
 * against them.
 *
 * Commands:
 *   worldgrade generate    Write benchmark instances to JSONL
 *   worldgrade evaluate    Score model outputs against instances
 *   worldgrade summary     Mean scores per family from a score file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { toWorldgradeError } from '@worldgrade/core';
import { generateCommand } from './commands/generate.js';
import { evaluateCommand } from './commands/evaluate.js';
import { summaryCommand } from './commands/summary.js';

const program = new Command();

program
  .name('worldgrade')
  .description('Synthetic-world benchmark: generate planning tasks and score model answers')
  .version('0.1.0');

function integer(value: string): number {
  return Number(value);
}

program
  .command('generate')
  .description('Generate benchmark instances')
  .option('-f, --family <family>', 'travel, schedule, fact, recipe, a comma list, or all', 'all')
  .option('-d, --difficulty <difficulty>', 'easy, medium or hard', 'medium')
  .option('-n, --count <n>', 'Instances per family', integer, 10)
  .option('-s, --seed <seed>', 'Base seed; instance i uses seed + i', integer, 0)
  .option('-o, --out <file>', 'Output JSONL file', 'instances.jsonl')
  .option('-c, --config <file>', 'Evaluation config YAML')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await generateCommand(options);
    } catch (error) {
      console.error(chalk.red('Error:'), toWorldgradeError(error).message);
      process.exit(1);
    }
  });

program
  .command('evaluate')
  .description('Score recorded model outputs against their instances')
  .requiredOption('-i, --instances <file>', 'Instance JSONL file')
  .requiredOption('-m, --outputs <file>', 'Model output JSONL file ({instance_id, output})')
  .option('-o, --out <file>', 'Score JSONL file', 'scores.jsonl')
  .option('-c, --config <file>', 'Evaluation config YAML')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await evaluateCommand(options);
    } catch (error) {
      console.error(chalk.red('Error:'), toWorldgradeError(error).message);
      process.exit(1);
    }
  });

program
  .command('summary')
  .description('Show mean U/R/G/F overall and per family')
  .requiredOption('-s, --scores <file>', 'Score JSONL file')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await summaryCommand(options);
    } catch (error) {
      console.error(chalk.red('Error:'), toWorldgradeError(error).message);
      process.exit(1);
    }
  });

program.addHelpText(
  'after',
  `
Scores:
  U  satisfied constraints / (constraints + format penalty)
  R  satisfied goals / goals
  G  Romanian language quality (diacritics, contamination, length)
  F  planned entities mentioned in the explanation

Environment:
  LOG_LEVEL           Minimum log severity (default: INFO)
  WORLDGRADE_SERVICE  Service name in log entries (default: worldgrade)
`
);

await program.parseAsync();
