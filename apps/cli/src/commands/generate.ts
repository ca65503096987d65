/**
 * Generate Command
 *
 * Writes a JSONL file of benchmark instances: `count` worlds per family,
 * the i-th seeded `seed + i`, each with its Romanian and English prompt.
 *
 * Usage:
 *   worldgrade generate --family travel --difficulty hard --count 50
 *   worldgrade generate --family all --seed 1000 --out data/instances.jsonl
 */

import * as path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import {
  DEFAULT_EVALUATION_CONFIG,
  WORLD_TYPES,
  isDifficulty,
  isWorldType,
  loadEvaluationConfig,
  toWorldgradeError,
  type WorldType,
} from '@worldgrade/core';
import { generateDataset, writeJsonLines } from '@worldgrade/engine';

// =============================================================================
// Types
// =============================================================================

export interface GenerateCommandOptions {
  /** A family name or "all" */
  family: string;
  difficulty: string;
  /** Instances per family */
  count: number;
  /** Base seed */
  seed: number;
  /** Output file (default: instances.jsonl) */
  out?: string;
  /** Evaluation config YAML; only generation.maxAttempts is read */
  config?: string;
  json?: boolean;
}

// =============================================================================
// Option Parsing
// =============================================================================

export function parseFamilies(value: string): WorldType[] {
  if (value === 'all') {
    return [...WORLD_TYPES];
  }

  const families: WorldType[] = [];
  for (const name of value.split(',').map((v) => v.trim())) {
    if (!isWorldType(name)) {
      throw new Error(`Unknown family "${name}" (expected all or ${WORLD_TYPES.join(', ')})`);
    }
    if (!families.includes(name)) families.push(name);
  }
  return families;
}

function requireInteger(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`--${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

// =============================================================================
// Command
// =============================================================================

export async function generateCommand(options: GenerateCommandOptions): Promise<void> {
  const spinner = ora({ isSilent: options.json });

  try {
    const families = parseFamilies(options.family);
    const { difficulty } = options;
    if (!isDifficulty(difficulty)) {
      throw new Error(`Unknown difficulty "${difficulty}" (expected easy, medium or hard)`);
    }
    const count = requireInteger('count', options.count, 1);
    const seed = requireInteger('seed', options.seed, 0);
    const config = options.config ? loadEvaluationConfig(options.config) : DEFAULT_EVALUATION_CONFIG;
    const out = path.resolve(options.out ?? 'instances.jsonl');

    spinner.start(`Generating ${count * families.length} ${difficulty} instance(s)...`);

    const instances = generateDataset({
      families,
      countPerFamily: count,
      baseSeed: seed,
      difficulty,
      maxAttempts: config.generation.maxAttempts,
    });
    writeJsonLines(out, instances);

    spinner.succeed(`Wrote ${instances.length} instance(s) to ${out}`);

    if (options.json) {
      console.log(
        JSON.stringify({
          status: 'ok',
          out,
          difficulty,
          seed,
          families: Object.fromEntries(families.map((f) => [f, count])),
          instances: instances.length,
        })
      );
    } else {
      console.log();
      console.log(chalk.bold('  Generated Instances'));
      console.log(chalk.dim(`  ${out}`));
      console.log();
      for (const family of families) {
        console.log(`    ${chalk.cyan(family.padEnd(10))} ${count}`);
      }
      console.log();
      console.log(chalk.dim(`  Difficulty: ${difficulty}, seeds ${seed}..${seed + count - 1}`));
      console.log();
    }
  } catch (error) {
    spinner.fail('Generation failed');
    const { message } = toWorldgradeError(error);
    if (options.json) {
      console.log(JSON.stringify({ status: 'error', error: message }));
    } else {
      console.error(chalk.red(`Error: ${message}`));
    }
    process.exit(1);
  }
}
