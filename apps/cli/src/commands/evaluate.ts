/**
 * Evaluate Command
 *
 * Scores recorded model outputs against their instances and writes one
 * score report per line. Outputs are joined to instances by instance_id;
 * an output without an instance is logged and skipped.
 *
 * Usage:
 *   worldgrade evaluate --instances instances.jsonl --outputs outputs.jsonl
 *   worldgrade evaluate --instances i.jsonl --outputs o.jsonl --config eval.yaml --out scores.jsonl
 */

import * as path from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { DEFAULT_EVALUATION_CONFIG, getLogger, loadEvaluationConfig, toWorldgradeError } from '@worldgrade/core';
import { getDefaultLexicons } from '@worldgrade/language';
import { evaluateBatch, readInstances, readOutputs, summarizeReports, writeJsonLines } from '@worldgrade/engine';
import { printSummary } from './summary.js';

export interface EvaluateCommandOptions {
  instances: string;
  outputs: string;
  /** Output file (default: scores.jsonl) */
  out?: string;
  /** Evaluation config YAML */
  config?: string;
  json?: boolean;
}

export async function evaluateCommand(options: EvaluateCommandOptions): Promise<void> {
  const spinner = ora({ isSilent: options.json });
  const logger = getLogger();

  try {
    const config = options.config ? loadEvaluationConfig(options.config) : DEFAULT_EVALUATION_CONFIG;
    const out = path.resolve(options.out ?? 'scores.jsonl');

    spinner.start('Loading instances and outputs...');
    const instances = readInstances(options.instances);
    const outputs = readOutputs(options.outputs);

    spinner.text = `Scoring ${outputs.length} output(s)...`;
    const { reports, unmatched } = evaluateBatch(instances, outputs, {
      config,
      lexicons: getDefaultLexicons(),
      logger,
    });

    for (const instanceId of unmatched) {
      logger.outputUnmatched(instanceId);
    }
    for (const report of reports) {
      logger.instanceEvaluated(report.instance_id, { U: report.U, R: report.R, G: report.G, F: report.F });
    }

    writeJsonLines(out, reports);
    spinner.succeed(`Scored ${reports.length} output(s), wrote ${out}`);

    const summary = summarizeReports(reports);
    if (options.json) {
      console.log(JSON.stringify({ status: 'ok', out, evaluated: reports.length, unmatched, summary }));
    } else {
      printSummary(summary);
      if (unmatched.length > 0) {
        console.log(chalk.yellow(`  Skipped ${unmatched.length} output(s) without an instance:`));
        for (const id of unmatched) {
          console.log(chalk.yellow(`    - ${id}`));
        }
        console.log();
      }
    }
  } catch (error) {
    spinner.fail('Evaluation failed');
    const { message } = toWorldgradeError(error);
    if (options.json) {
      console.log(JSON.stringify({ status: 'error', error: message }));
    } else {
      console.error(chalk.red(`Error: ${message}`));
    }
    process.exit(1);
  }
}
