/**
 * JSON Lines Persistence
 *
 * Instances, model outputs and score reports are stored one JSON object
 * per line. Every line read back is validated with its zod schema; a bad
 * line raises InvalidRecordError with its 1-based line number. Blank
 * lines are skipped.
 *
 * @module @worldgrade/engine/io/jsonl
 */

import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import {
  InstanceSchema,
  InvalidRecordError,
  ModelOutputRecordSchema,
  formatIssues,
  type Instance,
  type ModelOutputRecord,
} from '@worldgrade/core';

// =============================================================================
// Record Schemas
// =============================================================================

const Score = z.number().min(0).max(1);

/**
 * The summary needs only the id and the four scores; detail fields pass through
 */
export const ScoreRecordSchema = z
  .object({
    instance_id: z.string().min(1),
    U: Score,
    R: Score,
    G: Score,
    F: Score,
  })
  .passthrough();

export type ScoreRecord = z.infer<typeof ScoreRecordSchema>;

// =============================================================================
// Codec
// =============================================================================

export function parseJsonLines<T>(content: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, source: string): T[] {
  const records: T[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((line, i) => {
    if (line.trim().length === 0) return;
    const lineNumber = i + 1;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidRecordError(`${source}:${lineNumber}: not valid JSON (${reason})`, { source, line: lineNumber });
    }

    const result = schema.safeParse(value);
    if (!result.success) {
      const issues = formatIssues(result.error.errors);
      throw new InvalidRecordError(`${source}:${lineNumber}: invalid record: ${issues.join('; ')}`, {
        source,
        line: lineNumber,
        issues,
      });
    }
    records.push(result.data);
  });

  return records;
}

export function formatJsonLines(records: readonly unknown[]): string {
  return records.map((record) => JSON.stringify(record)).join('\n') + (records.length > 0 ? '\n' : '');
}

// =============================================================================
// Files
// =============================================================================

export function readJsonLines<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return parseJsonLines(fs.readFileSync(filePath, 'utf-8'), schema, filePath);
}

export function writeJsonLines(filePath: string, records: readonly unknown[]): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, formatJsonLines(records), 'utf-8');
}

export function readInstances(filePath: string): Instance[] {
  return readJsonLines(filePath, InstanceSchema);
}

export function readOutputs(filePath: string): ModelOutputRecord[] {
  return readJsonLines(filePath, ModelOutputRecordSchema);
}

export function readScores(filePath: string): ScoreRecord[] {
  return readJsonLines(filePath, ScoreRecordSchema);
}
