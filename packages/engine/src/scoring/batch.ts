/**
 * Batch Evaluation and Summary
 *
 * Batch scoring is a plain map over (instance, output) pairs with no
 * ordering dependency. Outputs whose instance_id has no instance are
 * reported, not scored.
 *
 * @module @worldgrade/engine/scoring/batch
 */

import type { Instance, ModelOutputRecord } from '@worldgrade/core';
import { evaluate, type EvaluateOptions, type ScoreReport } from './evaluator.js';

export interface BatchResult {
  reports: ScoreReport[];
  /** instance_ids of outputs without a matching instance, in input order */
  unmatched: string[];
}

export function evaluateBatch(
  instances: readonly Instance[],
  outputs: readonly ModelOutputRecord[],
  options: EvaluateOptions
): BatchResult {
  const byId = new Map(instances.map((instance) => [instance.instance_id, instance]));
  const reports: ScoreReport[] = [];
  const unmatched: string[] = [];

  for (const output of outputs) {
    const instance = byId.get(output.instance_id);
    if (instance) {
      reports.push(evaluate(instance, output.output, options));
    } else {
      unmatched.push(output.instance_id);
    }
  }

  return { reports, unmatched };
}

// =============================================================================
// Summary
// =============================================================================

export type ScoredRecord = Pick<ScoreReport, 'instance_id' | 'U' | 'R' | 'G' | 'F'>;

export interface ScoreSummaryRow {
  family: string;
  count: number;
  U: number;
  R: number;
  G: number;
  F: number;
}

export interface ScoreSummary {
  overall: ScoreSummaryRow;
  families: ScoreSummaryRow[];
}

/**
 * Family prefix of an instance id: "travel_000003" -> "travel"
 */
export function familyOf(instanceId: string): string {
  const index = instanceId.indexOf('_');
  return index === -1 ? instanceId : instanceId.slice(0, index);
}

function meanRow(family: string, records: readonly ScoredRecord[]): ScoreSummaryRow {
  const count = records.length;
  const mean = (pick: (r: ScoredRecord) => number): number =>
    count === 0 ? 0 : records.reduce((sum, r) => sum + pick(r), 0) / count;
  return {
    family,
    count,
    U: mean((r) => r.U),
    R: mean((r) => r.R),
    G: mean((r) => r.G),
    F: mean((r) => r.F),
  };
}

/**
 * Mean U/R/G/F overall and per family (families sorted by name)
 */
export function summarizeReports(records: readonly ScoredRecord[]): ScoreSummary {
  const groups = new Map<string, ScoredRecord[]>();
  for (const record of records) {
    const family = familyOf(record.instance_id);
    const group = groups.get(family);
    if (group) group.push(record);
    else groups.set(family, [record]);
  }

  return {
    overall: meanRow('all', records),
    families: [...groups.keys()].sort().map((family) => meanRow(family, groups.get(family) ?? [])),
  };
}
