/**
 * Understanding (U) and Reasoning (R)
 *
 *   U = satisfied constraints / (constraints + format_penalty)
 *   R = satisfied goals / goals
 *
 * format_penalty is 1 when non-whitespace text follows the plan. A null
 * plan fails every check. A zero denominator scores 0; generated worlds
 * always carry at least one constraint and one goal.
 *
 * @module @worldgrade/engine/scoring/scores
 */

import { diagnostic, type Check, type Diagnostic, type World } from '@worldgrade/core';
import { buildContext } from '../checks/helpers.js';
import { runCheck } from '../checks/evaluate-check.js';
import type { ParsedPlan } from '../plan/plan.js';

// =============================================================================
// Types
// =============================================================================

export interface CheckOutcome {
  id: string;
  kind: string;
  satisfied: boolean;
  detail: string;
  diagnostics?: Diagnostic[];
}

export interface CheckScoreDetail {
  satisfied: number;
  total: number;
  format_penalty?: number;
  results: CheckOutcome[];
}

export interface CheckRunOptions {
  /** Called when a check throws; the check is scored as failed */
  onAbsorbed?: (checkId: string, error: unknown) => void;
}

// =============================================================================
// Check runner
// =============================================================================

const NO_PLAN = 'No plan parsed';

/**
 * Run checks in order. Never throws.
 */
export function runChecks(
  checks: readonly Check[],
  world: World,
  plan: ParsedPlan | null,
  options: CheckRunOptions = {}
): CheckOutcome[] {
  if (plan === null) {
    return checks.map((check) => ({ id: check.id, kind: check.check.kind, satisfied: false, detail: NO_PLAN }));
  }

  const ctx = buildContext(world, plan);
  return checks.map((check) => {
    try {
      const result = runCheck(check.check, ctx);
      const outcome: CheckOutcome = {
        id: check.id,
        kind: check.check.kind,
        satisfied: result.satisfied,
        detail: result.detail,
      };
      if (result.diagnostics && result.diagnostics.length > 0) {
        outcome.diagnostics = result.diagnostics;
      }
      return outcome;
    } catch (error) {
      options.onAbsorbed?.(check.id, error);
      const message = error instanceof Error ? error.message : String(error);
      return {
        id: check.id,
        kind: check.check.kind,
        satisfied: false,
        detail: `Check raised: ${message}`,
        diagnostics: [diagnostic('CHECK_FAILED', message, { checkId: check.id })],
      };
    }
  });
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

// =============================================================================
// Scores
// =============================================================================

export function scoreUnderstanding(
  world: World,
  plan: ParsedPlan | null,
  formatViolation: boolean,
  options: CheckRunOptions = {}
): { U: number; detail: CheckScoreDetail } {
  const results = runChecks(world.constraints, world, plan, options);
  const satisfied = results.filter((r) => r.satisfied).length;
  const penalty = formatViolation ? 1 : 0;
  return {
    U: plan === null ? 0 : ratio(satisfied, results.length + penalty),
    detail: { satisfied, total: results.length, format_penalty: penalty, results },
  };
}

export function scoreReasoning(
  world: World,
  plan: ParsedPlan | null,
  options: CheckRunOptions = {}
): { R: number; detail: CheckScoreDetail } {
  const results = runChecks(world.goals, world, plan, options);
  const satisfied = results.filter((r) => r.satisfied).length;
  return {
    R: plan === null ? 0 : ratio(satisfied, results.length),
    detail: { satisfied, total: results.length, results },
  };
}
