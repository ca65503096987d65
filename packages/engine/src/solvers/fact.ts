/**
 * Fact Solver
 *
 * Answers with the context's answer for the asked fact.
 *
 * @module @worldgrade/engine/solvers/fact
 */

import type { FactWorld } from '@worldgrade/core';
import type { ParsedPlan } from '../plan/plan.js';

export function solveFact(world: FactWorld): ParsedPlan | null {
  const { facts, question } = world.payload;
  const fact = facts.find((f) => f.id === question.fact_id);
  return fact ? new Map([['answer', fact.context_answer]]) : null;
}
