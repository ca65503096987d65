/**
 * Generator Types
 *
 * A family generator samples a world from its pool and knows how to solve
 * it greedily. The orchestrator in generate.ts re-samples until the solver's
 * plan passes every constraint and goal.
 *
 * @module @worldgrade/engine/generators/types
 */

import type { Check, CheckSpec, Difficulty, SeededRandom, World } from '@worldgrade/core';
import type { EntityPools } from '../pools/pools.js';
import type { ParsedPlan } from '../plan/plan.js';

export interface SampleInput {
  worldId: string;
  /** Caller's seed, stored on the world */
  seed: number;
  difficulty: Difficulty;
  /** Random source for this attempt */
  rng: SeededRandom;
  pools: EntityPools;
}

export interface FamilyGenerator<W extends World> {
  sample(input: SampleInput): W;
  /** Greedy reference plan, or null when the greedy pass gets stuck */
  solve(world: W): ParsedPlan | null;
}

export function defineCheck(id: string, native: string, secondary: string, check: CheckSpec): Check {
  return { id, description_native: native, description_secondary: secondary, check };
}

export function slotKeysGoal(keys: readonly string[]): Check {
  const list = keys.join(', ');
  return defineCheck(
    'G_SLOT_KEYS',
    `Planul folosește exact cheile: ${list}.`,
    `The plan uses exactly the keys: ${list}.`,
    { kind: 'slot_keys', params: { expected: [...keys] } }
  );
}

export function validReferencesGoal(native: string, secondary: string): Check {
  return defineCheck('G_VALID_IDS', native, secondary, { kind: 'valid_references', params: {} });
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
