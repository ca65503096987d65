/**
 * World Generation
 *
 * generate() is a pure function of (worldId, seed, difficulty, family):
 * the same inputs always give the same world. Each attempt samples with
 * its own derived seed, solves the world greedily and verifies the plan
 * against every constraint and goal. Worlds the greedy solver cannot
 * satisfy are re-sampled; after maxAttempts the generator gives up with
 * UnsatisfiableWorldError.
 *
 * Solvability is greedy feasibility, not exhaustive search.
 *
 * @module @worldgrade/engine/generators/generate
 */

import {
  DEFAULT_EVALUATION_CONFIG,
  SeededRandom,
  UnsatisfiableWorldError,
  deriveAttemptSeed,
  getLogger,
  type Difficulty,
  type Instance,
  type Logger,
  type World,
  type WorldType,
} from '@worldgrade/core';
import { evaluateCheck } from '../checks/evaluate-check.js';
import { getDefaultPools, type EntityPools } from '../pools/pools.js';
import type { ParsedPlan } from '../plan/plan.js';
import { renderPrompt } from '../prompts/render.js';
import { factGenerator } from './fact.js';
import { recipeGenerator } from './recipe.js';
import { scheduleGenerator } from './schedule.js';
import { travelGenerator } from './travel.js';
import type { FamilyGenerator, SampleInput } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface GenerateOptions {
  pools?: EntityPools;
  maxAttempts?: number;
  logger?: Logger;
}

export interface DatasetOptions extends GenerateOptions {
  families: readonly WorldType[];
  countPerFamily: number;
  baseSeed: number;
  difficulty: Difficulty;
}

interface Attempt {
  world: World;
  plan: ParsedPlan | null;
}

// =============================================================================
// Attempts
// =============================================================================

function run<W extends World>(generator: FamilyGenerator<W>, input: SampleInput): Attempt {
  const world = generator.sample(input);
  return { world, plan: generator.solve(world) };
}

function attempt(family: WorldType, input: SampleInput): Attempt {
  switch (family) {
    case 'travel':
      return run(travelGenerator, input);
    case 'schedule':
      return run(scheduleGenerator, input);
    case 'fact':
      return run(factGenerator, input);
    case 'recipe':
      return run(recipeGenerator, input);
  }
}

/**
 * First check the plan fails, as a re-sample reason; null when all pass
 */
function verify({ world, plan }: Attempt): string | null {
  if (plan === null) return 'greedy solver found no plan';
  for (const check of [...world.constraints, ...world.goals]) {
    const result = evaluateCheck(check.check, world, plan);
    if (!result.satisfied) return `${check.id}: ${result.detail}`;
  }
  return null;
}

// =============================================================================
// Public API
// =============================================================================

export function generate(
  worldId: string,
  seed: number,
  difficulty: Difficulty,
  family: WorldType,
  options: GenerateOptions = {}
): World {
  const pools = options.pools ?? getDefaultPools();
  const maxAttempts = options.maxAttempts ?? DEFAULT_EVALUATION_CONFIG.generation.maxAttempts;
  const logger = options.logger ?? getLogger();

  let lastReason = 'no attempts made';
  for (let k = 0; k < maxAttempts; k++) {
    const rng = new SeededRandom(deriveAttemptSeed(seed, k));
    const result = attempt(family, { worldId, seed, difficulty, rng, pools });
    const reason = verify(result);
    if (reason === null) {
      logger.worldGenerated(worldId, family, difficulty, k + 1);
      return result.world;
    }
    lastReason = reason;
    logger.worldResampled(worldId, k + 1, reason);
  }

  throw new UnsatisfiableWorldError(
    `No solvable ${family} world for ${worldId} (seed ${seed}, ${difficulty}) after ${maxAttempts} attempts`,
    { worldId, seed, difficulty, attempts: maxAttempts, lastReason }
  );
}

export function instanceId(family: WorldType, index: number): string {
  return `${family}_${String(index).padStart(6, '0')}`;
}

export function generateInstance(
  family: WorldType,
  index: number,
  seed: number,
  difficulty: Difficulty,
  options: GenerateOptions = {}
): Instance {
  const id = instanceId(family, index);
  const world = generate(`${id}_w`, seed, difficulty, family, options);
  return {
    instance_id: id,
    world,
    prompt_primary: renderPrompt(world, 'ro'),
    prompt_secondary: renderPrompt(world, 'en'),
  };
}

/**
 * countPerFamily instances per family, seeded baseSeed + index
 */
export function generateDataset(options: DatasetOptions): Instance[] {
  const instances: Instance[] = [];
  for (const family of options.families) {
    for (let index = 0; index < options.countPerFamily; index++) {
      instances.push(generateInstance(family, index, options.baseSeed + index, options.difficulty, options));
    }
  }
  return instances;
}
