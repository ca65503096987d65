import { describe, it, expect, vi } from 'vitest';
import {
  DIFFICULTIES,
  InstanceSchema,
  UnsatisfiableWorldError,
  WORLD_TYPES,
  WorldSchema,
  Logger,
  type World,
} from '@worldgrade/core';
import { generate, generateDataset, generateInstance, instanceId } from '../generate.js';
import { getDefaultPools, type EntityPools } from '../../pools/pools.js';
import { evaluateCheck } from '../../checks/evaluate-check.js';
import { renderPrompt } from '../../prompts/render.js';
import type { ParsedPlan } from '../../plan/plan.js';
import { solveFact } from '../../solvers/fact.js';
import { solveRecipe } from '../../solvers/recipe.js';
import { solveSchedule } from '../../solvers/schedule.js';
import { solveTravel } from '../../solvers/travel.js';

const logger = new Logger({ serviceName: 'generate-test', sink: () => undefined });

function solve(world: World): ParsedPlan | null {
  switch (world.world_type) {
    case 'travel':
      return solveTravel(world);
    case 'schedule':
      return solveSchedule(world);
    case 'fact':
      return solveFact(world);
    case 'recipe':
      return solveRecipe(world);
  }
}

describe('generate', () => {
  it('should be a pure function of its inputs', () => {
    for (const family of WORLD_TYPES) {
      const first = generate('w', 42, 'hard', family, { logger });
      const second = generate('w', 42, 'hard', family, { logger });
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    }
  });

  it('should vary with the seed', () => {
    const worlds = [1, 2, 3, 4, 5].map((seed) => JSON.stringify(generate('w', seed, 'medium', 'travel', { logger })));
    expect(new Set(worlds).size).toBeGreaterThan(1);
  });

  it('should keep the caller seed and the requested family', () => {
    const world = generate('schedule_000007_w', 7, 'easy', 'schedule', { logger });

    expect(world.world_id).toBe('schedule_000007_w');
    expect(world.world_type).toBe('schedule');
    expect(world.difficulty).toBe('easy');
    expect(world.seed).toBe(7);
  });

  describe('solvability', () => {
    for (const family of WORLD_TYPES) {
      for (const difficulty of DIFFICULTIES) {
        it(`should only emit ${difficulty} ${family} worlds the greedy solver satisfies`, () => {
          for (let seed = 0; seed < 8; seed++) {
            const world = generate(`${family}_w`, seed, difficulty, family, { logger });
            const plan = solve(world);

            expect(WorldSchema.safeParse(world).success).toBe(true);
            expect(world.constraints.length).toBeGreaterThan(0);
            expect(world.goals.length).toBeGreaterThan(0);
            expect(plan).not.toBeNull();
            if (plan === null) continue;
            for (const check of [...world.constraints, ...world.goals]) {
              expect(evaluateCheck(check.check, world, plan).satisfied, `${check.id} (seed ${seed})`).toBe(true);
            }
          }
        });
      }
    }
  });

  it('should log the attempt count of a generated world', () => {
    const spy = vi.spyOn(logger, 'worldGenerated');

    generate('fact_w', 3, 'easy', 'fact', { logger });

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy.mock.calls[0].slice(0, 3)).toEqual(['fact_w', 'fact', 'easy']);
  });

  it('should give up with UnsatisfiableWorldError after maxAttempts', () => {
    const defaults = getDefaultPools();
    const pools: EntityPools = {
      ...defaults,
      recipes: { ...defaults.recipes, calorie_limits: { easy: [1], medium: [1], hard: [1] } },
    };
    const resampled = vi.spyOn(logger, 'worldResampled');

    let caught: unknown;
    try {
      generate('recipe_w', 5, 'medium', 'recipe', { pools, maxAttempts: 3, logger });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnsatisfiableWorldError);
    if (!(caught instanceof UnsatisfiableWorldError)) return;
    expect(caught.attempts).toBe(3);
    expect(caught.context).toEqual({
      worldId: 'recipe_w',
      seed: 5,
      difficulty: 'medium',
      attempts: 3,
      lastReason: 'greedy solver found no plan',
    });
    expect(resampled.mock.calls.map((call) => call[1])).toEqual([1, 2, 3]);
  });

  it('should fail immediately when no attempts are allowed', () => {
    expect(() => generate('travel_w', 1, 'easy', 'travel', { maxAttempts: 0, logger })).toThrow(
      'No solvable travel world for travel_w (seed 1, easy) after 0 attempts'
    );
  });
});

describe('instanceId', () => {
  it('should zero-pad the index to six digits', () => {
    expect(instanceId('travel', 3)).toBe('travel_000003');
    expect(instanceId('recipe', 123456)).toBe('recipe_123456');
  });
});

describe('generateInstance', () => {
  it('should render both prompts from the generated world', () => {
    const instance = generateInstance('travel', 2, 11, 'medium', { logger });

    expect(InstanceSchema.safeParse(instance).success).toBe(true);
    expect(instance.instance_id).toBe('travel_000002');
    expect(instance.world.world_id).toBe('travel_000002_w');
    expect(instance.prompt_primary).toBe(renderPrompt(instance.world, 'ro'));
    expect(instance.prompt_secondary).toBe(renderPrompt(instance.world, 'en'));
  });
});

describe('generateDataset', () => {
  it('should seed each instance with baseSeed plus its index', () => {
    const instances = generateDataset({
      families: ['fact', 'schedule'],
      countPerFamily: 2,
      baseSeed: 100,
      difficulty: 'easy',
      logger,
    });

    expect(instances.map((i) => i.instance_id)).toEqual([
      'fact_000000',
      'fact_000001',
      'schedule_000000',
      'schedule_000001',
    ]);
    expect(instances.map((i) => i.world.seed)).toEqual([100, 101, 100, 101]);
    expect(JSON.stringify(instances[1].world)).toBe(
      JSON.stringify(generate('fact_000001_w', 101, 'easy', 'fact', { logger }))
    );
  });
});
