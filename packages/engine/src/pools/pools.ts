/**
 * Entity Pools
 *
 * Fixed source data the generators sample from: cities and attractions,
 * appointment types, facts with their misbeliefs, dishes per meal. Read
 * from `packages/engine/data/*.json` once, validated with zod and frozen.
 *
 * @module @worldgrade/engine/pools
 */

import { z } from 'zod';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError, formatIssues } from '@worldgrade/core';

// ============================================================================
// Zod Schemas
// ============================================================================

const Bilingual = z.object({
  native: z.string().min(1),
  secondary: z.string().min(1),
});

export const TravelPoolSchema = z.object({
  description: z.string().optional(),
  types: z.record(
    z.object({
      secondary: z.string(),
      plural_native: z.string(),
      plural_secondary: z.string(),
    })
  ),
  cities: z
    .array(
      z.object({
        name: z.string().min(1),
        name_secondary: z.string().min(1),
        attractions: z
          .array(
            z.object({
              name: z.string().min(1),
              name_secondary: z.string().min(1),
              type: z.string().min(1),
              indoor: z.boolean(),
              family_friendly: z.boolean(),
              duration_hours: z.number().positive(),
              cost: z.number().min(0),
            })
          )
          .min(4),
      })
    )
    .min(1),
});

export const SchedulePoolSchema = z.object({
  description: z.string().optional(),
  days: z.array(Bilingual).min(3),
  slots: z.array(Bilingual).length(2),
  priorities: z.array(Bilingual.extend({ value: z.enum(['high', 'medium', 'low']) })).length(3),
  appointments: z.array(z.object({ name: z.string().min(1), name_secondary: z.string().min(1) })).min(5),
});

export const FactPoolSchema = z.object({
  description: z.string().optional(),
  facts: z
    .array(
      z.object({
        key: z.string().min(1),
        question_native: z.string().min(1),
        question_secondary: z.string().min(1),
        answer: z.string().min(1),
        answer_secondary: z.string().min(1),
        misbelief: z.string().min(1),
        misbelief_secondary: z.string().min(1),
      })
    )
    .min(6),
});

const CalorieLimits = z.array(z.number().int().positive()).min(1);

export const RecipePoolSchema = z.object({
  description: z.string().optional(),
  calorie_limits: z.object({ easy: CalorieLimits, medium: CalorieLimits, hard: CalorieLimits }),
  meals: z
    .array(
      Bilingual.extend({
        key: z.string().regex(/^[a-z_]+$/),
        dishes: z
          .array(
            z.object({
              name: z.string().min(1),
              name_secondary: z.string().min(1),
              vegetarian: z.boolean(),
              vegan: z.boolean(),
              contains_gluten: z.boolean(),
              contains_lactose: z.boolean(),
              prep_minutes: z.number().int().positive(),
              calories: z.number().int().positive(),
            })
          )
          .min(3),
      })
    )
    .min(1),
  restrictions: z
    .array(
      z.object({
        key: z.string(),
        attribute: z.string(),
        expected: z.boolean(),
        description_native: z.string(),
        description_secondary: z.string(),
      })
    )
    .min(2),
});

export type TravelPool = z.infer<typeof TravelPoolSchema>;
export type SchedulePool = z.infer<typeof SchedulePoolSchema>;
export type FactPool = z.infer<typeof FactPoolSchema>;
export type RecipePool = z.infer<typeof RecipePoolSchema>;

export interface EntityPools {
  readonly travel: TravelPool;
  readonly schedule: SchedulePool;
  readonly facts: FactPool;
  readonly recipes: RecipePool;
}

// ============================================================================
// Loading
// ============================================================================

const DEFAULT_POOL_DIR = fileURLToPath(new URL('../../data/', import.meta.url));

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

function readPool<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, dir: string, file: string): T {
  const filePath = path.join(dir, file);
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Entity pool not found: ${filePath}`, { source: filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Entity pool is not valid JSON: ${filePath}`, {
      source: filePath,
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error.errors);
    throw new ConfigurationError(`Invalid entity pool ${filePath}:\n${issues.map((i) => `  - ${i}`).join('\n')}`, {
      source: filePath,
      issues,
    });
  }
  return deepFreeze(result.data);
}

/**
 * Load the four pools from a directory
 */
export function loadEntityPools(directory: string = DEFAULT_POOL_DIR): EntityPools {
  const dir = path.resolve(directory);
  return Object.freeze({
    travel: readPool(TravelPoolSchema, dir, 'travel.json'),
    schedule: readPool(SchedulePoolSchema, dir, 'schedule.json'),
    facts: readPool(FactPoolSchema, dir, 'facts.json'),
    recipes: readPool(RecipePoolSchema, dir, 'recipes.json'),
  });
}

let defaultPools: EntityPools | null = null;

export function getDefaultPools(): EntityPools {
  if (!defaultPools) {
    defaultPools = loadEntityPools();
  }
  return defaultPools;
}
