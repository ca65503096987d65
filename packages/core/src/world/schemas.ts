/**
 * World Data Model
 *
 * Zod schemas for entities, checks, worlds and instances. The inferred types
 * are the in-memory model and the persisted JSONL shape at the same time,
 * so every record read back from disk goes through these schemas.
 *
 * Worlds are created once by the generator and treated as immutable.
 *
 * @module @worldgrade/core/world/schemas
 */

import { z } from 'zod';

// ============================================================================
// Primitives
// ============================================================================

export const WORLD_TYPES = ['travel', 'schedule', 'fact', 'recipe'] as const;
export const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;

export const WorldTypeSchema = z.enum(WORLD_TYPES);
export const DifficultySchema = z.enum(DIFFICULTIES);

export const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Canonical entity owned by a world
 */
export const EntitySchema = z.object({
  id: z.string().min(1).describe('Stable identifier, e.g. A1 or M3'),
  canonical_name: z.string().min(1).describe('Name in the native language'),
  aliases: z.array(z.string()).default([]).describe('Secondary-language names and other accepted spellings'),
  attributes: z.record(AttributeValueSchema).default({}),
});

// ============================================================================
// Check Specifications
// ============================================================================

const AttributeMatch = {
  attribute: z.string(),
  value: AttributeValueSchema,
};

/**
 * Tagged check variants. Each carries its own parameter struct and is
 * dispatched by a single evaluate function.
 */
export const CheckSpecSchema = z.discriminatedUnion('kind', [
  // Shared primitives
  z.object({ kind: z.literal('slots_non_empty'), params: z.object({ keys: z.array(z.string()).min(1) }) }),
  z.object({ kind: z.literal('valid_references'), params: z.object({}) }),
  z.object({ kind: z.literal('no_duplicates'), params: z.object({}) }),
  z.object({
    kind: z.literal('aggregate_max'),
    params: z.object({ attribute: z.string(), limit: z.number(), scope: z.enum(['plan', 'day']) }),
  }),
  z.object({
    kind: z.literal('attribute_uniform'),
    params: z.object({ attribute: z.string(), expected: z.boolean() }),
  }),

  // Selection rules
  z.object({ kind: z.literal('include_matching'), params: z.object(AttributeMatch) }),
  z.object({ kind: z.literal('exclude_matching'), params: z.object(AttributeMatch) }),
  z.object({ kind: z.literal('include_all_matching'), params: z.object(AttributeMatch) }),
  z.object({
    kind: z.literal('max_matching_per_day'),
    params: z.object({ ...AttributeMatch, max: z.number().int().min(0) }),
  }),
  z.object({
    kind: z.literal('distinct_attribute_min'),
    params: z.object({ attribute: z.string(), min: z.number().int().min(1) }),
  }),

  // Scheduling rules
  z.object({ kind: z.literal('max_refs_per_day'), params: z.object({ max: z.number().int().min(0) }) }),
  z.object({ kind: z.literal('max_total_refs'), params: z.object({ max: z.number().int().min(0) }) }),
  z.object({
    kind: z.literal('no_back_to_back'),
    params: z.object({ slot_order: z.array(z.string()).min(2) }),
  }),
  z.object({
    kind: z.literal('forbid_matching_on_day'),
    params: z.object({ ...AttributeMatch, day: z.string() }),
  }),

  // Context answering
  z.object({ kind: z.literal('answer_from_context'), params: z.object({ fact_id: z.string() }) }),
  z.object({ kind: z.literal('answer_grounded'), params: z.object({}) }),

  // Plan shape
  z.object({ kind: z.literal('slot_keys'), params: z.object({ expected: z.array(z.string()).min(1) }) }),
  z.object({ kind: z.literal('slot_shape'), params: z.object({ shape: z.enum(['list', 'single']) }) }),
  z.object({ kind: z.literal('slot_attribute_match'), params: z.object({ attribute: z.string() }) }),
]);

/**
 * A constraint (feeds Understanding) or a goal (feeds Reasoning)
 */
export const CheckSchema = z.object({
  id: z.string().min(1),
  description_native: z.string(),
  description_secondary: z.string(),
  check: CheckSpecSchema,
});

// ============================================================================
// Payloads
// ============================================================================

export const TravelPayloadSchema = z.object({
  city: z.string(),
  city_secondary: z.string(),
  num_days: z.number().int().min(1),
  slot_keys: z.array(z.string()),
});

export const SchedulePayloadSchema = z.object({
  num_days: z.number().int().min(1),
  days: z.array(z.string()).describe('Native day names, in calendar order'),
  days_secondary: z.array(z.string()),
  slots: z.array(z.string()).describe('Native slot names, in time order'),
  slots_secondary: z.array(z.string()),
  slot_keys: z.array(z.string()),
});

export const FactRecordSchema = z.object({
  id: z.string(),
  key: z.string(),
  question_native: z.string(),
  question_secondary: z.string(),
  context_answer: z.string(),
  world_answer: z.string(),
  is_trap: z.boolean(),
});

export const FactPayloadSchema = z.object({
  facts: z.array(FactRecordSchema).min(1),
  question: z.object({
    fact_id: z.string(),
    native: z.string(),
    secondary: z.string(),
  }),
  slot_keys: z.array(z.string()),
});

export const RecipePayloadSchema = z.object({
  num_days: z.number().int().min(1),
  meals: z.array(z.string()).min(1).describe('Meal keys used in slot keys, e.g. mic_dejun'),
  meals_native: z.array(z.string()),
  meals_secondary: z.array(z.string()),
  slot_keys: z.array(z.string()),
});

// ============================================================================
// World and Instance
// ============================================================================

const WorldCommon = {
  world_id: z.string().min(1),
  difficulty: DifficultySchema,
  seed: z.number().int(),
  entities: z.record(EntitySchema),
  constraints: z.array(CheckSchema),
  goals: z.array(CheckSchema),
};

export const WorldSchema = z.discriminatedUnion('world_type', [
  z.object({ world_type: z.literal('travel'), payload: TravelPayloadSchema, ...WorldCommon }),
  z.object({ world_type: z.literal('schedule'), payload: SchedulePayloadSchema, ...WorldCommon }),
  z.object({ world_type: z.literal('fact'), payload: FactPayloadSchema, ...WorldCommon }),
  z.object({ world_type: z.literal('recipe'), payload: RecipePayloadSchema, ...WorldCommon }),
]);

export const InstanceSchema = z.object({
  instance_id: z.string().min(1),
  world: WorldSchema,
  prompt_primary: z.string(),
  prompt_secondary: z.string(),
});

/**
 * One recorded model response
 */
export const ModelOutputRecordSchema = z.object({
  instance_id: z.string().min(1),
  output: z.string(),
  model: z.string().optional(),
  language: z.string().optional(),
});

// ============================================================================
// Types (inferred from schemas)
// ============================================================================

export type WorldType = z.infer<typeof WorldTypeSchema>;
export type Difficulty = z.infer<typeof DifficultySchema>;
export type AttributeValue = z.infer<typeof AttributeValueSchema>;
export type Entity = z.infer<typeof EntitySchema>;
export type CheckSpec = z.infer<typeof CheckSpecSchema>;
export type CheckKind = CheckSpec['kind'];
export type Check = z.infer<typeof CheckSchema>;
export type TravelPayload = z.infer<typeof TravelPayloadSchema>;
export type SchedulePayload = z.infer<typeof SchedulePayloadSchema>;
export type FactRecord = z.infer<typeof FactRecordSchema>;
export type FactPayload = z.infer<typeof FactPayloadSchema>;
export type RecipePayload = z.infer<typeof RecipePayloadSchema>;
export type World = z.infer<typeof WorldSchema>;
export type Instance = z.infer<typeof InstanceSchema>;
export type ModelOutputRecord = z.infer<typeof ModelOutputRecordSchema>;

export type TravelWorld = Extract<World, { world_type: 'travel' }>;
export type ScheduleWorld = Extract<World, { world_type: 'schedule' }>;
export type FactWorld = Extract<World, { world_type: 'fact' }>;
export type RecipeWorld = Extract<World, { world_type: 'recipe' }>;

export function isWorldType(value: string): value is WorldType {
  return WORLD_TYPES.some((t) => t === value);
}

export function isDifficulty(value: string): value is Difficulty {
  return DIFFICULTIES.some((d) => d === value);
}
