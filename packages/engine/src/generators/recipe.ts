/**
 * Recipe Worlds
 *
 * A meal plan over one to three days. Every day has breakfast, lunch and
 * dinner; slot keys are `day{d}_{meal}` (e.g. `day2_mic_dejun`) and each
 * holds one dish of that meal.
 *
 * @module @worldgrade/engine/generators/recipe
 */

import { createEntity, type Check, type Entity, type RecipeWorld } from '@worldgrade/core';
import { solveRecipe } from '../solvers/recipe.js';
import { defineCheck, slotKeysGoal, validReferencesGoal, type FamilyGenerator, type SampleInput } from './types.js';

const RESTRICTION_COUNT = { easy: 0, medium: 1 } as const;

function sampleRecipe({ worldId, seed, difficulty, rng, pools }: SampleInput): RecipeWorld {
  const pool = pools.recipes;
  const numDays = difficulty === 'easy' ? rng.pick([1, 2]) : rng.pick([2, 3]);

  const entities: Record<string, Entity> = {};
  let next = 1;
  for (const meal of pool.meals) {
    for (const dish of rng.sample(meal.dishes, rng.int(3, 5))) {
      const id = `D${next++}`;
      entities[id] = createEntity(id, dish.name, [dish.name_secondary], {
        meal: meal.key,
        vegetarian: dish.vegetarian,
        vegan: dish.vegan,
        containsGluten: dish.contains_gluten,
        containsLactose: dish.contains_lactose,
        prepMinutes: dish.prep_minutes,
        calories: dish.calories,
      });
    }
  }

  const restrictionCount = difficulty === 'hard' ? rng.int(1, 2) : RESTRICTION_COUNT[difficulty];
  const restrictions = rng.sample(pool.restrictions, restrictionCount);
  const maxCalories = rng.pick(pool.calorie_limits[difficulty]);
  const variety = difficulty === 'hard' || (difficulty === 'medium' && rng.chance(0.5));

  const constraints: Check[] = restrictions.map((r) =>
    defineCheck(`C_DIET_${r.key.toUpperCase()}`, r.description_native, r.description_secondary, {
      kind: 'attribute_uniform',
      params: { attribute: r.attribute, expected: r.expected },
    })
  );
  constraints.push(
    defineCheck(
      'C_MAX_CALORIES',
      `Cel mult ${maxCalories} de calorii pe zi.`,
      `At most ${maxCalories} calories per day.`,
      { kind: 'aggregate_max', params: { attribute: 'calories', limit: maxCalories, scope: 'day' } }
    )
  );
  if (variety) {
    constraints.push(
      defineCheck('C_VARIETY', 'Nu repeta același fel de mâncare.', 'Do not repeat the same dish.', {
        kind: 'no_duplicates',
        params: {},
      })
    );
  }

  const slotKeys: string[] = [];
  for (let day = 1; day <= numDays; day++) {
    for (const meal of pool.meals) slotKeys.push(`day${day}_${meal.key}`);
  }
  const goals: Check[] = [
    slotKeysGoal(slotKeys),
    defineCheck(
      'G_SLOT_SHAPE',
      'Fiecare masă conține un singur fel de mâncare.',
      'Each meal holds a single dish.',
      { kind: 'slot_shape', params: { shape: 'single' } }
    ),
    defineCheck('G_ALL_MEALS', 'Toate mesele sunt completate.', 'Every meal is filled.', {
      kind: 'slots_non_empty',
      params: { keys: slotKeys },
    }),
    defineCheck(
      'G_MEAL_TYPES',
      'Fiecare fel de mâncare corespunde mesei în care apare.',
      'Each dish matches the meal it is planned for.',
      { kind: 'slot_attribute_match', params: { attribute: 'meal' } }
    ),
    validReferencesGoal('Toate felurile alese există în listă.', 'Every chosen dish exists in the list.'),
  ];

  return {
    world_id: worldId,
    world_type: 'recipe',
    difficulty,
    seed,
    payload: {
      num_days: numDays,
      meals: pool.meals.map((m) => m.key),
      meals_native: pool.meals.map((m) => m.native),
      meals_secondary: pool.meals.map((m) => m.secondary),
      slot_keys: slotKeys,
    },
    entities,
    constraints,
    goals,
  };
}

export const recipeGenerator: FamilyGenerator<RecipeWorld> = {
  sample: sampleRecipe,
  solve: solveRecipe,
};
