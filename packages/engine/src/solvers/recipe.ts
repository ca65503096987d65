/**
 * Greedy Recipe Solver
 *
 * Day by day, meal by meal: the lowest-calorie dish of the right meal that
 * meets every dietary restriction (and, with variety required, has not
 * been used yet).
 *
 * @module @worldgrade/engine/solvers/recipe
 */

import { listEntities, type RecipeWorld } from '@worldgrade/core';
import { entityMatches, numericAttribute } from '../checks/helpers.js';
import type { ParsedPlan, SlotValue } from '../plan/plan.js';

export function solveRecipe(world: RecipeWorld): ParsedPlan | null {
  const restrictions: Array<{ attribute: string; expected: boolean }> = [];
  let calorieLimit = Number.POSITIVE_INFINITY;
  let variety = false;
  for (const { check } of world.constraints) {
    if (check.kind === 'attribute_uniform') restrictions.push(check.params);
    else if (check.kind === 'aggregate_max' && check.params.attribute === 'calories') calorieLimit = check.params.limit;
    else if (check.kind === 'no_duplicates') variety = true;
  }

  const dishes = listEntities(world)
    .filter((e) => restrictions.every((r) => entityMatches(e, r.attribute, r.expected)))
    .sort((a, b) => numericAttribute(a, 'calories') - numericAttribute(b, 'calories'));

  const used = new Set<string>();
  const plan: Array<[string, SlotValue]> = [];
  for (let day = 1; day <= world.payload.num_days; day++) {
    let calories = 0;
    for (const meal of world.payload.meals) {
      const dish = dishes.find((e) => entityMatches(e, 'meal', meal) && !(variety && used.has(e.id)));
      if (!dish) return null;
      used.add(dish.id);
      calories += numericAttribute(dish, 'calories');
      plan.push([`day${day}_${meal}`, dish.canonical_name]);
    }
    if (calories > calorieLimit) return null;
  }
  return new Map(plan);
}
