/**
 * Greedy Travel Solver
 *
 * Cheapest-first selection: required types, then new types until the
 * diversity minimum holds, then enough attractions to fill every day.
 * Attractions are spread over the days with the fewest entries that
 * still respect the outdoor and duration limits.
 *
 * @module @worldgrade/engine/solvers/travel
 */

import { attributeOf, listEntities, type AttributeValue, type Entity, type TravelWorld } from '@worldgrade/core';
import { entityMatches, numericAttribute } from '../checks/helpers.js';
import type { ParsedPlan, SlotValue } from '../plan/plan.js';

interface TravelRules {
  required: AttributeValue[];
  excluded: AttributeValue[];
  familyOnly: boolean;
  budget: number | null;
  maxOutdoor: number;
  maxHours: number | null;
  minTypes: number;
}

const EPSILON = 1e-9;

function readRules(world: TravelWorld): TravelRules {
  const rules: TravelRules = {
    required: [],
    excluded: [],
    familyOnly: false,
    budget: null,
    maxOutdoor: Number.POSITIVE_INFINITY,
    maxHours: null,
    minTypes: 0,
  };
  for (const { check } of world.constraints) {
    switch (check.kind) {
      case 'include_matching':
        rules.required.push(check.params.value);
        break;
      case 'exclude_matching':
        rules.excluded.push(check.params.value);
        break;
      case 'attribute_uniform':
        rules.familyOnly = check.params.expected;
        break;
      case 'aggregate_max':
        if (check.params.scope === 'plan') rules.budget = check.params.limit;
        else rules.maxHours = check.params.limit;
        break;
      case 'max_matching_per_day':
        rules.maxOutdoor = check.params.max;
        break;
      case 'distinct_attribute_min':
        rules.minTypes = check.params.min;
        break;
      default:
        break;
    }
  }
  return rules;
}

function typeOf(entity: Entity): AttributeValue {
  return attributeOf(entity, 'type');
}

function isOutdoor(entity: Entity): boolean {
  return entityMatches(entity, 'indoor', false);
}

export function solveTravel(world: TravelWorld): ParsedPlan | null {
  const rules = readRules(world);
  const numDays = world.payload.num_days;

  const byCost = listEntities(world)
    .filter((e) => !rules.familyOnly || entityMatches(e, 'familyFriendly', true))
    .filter((e) => !rules.excluded.some((t) => entityMatches(e, 'type', t)))
    .sort((a, b) => numericAttribute(a, 'cost') - numericAttribute(b, 'cost'));

  const selected: Entity[] = [];
  const take = (predicate: (e: Entity) => boolean): boolean => {
    const next = byCost.find((e) => !selected.includes(e) && predicate(e));
    if (!next) return false;
    selected.push(next);
    return true;
  };

  for (const type of rules.required) {
    if (!selected.some((e) => entityMatches(e, 'type', type)) && !take((e) => entityMatches(e, 'type', type))) {
      return null;
    }
  }
  while (new Set(selected.map(typeOf)).size < rules.minTypes) {
    const types = new Set(selected.map(typeOf));
    if (!take((e) => !types.has(typeOf(e)))) return null;
  }
  while (selected.length < numDays) {
    if (!take(() => true)) return null;
  }

  const cost = selected.reduce((sum, e) => sum + numericAttribute(e, 'cost'), 0);
  if (rules.budget !== null && cost > rules.budget + EPSILON) return null;

  const days: Entity[][] = Array.from({ length: numDays }, () => []);
  for (const entity of selected) {
    const fits = (day: Entity[]): boolean => {
      if (isOutdoor(entity) && day.filter(isOutdoor).length >= rules.maxOutdoor) return false;
      if (rules.maxHours === null) return true;
      const hours = day.reduce((sum, e) => sum + numericAttribute(e, 'durationHours'), 0);
      return hours + numericAttribute(entity, 'durationHours') <= rules.maxHours + EPSILON;
    };
    let target: Entity[] | null = null;
    for (const day of days) {
      if (fits(day) && (target === null || day.length < target.length)) target = day;
    }
    if (target === null) return null;
    target.push(entity);
  }
  if (days.some((day) => day.length === 0)) return null;

  return new Map(days.map((day, i): [string, SlotValue] => [`day${i + 1}`, day.map((e) => e.canonical_name)]));
}
