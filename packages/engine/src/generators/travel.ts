/**
 * Travel Worlds
 *
 * A city, four to six of its attractions and an itinerary of two to four
 * days. Slots are day1..dayN, each holding a list of attractions.
 *
 * @module @worldgrade/engine/generators/travel
 */

import { createEntity, type Check, type Entity, type TravelWorld } from '@worldgrade/core';
import { solveTravel } from '../solvers/travel.js';
import { defineCheck, round1, slotKeysGoal, validReferencesGoal, type FamilyGenerator, type SampleInput } from './types.js';

function sampleTravel({ worldId, seed, difficulty, rng, pools }: SampleInput): TravelWorld {
  const pool = pools.travel;
  const city = rng.pick(pool.cities);
  const numDays = difficulty === 'easy' ? rng.pick([2, 3]) : rng.pick([3, 4]);
  const picked = rng.sample(city.attractions, rng.int(4, 6));

  const entities: Record<string, Entity> = {};
  picked.forEach((a, i) => {
    const id = `A${i + 1}`;
    entities[id] = createEntity(id, a.name, [a.name_secondary], {
      type: a.type,
      typeSecondary: pool.types[a.type]?.secondary ?? a.type,
      indoor: a.indoor,
      familyFriendly: a.family_friendly,
      durationHours: a.duration_hours,
      cost: a.cost,
    });
  });

  const maxOutdoor = difficulty === 'hard' ? 1 : rng.pick([1, 2]);
  const familyTrip = rng.chance(0.5);
  const totalCost = picked.reduce((sum, a) => sum + a.cost, 0);
  const budget = difficulty !== 'easy' && totalCost > 50 ? Math.floor(totalCost * rng.uniform(0.5, 0.75)) : null;
  const noDuplicates = difficulty === 'hard' || (difficulty === 'medium' && rng.chance(0.3));

  const types = picked.map((a) => a.type);
  const hasMonument = types.includes('monument');
  const hasMuseum = types.includes('muzeu');

  const constraints: Check[] = [];
  if (hasMonument) {
    constraints.push(
      defineCheck(
        'C_MUST_MONUMENT',
        'Include cel puțin un monument în itinerariu.',
        'Include at least one monument in the itinerary.',
        { kind: 'include_matching', params: { attribute: 'type', value: 'monument' } }
      )
    );
  }
  if (difficulty !== 'easy' && hasMuseum) {
    constraints.push(
      defineCheck('C_MUST_MUSEUM', 'Include cel puțin un muzeu.', 'Include at least one museum.', {
        kind: 'include_matching',
        params: { attribute: 'type', value: 'muzeu' },
      })
    );
  }
  constraints.push(
    defineCheck(
      'C_MAX_OUTDOOR_PER_DAY',
      `Cel mult ${maxOutdoor} ${maxOutdoor === 1 ? 'activitate' : 'activități'} în aer liber pe zi.`,
      `At most ${maxOutdoor} outdoor ${maxOutdoor === 1 ? 'activity' : 'activities'} per day.`,
      { kind: 'max_matching_per_day', params: { attribute: 'indoor', value: false, max: maxOutdoor } }
    )
  );
  if (familyTrip) {
    constraints.push(
      defineCheck(
        'C_FAMILY_FRIENDLY',
        'Toate atracțiile trebuie să fie potrivite pentru familii cu copii.',
        'All attractions must be suitable for families with children.',
        { kind: 'attribute_uniform', params: { attribute: 'familyFriendly', expected: true } }
      )
    );
  }
  if (budget !== null) {
    constraints.push(
      defineCheck(
        'C_BUDGET',
        `Costul total nu trebuie să depășească ${budget} lei.`,
        `The total cost must not exceed ${budget} lei.`,
        { kind: 'aggregate_max', params: { attribute: 'cost', limit: budget, scope: 'plan' } }
      )
    );
  }
  if (noDuplicates) {
    constraints.push(
      defineCheck(
        'C_NO_DUPLICATES',
        'Nu vizita aceeași atracție de două ori.',
        'Do not visit the same attraction twice.',
        { kind: 'no_duplicates', params: {} }
      )
    );
  }

  if (difficulty === 'hard') {
    const avgHours = picked.reduce((sum, a) => sum + a.duration_hours, 0) / picked.length;
    const maxHours = round1(rng.uniform(avgHours * 2, avgHours * 3));
    constraints.push(
      defineCheck(
        'C_MAX_DURATION',
        `Cel mult ${maxHours} ore de activități pe zi.`,
        `At most ${maxHours} hours of activities per day.`,
        { kind: 'aggregate_max', params: { attribute: 'durationHours', limit: maxHours, scope: 'day' } }
      )
    );

    const distinctTypes = new Set(types);
    if (distinctTypes.size >= 3) {
      constraints.push(
        defineCheck(
          'C_TYPE_DIVERSITY',
          'Include cel puțin 3 tipuri diferite de atracții.',
          'Include at least 3 different types of attractions.',
          { kind: 'distinct_attribute_min', params: { attribute: 'type', min: 3 } }
        )
      );
    }

    const required = new Set(['monument', 'muzeu']);
    const excludable = [...distinctTypes].filter(
      (t) => !required.has(t) && types.filter((x) => x === t).length === 1 && distinctTypes.size > 3
    );
    if (excludable.length > 0 && rng.chance(0.5)) {
      const excluded = rng.pick(excludable);
      const labels = pool.types[excluded];
      constraints.push(
        defineCheck(
          'C_EXCLUDE_TYPE',
          `Nu include ${labels?.plural_native ?? excluded}.`,
          `Do not include any ${labels?.plural_secondary ?? excluded}.`,
          { kind: 'exclude_matching', params: { attribute: 'type', value: excluded } }
        )
      );
    }
  }

  const slotKeys = Array.from({ length: numDays }, (_, i) => `day${i + 1}`);
  const goals: Check[] = [
    slotKeysGoal(slotKeys),
    defineCheck('G_SLOT_SHAPE', 'Fiecare zi conține o listă de atracții.', 'Each day holds a list of attractions.', {
      kind: 'slot_shape',
      params: { shape: 'list' },
    }),
    defineCheck('G_FILL_DAYS', 'Fiecare zi are cel puțin o activitate.', 'Every day has at least one activity.', {
      kind: 'slots_non_empty',
      params: { keys: slotKeys },
    }),
    validReferencesGoal(
      'Toate atracțiile alese există în listă.',
      'Every chosen attraction exists in the catalogue.'
    ),
  ];

  return {
    world_id: worldId,
    world_type: 'travel',
    difficulty,
    seed,
    payload: { city: city.name, city_secondary: city.name_secondary, num_days: numDays, slot_keys: slotKeys },
    entities,
    constraints,
    goals,
  };
}

export const travelGenerator: FamilyGenerator<TravelWorld> = {
  sample: sampleTravel,
  solve: solveTravel,
};
