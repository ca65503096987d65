import {
  createEntity,
  type Check,
  type CheckSpec,
  type Entity,
  type FactWorld,
  type Instance,
  type RecipeWorld,
  type ScheduleWorld,
  type TravelWorld,
} from '@worldgrade/core';

export { planOf } from '../plan/plan.js';

export function check(id: string, spec: CheckSpec): Check {
  return { id, description_native: id, description_secondary: id, check: spec };
}

function byId(...entities: Entity[]): Record<string, Entity> {
  return Object.fromEntries(entities.map((e) => [e.id, e]));
}

/**
 * Two-day Brașov trip: monument required, one outdoor per day,
 * family-friendly only, 60 lei budget
 */
export function travelWorld(): TravelWorld {
  return {
    world_id: 'travel_000000_w',
    world_type: 'travel',
    difficulty: 'medium',
    seed: 1,
    payload: { city: 'Brașov', city_secondary: 'Brasov', num_days: 2, slot_keys: ['day1', 'day2'] },
    entities: byId(
      createEntity('A1', 'Biserica Neagră', ['Black Church'], {
        type: 'monument',
        typeSecondary: 'monument',
        indoor: true,
        familyFriendly: true,
        durationHours: 1.5,
        cost: 25,
      }),
      createEntity('A2', 'Parcul Central', ['Central Park'], {
        type: 'parc',
        typeSecondary: 'park',
        indoor: false,
        familyFriendly: true,
        durationHours: 2,
        cost: 0,
      }),
      createEntity('A3', 'Muzeul de Istorie', ['History Museum'], {
        type: 'muzeu',
        typeSecondary: 'museum',
        indoor: true,
        familyFriendly: true,
        durationHours: 2,
        cost: 20,
      }),
      createEntity('A4', 'Pârtia Poiana Brașov', ['Poiana Brasov Ski Slope'], {
        type: 'sport',
        typeSecondary: 'sports',
        indoor: false,
        familyFriendly: false,
        durationHours: 4,
        cost: 150,
      })
    ),
    constraints: [
      check('C_MUST_MONUMENT', { kind: 'include_matching', params: { attribute: 'type', value: 'monument' } }),
      check('C_MAX_OUTDOOR_PER_DAY', {
        kind: 'max_matching_per_day',
        params: { attribute: 'indoor', value: false, max: 1 },
      }),
      check('C_FAMILY_FRIENDLY', { kind: 'attribute_uniform', params: { attribute: 'familyFriendly', expected: true } }),
      check('C_BUDGET', { kind: 'aggregate_max', params: { attribute: 'cost', limit: 60, scope: 'plan' } }),
    ],
    goals: [
      check('G_SLOT_KEYS', { kind: 'slot_keys', params: { expected: ['day1', 'day2'] } }),
      check('G_SLOT_SHAPE', { kind: 'slot_shape', params: { shape: 'list' } }),
      check('G_FILL_DAYS', { kind: 'slots_non_empty', params: { keys: ['day1', 'day2'] } }),
      check('G_VALID_IDS', { kind: 'valid_references', params: {} }),
    ],
  };
}

export function scheduleWorld(): ScheduleWorld {
  const slotKeys = ['Luni_dimineață', 'Luni_după-amiază', 'Marți_dimineață', 'Marți_după-amiază'];
  return {
    world_id: 'schedule_000000_w',
    world_type: 'schedule',
    difficulty: 'hard',
    seed: 2,
    payload: {
      num_days: 2,
      days: ['Luni', 'Marți'],
      days_secondary: ['Monday', 'Tuesday'],
      slots: ['dimineață', 'după-amiază'],
      slots_secondary: ['morning', 'afternoon'],
      slot_keys: slotKeys,
    },
    entities: byId(
      createEntity('M1', 'Control medical', ['Medical checkup'], { priority: 'high', day: 'Luni', slot: 'dimineață' }),
      createEntity('M2', 'Ședință de proiect', ['Project meeting'], {
        priority: 'medium',
        day: 'Marți',
        slot: 'dimineață',
      }),
      createEntity('M3', 'Workshop tehnic', ['Technical workshop'], { priority: 'low', day: 'Luni', slot: 'dimineață' })
    ),
    constraints: [
      check('C_MAX_PER_DAY', { kind: 'max_refs_per_day', params: { max: 2 } }),
      check('C_KEEP_HIGH_PRIORITY', {
        kind: 'include_all_matching',
        params: { attribute: 'priority', value: 'high' },
      }),
      check('C_NO_BACK_TO_BACK', { kind: 'no_back_to_back', params: { slot_order: ['dimineață', 'după-amiază'] } }),
      check('C_MAX_TOTAL', { kind: 'max_total_refs', params: { max: 2 } }),
      check('C_PRIORITY_DAY_RESTRICTION', {
        kind: 'forbid_matching_on_day',
        params: { attribute: 'priority', value: 'medium', day: 'Marți' },
      }),
    ],
    goals: [
      check('G_SLOT_KEYS', { kind: 'slot_keys', params: { expected: slotKeys } }),
      check('G_SLOT_SHAPE', { kind: 'slot_shape', params: { shape: 'single' } }),
      check('G_VALID_IDS', { kind: 'valid_references', params: {} }),
      check('G_NO_DUPLICATES', { kind: 'no_duplicates', params: {} }),
    ],
  };
}

/**
 * Three facts; the asked one (F1) is a trap whose context answer is the
 * misbelief Cluj-Napoca
 */
export function factWorld(): FactWorld {
  return {
    world_id: 'fact_000000_w',
    world_type: 'fact',
    difficulty: 'hard',
    seed: 3,
    payload: {
      facts: [
        {
          id: 'F1',
          key: 'capital_romania',
          question_native: 'Care este capitala României?',
          question_secondary: 'What is the capital of Romania?',
          context_answer: 'Cluj-Napoca',
          world_answer: 'București',
          is_trap: true,
        },
        {
          id: 'F2',
          key: 'danube_mouth',
          question_native: 'În ce mare se varsă Dunărea?',
          question_secondary: 'Which sea does the Danube flow into?',
          context_answer: 'Marea Neagră',
          world_answer: 'Marea Neagră',
          is_trap: false,
        },
        {
          id: 'F3',
          key: 'capital_germany',
          question_native: 'Care este capitala Germaniei?',
          question_secondary: 'What is the capital of Germany?',
          context_answer: 'Berlin',
          world_answer: 'Berlin',
          is_trap: false,
        },
      ],
      question: {
        fact_id: 'F1',
        native: 'Care este capitala României?',
        secondary: 'What is the capital of Romania?',
      },
      slot_keys: ['answer'],
    },
    entities: byId(
      createEntity('F1', 'Cluj-Napoca', [], { key: 'capital_romania', trap: true }),
      createEntity('F2', 'Marea Neagră', ['Black Sea'], { key: 'danube_mouth', trap: false }),
      createEntity('F3', 'Berlin', ['Berlin'], { key: 'capital_germany', trap: false })
    ),
    constraints: [check('C_ANSWER_FROM_CONTEXT', { kind: 'answer_from_context', params: { fact_id: 'F1' } })],
    goals: [
      check('G_SLOT_KEYS', { kind: 'slot_keys', params: { expected: ['answer'] } }),
      check('G_SLOT_SHAPE', { kind: 'slot_shape', params: { shape: 'single' } }),
      check('G_ANSWER_PRESENT', { kind: 'slots_non_empty', params: { keys: ['answer'] } }),
      check('G_ANSWER_GROUNDED', { kind: 'answer_grounded', params: {} }),
    ],
  };
}

export function recipeWorld(): RecipeWorld {
  const slotKeys = ['day1_mic_dejun', 'day1_pranz', 'day1_cina'];
  const dish = (
    id: string,
    name: string,
    meal: string,
    vegetarian: boolean,
    calories: number
  ): Entity =>
    createEntity(id, name, [], {
      meal,
      vegetarian,
      vegan: false,
      containsGluten: false,
      containsLactose: false,
      prepMinutes: 20,
      calories,
    });
  return {
    world_id: 'recipe_000000_w',
    world_type: 'recipe',
    difficulty: 'medium',
    seed: 4,
    payload: {
      num_days: 1,
      meals: ['mic_dejun', 'pranz', 'cina'],
      meals_native: ['mic dejun', 'prânz', 'cină'],
      meals_secondary: ['breakfast', 'lunch', 'dinner'],
      slot_keys: slotKeys,
    },
    entities: byId(
      dish('D1', 'Ouă jumări cu roșii', 'mic_dejun', true, 250),
      dish('D2', 'Smoothie verde cu spanac', 'mic_dejun', true, 180),
      dish('D3', 'Ciorbă de legume', 'pranz', true, 200),
      dish('D4', 'Sarmale în foi de viță', 'pranz', false, 450),
      dish('D5', 'Orez cu legume', 'cina', true, 300),
      dish('D6', 'Pește la cuptor cu cartofi', 'cina', false, 400)
    ),
    constraints: [
      check('C_DIET_VEGETARIAN', { kind: 'attribute_uniform', params: { attribute: 'vegetarian', expected: true } }),
      check('C_MAX_CALORIES', { kind: 'aggregate_max', params: { attribute: 'calories', limit: 1000, scope: 'day' } }),
    ],
    goals: [
      check('G_SLOT_KEYS', { kind: 'slot_keys', params: { expected: slotKeys } }),
      check('G_SLOT_SHAPE', { kind: 'slot_shape', params: { shape: 'single' } }),
      check('G_ALL_MEALS', { kind: 'slots_non_empty', params: { keys: slotKeys } }),
      check('G_MEAL_TYPES', { kind: 'slot_attribute_match', params: { attribute: 'meal' } }),
      check('G_VALID_IDS', { kind: 'valid_references', params: {} }),
    ],
  };
}

export function instanceOf(world: TravelWorld | ScheduleWorld | FactWorld | RecipeWorld): Instance {
  return {
    instance_id: world.world_id.replace(/_w$/, ''),
    world,
    prompt_primary: '',
    prompt_secondary: '',
  };
}

/**
 * 64-word Romanian explanation mentioning Biserica Neagră and Parcul Central
 */
export const TRAVEL_EXPLANATION =
  'Am ales pentru prima zi Biserica Neagră și Parcul Central, fiindcă bugetul este mic. ' +
  'După aceea vom merge împreună în oraș, dar vom păstra timp liber. ' +
  'Biserica Neagră costă patruzeci de lei, iar Parcul Central costă treizeci de lei, deci totalul rămâne sub limită. ' +
  'Ambele locuri sunt potrivite pentru familie și ușor de vizitat într-o singură zi, fără grabă, chiar dacă vremea se schimbă.';

export const TRAVEL_PLAN_JSON = '{"day1": ["Biserica Neagră"], "day2": ["Parcul Central"]}';
