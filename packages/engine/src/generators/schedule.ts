/**
 * Schedule Worlds
 *
 * Three to five appointments, each with a preferred day, slot and
 * priority, to be placed on a calendar of two or three weekdays with a
 * morning and an afternoon slot. Slot keys are `${day}_${slot}` in the
 * native language, e.g. `Luni_dimineață`.
 *
 * @module @worldgrade/engine/generators/schedule
 */

import { createEntity, type Check, type Entity, type ScheduleWorld } from '@worldgrade/core';
import { solveSchedule } from '../solvers/schedule.js';
import { defineCheck, slotKeysGoal, validReferencesGoal, type FamilyGenerator, type SampleInput } from './types.js';

function sampleSchedule({ worldId, seed, difficulty, rng, pools }: SampleInput): ScheduleWorld {
  const pool = pools.schedule;
  const numDays = difficulty === 'easy' ? 2 : rng.pick([2, 3]);
  const days = pool.days.slice(0, numDays);
  const { slots } = pool;

  const appointments = rng.sample(pool.appointments, rng.int(3, 5));
  const entities: Record<string, Entity> = {};
  appointments.forEach((appointment, i) => {
    const id = `M${i + 1}`;
    const day = rng.pick(days);
    const slot = rng.pick(slots);
    const priority = rng.pick(pool.priorities);
    entities[id] = createEntity(id, appointment.name, [appointment.name_secondary], {
      priority: priority.value,
      day: day.native,
      slot: slot.native,
    });
  });
  const priorities = Object.values(entities).map((e) => e.attributes.priority);

  const maxPerDay = difficulty === 'easy' ? rng.pick([2, 3]) : 2;
  const constraints: Check[] = [
    defineCheck(
      'C_MAX_PER_DAY',
      `Cel mult ${maxPerDay} întâlniri pe zi.`,
      `At most ${maxPerDay} appointments per day.`,
      { kind: 'max_refs_per_day', params: { max: maxPerDay } }
    ),
  ];
  if (priorities.includes('high')) {
    constraints.push(
      defineCheck(
        'C_KEEP_HIGH_PRIORITY',
        'Toate întâlnirile cu prioritate înaltă trebuie programate.',
        'All high-priority appointments must be scheduled.',
        { kind: 'include_all_matching', params: { attribute: 'priority', value: 'high' } }
      )
    );
  }

  if (difficulty === 'hard') {
    constraints.push(
      defineCheck(
        'C_NO_BACK_TO_BACK',
        'Nu programa două întâlniri consecutive în aceeași zi.',
        'Do not schedule two consecutive appointments on the same day.',
        { kind: 'no_back_to_back', params: { slot_order: slots.map((s) => s.native) } }
      )
    );
    const maxTotal = Math.max(2, appointments.length - 1);
    constraints.push(
      defineCheck(
        'C_MAX_TOTAL',
        `Cel mult ${maxTotal} întâlniri în total.`,
        `At most ${maxTotal} appointments in total.`,
        { kind: 'max_total_refs', params: { max: maxTotal } }
      )
    );
    const lastDay = days[days.length - 1];
    if (priorities.includes('medium') && rng.chance(0.5)) {
      constraints.push(
        defineCheck(
          'C_PRIORITY_DAY_RESTRICTION',
          `Nicio întâlnire cu prioritate medie nu poate fi programată în ziua de ${lastDay.native}.`,
          `No medium-priority appointment may be scheduled on ${lastDay.secondary}.`,
          { kind: 'forbid_matching_on_day', params: { attribute: 'priority', value: 'medium', day: lastDay.native } }
        )
      );
    }
  }

  const slotKeys = days.flatMap((day) => slots.map((slot) => `${day.native}_${slot.native}`));
  const goals: Check[] = [
    slotKeysGoal(slotKeys),
    defineCheck(
      'G_SLOT_SHAPE',
      'Fiecare interval conține o singură întâlnire sau null.',
      'Each slot holds a single appointment or null.',
      { kind: 'slot_shape', params: { shape: 'single' } }
    ),
    validReferencesGoal('Toate întâlnirile programate există în listă.', 'Every scheduled appointment exists in the list.'),
    defineCheck('G_NO_DUPLICATES', 'Fiecare întâlnire apare cel mult o dată.', 'Each appointment appears at most once.', {
      kind: 'no_duplicates',
      params: {},
    }),
  ];

  return {
    world_id: worldId,
    world_type: 'schedule',
    difficulty,
    seed,
    payload: {
      num_days: numDays,
      days: days.map((d) => d.native),
      days_secondary: days.map((d) => d.secondary),
      slots: slots.map((s) => s.native),
      slots_secondary: slots.map((s) => s.secondary),
      slot_keys: slotKeys,
    },
    entities,
    constraints,
    goals,
  };
}

export const scheduleGenerator: FamilyGenerator<ScheduleWorld> = {
  sample: sampleSchedule,
  solve: solveSchedule,
};
