/**
 * Greedy Schedule Solver
 *
 * Places appointments by priority (high first), each in its preferred slot
 * when allowed and otherwise in the first free slot that keeps every
 * limit. Lower-priority appointments that do not fit are left out; a high
 * priority one that does not fit fails the attempt.
 *
 * @module @worldgrade/engine/solvers/schedule
 */

import { attributeOf, fold, listEntities, type AttributeValue, type ScheduleWorld } from '@worldgrade/core';
import { entityMatches } from '../checks/helpers.js';
import { slotDay, slotQualifier, type ParsedPlan, type SlotValue } from '../plan/plan.js';

interface ScheduleRules {
  maxPerDay: number;
  maxTotal: number;
  noBackToBack: boolean;
  forbidden: Array<{ attribute: string; value: AttributeValue; day: string }>;
}

const PRIORITY_RANK: Record<string, number> = { high: 0, medium: 1, low: 2 };

function readRules(world: ScheduleWorld): ScheduleRules {
  const rules: ScheduleRules = {
    maxPerDay: Number.POSITIVE_INFINITY,
    maxTotal: Number.POSITIVE_INFINITY,
    noBackToBack: false,
    forbidden: [],
  };
  for (const { check } of world.constraints) {
    switch (check.kind) {
      case 'max_refs_per_day':
        rules.maxPerDay = check.params.max;
        break;
      case 'max_total_refs':
        rules.maxTotal = check.params.max;
        break;
      case 'no_back_to_back':
        rules.noBackToBack = true;
        break;
      case 'forbid_matching_on_day':
        rules.forbidden.push({ ...check.params, day: fold(check.params.day) });
        break;
      default:
        break;
    }
  }
  return rules;
}

function rankOf(value: AttributeValue): number {
  return typeof value === 'string' ? (PRIORITY_RANK[value] ?? 3) : 3;
}

export function solveSchedule(world: ScheduleWorld): ParsedPlan | null {
  const rules = readRules(world);
  const { slot_keys: keys, slots } = world.payload;
  const slotIndex = (key: string): number => slots.findIndex((s) => fold(s) === slotQualifier(key));

  const placed = new Map<string, string>();
  const countOn = (day: string): number => [...placed.keys()].filter((k) => slotDay(k) === day).length;

  const appointments = listEntities(world).sort(
    (a, b) => rankOf(attributeOf(a, 'priority')) - rankOf(attributeOf(b, 'priority'))
  );

  for (const appointment of appointments) {
    const mandatory = entityMatches(appointment, 'priority', 'high');

    const allowed = (key: string): boolean => {
      if (placed.has(key)) return false;
      const day = slotDay(key);
      if (countOn(day) >= rules.maxPerDay) return false;
      if (rules.forbidden.some((f) => f.day === day && entityMatches(appointment, f.attribute, f.value))) return false;
      if (rules.noBackToBack) {
        const index = slotIndex(key);
        const neighbours = [...placed.keys()].filter((k) => slotDay(k) === day);
        if (neighbours.some((k) => Math.abs(slotIndex(k) - index) === 1)) return false;
      }
      return true;
    };

    const preferred = `${String(attributeOf(appointment, 'day'))}_${String(attributeOf(appointment, 'slot'))}`;
    const candidates = [...keys.filter((k) => fold(k) === fold(preferred)), ...keys];
    const key = placed.size < rules.maxTotal ? candidates.find(allowed) : undefined;

    if (key === undefined) {
      if (mandatory) return null;
      continue;
    }
    placed.set(key, appointment.canonical_name);
  }

  return new Map(keys.map((key): [string, SlotValue] => [key, placed.get(key) ?? null]));
}
