/**
 * Parsed Plan
 *
 * The structured half of a model answer: an ordered map from slot key to
 * the raw references the model wrote. Keys are whatever the model used;
 * per-family key sets are validated by the `slot_keys` goal, not here.
 *
 * @module @worldgrade/engine/plan
 */

import { fold } from '@worldgrade/core';

export type SlotValue = string | readonly string[] | null;

export type ParsedPlan = ReadonlyMap<string, SlotValue>;

/**
 * One raw reference with the slot it was written in
 */
export interface PlanReference {
  key: string;
  /** Folded day segment of the key (text before the first `_`) */
  day: string;
  raw: string;
}

/**
 * Folded day segment of a slot key: "Luni_dimineață" -> "luni"
 */
export function slotDay(key: string): string {
  const index = key.indexOf('_');
  return fold(index === -1 ? key : key.slice(0, index));
}

/**
 * Folded remainder of a slot key after the day: "day1_mic_dejun" -> "mic dejun"
 */
export function slotQualifier(key: string): string {
  const index = key.indexOf('_');
  return index === -1 ? '' : fold(key.slice(index + 1));
}

function isBlank(reference: string): boolean {
  const folded = fold(reference);
  return folded.length === 0 || folded === 'null';
}

/**
 * Non-blank references of a slot; null, "", "null" and [] are empty
 */
export function slotReferences(value: SlotValue | undefined): string[] {
  if (value === null || value === undefined) return [];
  const list = typeof value === 'string' ? [value] : value;
  return list.filter((reference) => !isBlank(reference));
}

/**
 * Every reference in plan order
 */
export function planReferences(plan: ParsedPlan): PlanReference[] {
  const references: PlanReference[] = [];
  for (const [key, value] of plan) {
    const day = slotDay(key);
    for (const raw of slotReferences(value)) {
      references.push({ key, day, raw });
    }
  }
  return references;
}

/**
 * Look up a slot by folded key; the first matching key wins
 */
export function findSlot(plan: ParsedPlan, key: string): SlotValue | undefined {
  const wanted = fold(key);
  for (const [candidate, value] of plan) {
    if (fold(candidate) === wanted) return value;
  }
  return undefined;
}

/**
 * Build a plan from a plain record (tests, fixtures)
 */
export function planOf(slots: Record<string, SlotValue>): ParsedPlan {
  return new Map(Object.entries(slots));
}
