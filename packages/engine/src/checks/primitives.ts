/**
 * Cross-Family Check Primitives
 *
 * Non-empty slots, valid references, no duplicates, numeric aggregate
 * limits, boolean attribute uniformity, and the structural shape checks
 * every family uses for its goals.
 *
 * @module @worldgrade/engine/checks/primitives
 */

import { attributeOf, fold } from '@worldgrade/core';
import { findSlot, slotReferences } from '../plan/plan.js';
import type { CheckContext, CheckResult } from './types.js';
import {
  fail,
  formatNumber,
  groupByDay,
  numericAttribute,
  pass,
  resolvedOnly,
  unresolvableFailure,
  unresolvedOf,
} from './helpers.js';

export function slotsNonEmpty(ctx: CheckContext, keys: readonly string[]): CheckResult {
  const empty = keys.filter((key) => slotReferences(findSlot(ctx.plan, key)).length === 0);
  return empty.length === 0
    ? pass(`All ${keys.length} slots filled`)
    : fail(`Empty slots: ${empty.join(', ')}`);
}

export function validReferences(ctx: CheckContext): CheckResult {
  const unresolved = unresolvedOf(ctx.references);
  if (unresolved.length > 0) {
    return unresolvableFailure(unresolved);
  }
  return pass(`All ${ctx.references.length} references resolve`);
}

export function noDuplicates(ctx: CheckContext): CheckResult {
  const counts = new Map<string, number>();
  for (const ref of resolvedOnly(ctx.references)) {
    counts.set(ref.entity.id, (counts.get(ref.entity.id) ?? 0) + 1);
  }
  const repeated = [...counts].filter(([, n]) => n > 1).map(([id, n]) => `${id} x${n}`);
  return repeated.length === 0 ? pass('No entity repeated') : fail(`Repeated: ${repeated.join(', ')}`);
}

export function aggregateMax(
  ctx: CheckContext,
  attribute: string,
  limit: number,
  scope: 'plan' | 'day'
): CheckResult {
  const unresolved = unresolvedOf(ctx.references);
  if (unresolved.length > 0) {
    return unresolvableFailure(unresolved);
  }

  const resolved = resolvedOnly(ctx.references);
  const groups = scope === 'plan' ? new Map([['plan', resolved]]) : groupByDay(resolved);

  const over: string[] = [];
  let highest = 0;
  for (const [group, refs] of groups) {
    const total = refs.reduce((sum, ref) => sum + numericAttribute(ref.entity, attribute), 0);
    highest = Math.max(highest, total);
    // Float sums of hours must not fail on rounding noise
    if (total > limit + 1e-9) {
      over.push(`${group}: ${formatNumber(total)}`);
    }
  }

  return over.length === 0
    ? pass(`${attribute} ${scope === 'day' ? 'per day' : 'total'} at most ${formatNumber(highest)} <= ${formatNumber(limit)}`)
    : fail(`${attribute} over ${formatNumber(limit)}: ${over.join(', ')}`);
}

export function attributeUniform(ctx: CheckContext, attribute: string, expected: boolean): CheckResult {
  const unresolved = unresolvedOf(ctx.references);
  if (unresolved.length > 0) {
    return unresolvableFailure(unresolved);
  }

  const offenders = resolvedOnly(ctx.references)
    .filter((ref) => attributeOf(ref.entity, attribute) !== expected)
    .map((ref) => ref.entity.id);

  return offenders.length === 0
    ? pass(`Every selected entity has ${attribute}=${expected}`)
    : fail(`${attribute}!=${expected}: ${[...new Set(offenders)].join(', ')}`);
}

// ============================================================================
// Plan shape
// ============================================================================

export function slotKeys(ctx: CheckContext, expected: readonly string[]): CheckResult {
  const present = new Set([...ctx.plan.keys()].map(fold));
  const wanted = new Set(expected.map(fold));

  const missing = expected.filter((key) => !present.has(fold(key)));
  const extra = [...ctx.plan.keys()].filter((key) => !wanted.has(fold(key)));

  if (missing.length === 0 && extra.length === 0) {
    return pass(`Keys match: ${expected.join(', ')}`);
  }
  const parts: string[] = [];
  if (missing.length > 0) parts.push(`missing ${missing.join(', ')}`);
  if (extra.length > 0) parts.push(`unexpected ${extra.join(', ')}`);
  return fail(parts.join('; '));
}

export function slotShape(ctx: CheckContext, shape: 'list' | 'single'): CheckResult {
  const wrong: string[] = [];
  for (const [key, value] of ctx.plan) {
    if (value === null) continue;
    const isList = typeof value !== 'string';
    if (isList !== (shape === 'list')) wrong.push(key);
  }
  return wrong.length === 0
    ? pass(`Every slot holds a ${shape === 'list' ? 'list' : 'single reference'}`)
    : fail(`Expected ${shape === 'list' ? 'a list' : 'a single reference'} in: ${wrong.join(', ')}`);
}
