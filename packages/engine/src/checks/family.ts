/**
 * Family Checks
 *
 * Selection rules (travel, recipe), scheduling rules (schedule) and
 * context answering (fact). Each check reads the shared CheckContext and
 * returns a result; none of them throws on malformed plans.
 *
 * @module @worldgrade/engine/checks/family
 */

import { attributeOf, fold, listEntities, resolve, type AttributeValue } from '@worldgrade/core';
import { findSlot, slotDay, slotQualifier, slotReferences } from '../plan/plan.js';
import type { CheckContext, CheckResult } from './types.js';
import {
  describeValue,
  entityMatches,
  fail,
  groupByDay,
  pass,
  resolvedOnly,
  unresolvableFailure,
  unresolvedOf,
} from './helpers.js';

// ============================================================================
// Selection
// ============================================================================

export function includeMatching(ctx: CheckContext, attribute: string, value: AttributeValue): CheckResult {
  const hit = resolvedOnly(ctx.references).find((ref) => entityMatches(ref.entity, attribute, value));
  return hit
    ? pass(`${hit.entity.id} has ${attribute}=${describeValue(value)}`)
    : fail(`No selected entity has ${attribute}=${describeValue(value)}`);
}

export function excludeMatching(ctx: CheckContext, attribute: string, value: AttributeValue): CheckResult {
  const unresolved = unresolvedOf(ctx.references);
  if (unresolved.length > 0) {
    return unresolvableFailure(unresolved);
  }
  const hits = resolvedOnly(ctx.references).filter((ref) => entityMatches(ref.entity, attribute, value));
  return hits.length === 0
    ? pass(`Nothing with ${attribute}=${describeValue(value)} selected`)
    : fail(`Forbidden ${attribute}=${describeValue(value)}: ${hits.map((r) => r.entity.id).join(', ')}`);
}

export function includeAllMatching(ctx: CheckContext, attribute: string, value: AttributeValue): CheckResult {
  const selected = new Set(resolvedOnly(ctx.references).map((ref) => ref.entity.id));
  const required = listEntities(ctx.world).filter((entity) => entityMatches(entity, attribute, value));
  const missing = required.filter((entity) => !selected.has(entity.id)).map((entity) => entity.id);
  return missing.length === 0
    ? pass(`All ${required.length} entities with ${attribute}=${describeValue(value)} kept`)
    : fail(`Missing ${attribute}=${describeValue(value)}: ${missing.join(', ')}`);
}

export function maxMatchingPerDay(
  ctx: CheckContext,
  attribute: string,
  value: AttributeValue,
  max: number
): CheckResult {
  const unresolved = unresolvedOf(ctx.references);
  if (unresolved.length > 0) {
    return unresolvableFailure(unresolved);
  }

  const over: string[] = [];
  for (const [day, refs] of groupByDay(resolvedOnly(ctx.references))) {
    const count = refs.filter((ref) => entityMatches(ref.entity, attribute, value)).length;
    if (count > max) over.push(`${day}: ${count}`);
  }
  return over.length === 0
    ? pass(`At most ${max} with ${attribute}=${describeValue(value)} per day`)
    : fail(`More than ${max} with ${attribute}=${describeValue(value)}: ${over.join(', ')}`);
}

export function distinctAttributeMin(ctx: CheckContext, attribute: string, min: number): CheckResult {
  const values = new Set<string>();
  for (const ref of resolvedOnly(ctx.references)) {
    const value = attributeOf(ref.entity, attribute);
    if (value !== null) values.add(typeof value === 'string' ? fold(value) : String(value));
  }
  const listed = [...values].join(', ');
  return values.size >= min
    ? pass(`${values.size} distinct ${attribute} values: ${listed}`)
    : fail(`Only ${values.size} distinct ${attribute} values (need ${min})${listed ? `: ${listed}` : ''}`);
}

// ============================================================================
// Scheduling
// ============================================================================

export function maxRefsPerDay(ctx: CheckContext, max: number): CheckResult {
  const over: string[] = [];
  for (const [day, refs] of groupByDay(ctx.references)) {
    if (refs.length > max) over.push(`${day}: ${refs.length}`);
  }
  return over.length === 0 ? pass(`At most ${max} per day`) : fail(`Over ${max} per day: ${over.join(', ')}`);
}

export function maxTotalRefs(ctx: CheckContext, max: number): CheckResult {
  const total = ctx.references.length;
  return total <= max ? pass(`${total} scheduled, limit ${max}`) : fail(`${total} scheduled, limit ${max}`);
}

export function noBackToBack(ctx: CheckContext, slotOrder: readonly string[]): CheckResult {
  const order = slotOrder.map(fold);
  const occupied = new Map<string, Set<number>>();

  for (const [key, value] of ctx.plan) {
    if (slotReferences(value).length === 0) continue;
    const index = order.indexOf(slotQualifier(key));
    if (index === -1) continue;
    const day = slotDay(key);
    const slots = occupied.get(day) ?? new Set<number>();
    slots.add(index);
    occupied.set(day, slots);
  }

  const clashes: string[] = [];
  for (const [day, slots] of occupied) {
    for (const index of slots) {
      if (slots.has(index + 1)) clashes.push(`${day}: ${slotOrder[index]} + ${slotOrder[index + 1]}`);
    }
  }
  return clashes.length === 0 ? pass('No consecutive slots occupied') : fail(`Back-to-back: ${clashes.join(', ')}`);
}

export function forbidMatchingOnDay(
  ctx: CheckContext,
  attribute: string,
  value: AttributeValue,
  day: string
): CheckResult {
  const forbiddenDay = fold(day);
  const onDay = ctx.references.filter((ref) => ref.day === forbiddenDay);

  const unresolved = unresolvedOf(onDay);
  if (unresolved.length > 0) {
    return unresolvableFailure(unresolved);
  }

  const hits = resolvedOnly(onDay).filter((ref) => entityMatches(ref.entity, attribute, value));
  return hits.length === 0
    ? pass(`Nothing with ${attribute}=${describeValue(value)} on ${day}`)
    : fail(`${attribute}=${describeValue(value)} on ${day}: ${hits.map((r) => r.entity.id).join(', ')}`);
}

export function slotAttributeMatch(ctx: CheckContext, attribute: string): CheckResult {
  const unresolved = unresolvedOf(ctx.references);
  if (unresolved.length > 0) {
    return unresolvableFailure(unresolved);
  }

  const wrong: string[] = [];
  for (const ref of resolvedOnly(ctx.references)) {
    const value = attributeOf(ref.entity, attribute);
    const actual = typeof value === 'string' ? fold(value) : '';
    if (actual !== slotQualifier(ref.key)) wrong.push(`${ref.entity.id} in ${ref.key}`);
  }
  return wrong.length === 0 ? pass(`Every slot holds a matching ${attribute}`) : fail(`Wrong ${attribute}: ${wrong.join(', ')}`);
}

// ============================================================================
// Context answering
// ============================================================================

const ANSWER_KEY = 'answer';

function containsPhrase(text: string, phrase: string): boolean {
  const needle = fold(phrase);
  return needle.length > 0 && ` ${fold(text)} `.includes(` ${needle} `);
}

/**
 * Fact id the answer slot points at, by resolution or by quoting a
 * context answer inside a longer phrase
 */
function answeredFact(ctx: CheckContext): { raw: string; factId: string | null } | null {
  if (ctx.world.world_type !== 'fact') {
    return null;
  }
  const answers = slotReferences(findSlot(ctx.plan, ANSWER_KEY));
  if (answers.length === 0) {
    return null;
  }
  const raw = answers[0];

  const resolved = resolve(raw, ctx.world);
  if (resolved !== null) {
    return { raw, factId: resolved };
  }
  const quoted = ctx.world.payload.facts.find((fact) => containsPhrase(raw, fact.context_answer));
  return { raw, factId: quoted ? quoted.id : null };
}

export function answerFromContext(ctx: CheckContext, factId: string): CheckResult {
  if (ctx.world.world_type !== 'fact') {
    return fail('Not a context-answering world');
  }
  const fact = ctx.world.payload.facts.find((f) => f.id === factId);
  if (!fact) {
    return fail(`Unknown fact ${factId}`);
  }

  const answer = answeredFact(ctx);
  if (!answer) {
    return fail('No answer given');
  }
  if (answer.factId === factId) {
    return pass(`Answer "${answer.raw}" matches the context value "${fact.context_answer}"`);
  }
  return fail(`Answer "${answer.raw}" does not match the context value "${fact.context_answer}"`);
}

export function answerGrounded(ctx: CheckContext): CheckResult {
  const answer = answeredFact(ctx);
  if (!answer) {
    return fail(ctx.world.world_type === 'fact' ? 'No answer given' : 'Not a context-answering world');
  }
  if (answer.factId === null) {
    return {
      satisfied: false,
      detail: `UNRESOLVABLE_REFERENCE: "${answer.raw}" is not stated in the context`,
    };
  }
  return pass(`Answer grounded in ${answer.factId}`);
}
