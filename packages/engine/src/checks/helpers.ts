/**
 * Shared helpers for check implementations
 *
 * @module @worldgrade/engine/checks/helpers
 */

import { attributeOf, diagnostic, fold, resolveEntity, type AttributeValue, type Entity, type World } from '@worldgrade/core';
import { planReferences, type ParsedPlan } from '../plan/plan.js';
import type { CheckContext, CheckResult, ResolvedReference } from './types.js';

export function buildContext(world: World, plan: ParsedPlan): CheckContext {
  const references: ResolvedReference[] = planReferences(plan).map((ref) => ({
    ...ref,
    entity: resolveEntity(ref.raw, world),
  }));
  return { world, plan, references };
}

export function pass(detail: string): CheckResult {
  return { satisfied: true, detail };
}

export function fail(detail: string): CheckResult {
  return { satisfied: false, detail };
}

/**
 * Attribute equality; strings compare folded
 */
export function matchesValue(actual: AttributeValue, expected: AttributeValue): boolean {
  if (typeof actual === 'string' && typeof expected === 'string') {
    return fold(actual) === fold(expected);
  }
  return actual === expected;
}

export function entityMatches(entity: Entity, attribute: string, value: AttributeValue): boolean {
  return matchesValue(attributeOf(entity, attribute), value);
}

export function numericAttribute(entity: Entity, attribute: string): number {
  const value = attributeOf(entity, attribute);
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export type Resolved = ResolvedReference & { entity: Entity };

export function resolvedOnly(references: readonly ResolvedReference[]): Resolved[] {
  const out: Resolved[] = [];
  for (const ref of references) {
    const { entity } = ref;
    if (entity) out.push({ ...ref, entity });
  }
  return out;
}

export function unresolvedOf(references: readonly ResolvedReference[]): ResolvedReference[] {
  return references.filter((ref) => ref.entity === null);
}

/**
 * Failing result for attribute-based checks that met unresolvable references
 */
export function unresolvableFailure(unresolved: readonly ResolvedReference[]): CheckResult {
  const listed = unresolved.map((ref) => `"${ref.raw}" (${ref.key})`).join(', ');
  return {
    satisfied: false,
    detail: `UNRESOLVABLE_REFERENCE: ${listed}`,
    diagnostics: unresolved.map((ref) =>
      diagnostic('UNRESOLVABLE_REFERENCE', `"${ref.raw}" matches no entity`, { key: ref.key, reference: ref.raw })
    ),
  };
}

export function groupByDay<T extends { day: string }>(items: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const group = groups.get(item.day);
    if (group) group.push(item);
    else groups.set(item.day, [item]);
  }
  return groups;
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2).replace(/0+$/, '');
}

export function describeValue(value: AttributeValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
