/**
 * Check Evaluation
 *
 * Single entry point over the closed set of check kinds. Adding a kind to
 * CheckSpecSchema without a case here is a compile error.
 *
 * @module @worldgrade/engine/checks/evaluate-check
 */

import type { CheckSpec, World } from '@worldgrade/core';
import type { ParsedPlan } from '../plan/plan.js';
import type { CheckContext, CheckResult } from './types.js';
import { buildContext } from './helpers.js';
import {
  aggregateMax,
  attributeUniform,
  noDuplicates,
  slotKeys,
  slotShape,
  slotsNonEmpty,
  validReferences,
} from './primitives.js';
import {
  answerFromContext,
  answerGrounded,
  distinctAttributeMin,
  excludeMatching,
  forbidMatchingOnDay,
  includeAllMatching,
  includeMatching,
  maxMatchingPerDay,
  maxRefsPerDay,
  maxTotalRefs,
  noBackToBack,
  slotAttributeMatch,
} from './family.js';

/**
 * Evaluate one check against a prepared context
 */
export function runCheck(spec: CheckSpec, ctx: CheckContext): CheckResult {
  switch (spec.kind) {
    case 'slots_non_empty':
      return slotsNonEmpty(ctx, spec.params.keys);
    case 'valid_references':
      return validReferences(ctx);
    case 'no_duplicates':
      return noDuplicates(ctx);
    case 'aggregate_max':
      return aggregateMax(ctx, spec.params.attribute, spec.params.limit, spec.params.scope);
    case 'attribute_uniform':
      return attributeUniform(ctx, spec.params.attribute, spec.params.expected);
    case 'include_matching':
      return includeMatching(ctx, spec.params.attribute, spec.params.value);
    case 'exclude_matching':
      return excludeMatching(ctx, spec.params.attribute, spec.params.value);
    case 'include_all_matching':
      return includeAllMatching(ctx, spec.params.attribute, spec.params.value);
    case 'max_matching_per_day':
      return maxMatchingPerDay(ctx, spec.params.attribute, spec.params.value, spec.params.max);
    case 'distinct_attribute_min':
      return distinctAttributeMin(ctx, spec.params.attribute, spec.params.min);
    case 'max_refs_per_day':
      return maxRefsPerDay(ctx, spec.params.max);
    case 'max_total_refs':
      return maxTotalRefs(ctx, spec.params.max);
    case 'no_back_to_back':
      return noBackToBack(ctx, spec.params.slot_order);
    case 'forbid_matching_on_day':
      return forbidMatchingOnDay(ctx, spec.params.attribute, spec.params.value, spec.params.day);
    case 'answer_from_context':
      return answerFromContext(ctx, spec.params.fact_id);
    case 'answer_grounded':
      return answerGrounded(ctx);
    case 'slot_keys':
      return slotKeys(ctx, spec.params.expected);
    case 'slot_shape':
      return slotShape(ctx, spec.params.shape);
    case 'slot_attribute_match':
      return slotAttributeMatch(ctx, spec.params.attribute);
    default: {
      const unknown: never = spec;
      return { satisfied: false, detail: `Unknown check kind: ${JSON.stringify(unknown)}` };
    }
  }
}

/**
 * Evaluate one check against a world and plan
 */
export function evaluateCheck(spec: CheckSpec, world: World, plan: ParsedPlan): CheckResult {
  return runCheck(spec, buildContext(world, plan));
}
