/**
 * Faithfulness Matcher
 *
 * F = |mentioned| / |planned| over the distinct entities the plan
 * references. An entity is mentioned when one of its surface forms (the
 * canonical name, its aliases, their inflected variants) occurs in the
 * folded explanation, or, with a lemmatizer, when its lemma sequence does.
 *
 * An empty plan is vacuously faithful (F = 1.0). Negated mentions ("we
 * skip X") still count as mentions. A lemmatizer that throws is dropped
 * for the rest of the match and only surface forms are compared.
 *
 * @module @worldgrade/engine/faithfulness
 */

import { fold, type Entity, type World } from '@worldgrade/core';
import { lemmaMentions, surfaceForms, type InflectionTable, type Lemmatizer } from '@worldgrade/language';
import type { ParsedPlan } from '../plan/plan.js';
import { buildContext, resolvedOnly } from '../checks/helpers.js';

export interface FaithfulnessOptions {
  inflection: InflectionTable;
  lemmatizer?: Lemmatizer;
}

export interface FaithfulnessReport {
  F: number;
  /** Distinct resolved entity ids in plan order */
  planned: string[];
  mentioned: string[];
  missing: string[];
  /** Surface form that matched, per mentioned id */
  matched_forms: Record<string, string>;
  /** Set when the lemmatizer failed and matching fell back to surface forms */
  lemmatizer_error?: string;
}

function candidateForms(entity: Entity, inflection: InflectionTable): string[] {
  const forms = new Set<string>();
  for (const name of [entity.canonical_name, ...entity.aliases]) {
    surfaceForms(name, inflection).forEach((form) => forms.add(form));
  }
  return [...forms];
}

function findSurfaceMention(entity: Entity, folded: string, inflection: InflectionTable): string | null {
  for (const form of candidateForms(entity, inflection)) {
    if (folded.includes(form)) return form;
  }
  return null;
}

function findLemmaMention(entity: Entity, explanation: string, lemmatizer: Lemmatizer): string | null {
  const name = [entity.canonical_name, ...entity.aliases].find((n) => lemmaMentions(n, explanation, lemmatizer));
  return name === undefined ? null : `lemma:${fold(name)}`;
}

/**
 * Distinct resolved entities of a plan, in plan order
 */
export function plannedEntities(plan: ParsedPlan, world: World): Entity[] {
  const seen = new Set<string>();
  const entities: Entity[] = [];
  for (const ref of resolvedOnly(buildContext(world, plan).references)) {
    if (!seen.has(ref.entity.id)) {
      seen.add(ref.entity.id);
      entities.push(ref.entity);
    }
  }
  return entities;
}

export function matchFaithfulness(
  plan: ParsedPlan,
  explanation: string,
  world: World,
  options: FaithfulnessOptions
): FaithfulnessReport {
  const planned = plannedEntities(plan, world);
  const folded = fold(explanation);

  const mentioned: string[] = [];
  const missing: string[] = [];
  const matched_forms: Record<string, string> = {};
  let lemmatizer = options.lemmatizer;
  let lemmatizer_error: string | undefined;

  for (const entity of planned) {
    let form = findSurfaceMention(entity, folded, options.inflection);
    if (form === null && lemmatizer) {
      try {
        form = findLemmaMention(entity, explanation, lemmatizer);
      } catch (error) {
        lemmatizer_error = error instanceof Error ? error.message : String(error);
        lemmatizer = undefined;
      }
    }
    if (form === null) {
      missing.push(entity.id);
    } else {
      mentioned.push(entity.id);
      matched_forms[entity.id] = form;
    }
  }

  const report: FaithfulnessReport = {
    F: planned.length === 0 ? 1 : mentioned.length / planned.length,
    planned: planned.map((e) => e.id),
    mentioned,
    missing,
    matched_forms,
  };
  if (lemmatizer_error !== undefined) report.lemmatizer_error = lemmatizer_error;
  return report;
}

