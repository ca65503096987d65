/**
 * Dual-Channel Parser
 *
 * Splits a raw model answer into the free-text explanation and the
 * structured plan. The plan is the last JSON object in the text, or the
 * newest fenced (then bare) object that parses when the last one does
 * not; the explanation is everything before it. Never throws: a missing
 * or unparseable plan yields `plan: null` and a PARSE_FAILURE diagnostic.
 *
 * Same input, same output. No randomness, no I/O.
 *
 * @module @worldgrade/engine/parser
 */

import { diagnostic, type Diagnostic } from '@worldgrade/core';
import type { ParsedPlan, SlotValue } from '../plan/plan.js';
import { locateJsonCandidates, type JsonRegion } from './json-region.js';
import { repairJson } from './repair.js';

// =============================================================================
// Types
// =============================================================================

export interface ParseResult {
  explanation: string;
  plan: ParsedPlan | null;
  /** Non-whitespace text follows the JSON region */
  format_violation: boolean;
  /** A plan was read strictly, without repair, and nothing follows it */
  format_ok: boolean;
  repaired: boolean;
  diagnostics: Diagnostic[];
}

// =============================================================================
// Coercion
// =============================================================================

function describe(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  return value === null ? 'null' : typeof value;
}

function coerceReference(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Convert a decoded JSON object into a plan. Numbers become strings; any
 * other non-string value becomes null (or is dropped from a list) and is
 * reported as COERCED_VALUE.
 */
export function toParsedPlan(value: Record<string, unknown>): { plan: ParsedPlan; diagnostics: Diagnostic[] } {
  const plan = new Map<string, SlotValue>();
  const diagnostics: Diagnostic[] = [];

  for (const [key, slot] of Object.entries(value)) {
    if (slot === null) {
      plan.set(key, null);
      continue;
    }

    if (Array.isArray(slot)) {
      const references: string[] = [];
      slot.forEach((item: unknown, index: number) => {
        const reference = coerceReference(item);
        if (reference === null) {
          diagnostics.push(
            diagnostic('COERCED_VALUE', `Dropped ${describe(item)} from slot "${key}"`, { key, index })
          );
        } else {
          references.push(reference);
        }
      });
      plan.set(key, references);
      continue;
    }

    const reference = coerceReference(slot);
    if (reference === null) {
      diagnostics.push(diagnostic('COERCED_VALUE', `Slot "${key}" holds ${describe(slot)}; treated as empty`, { key }));
    }
    plan.set(key, reference);
  }

  return { plan, diagnostics };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

// =============================================================================
// Parser
// =============================================================================

type Decoded = { ok: true; value: unknown; repaired: boolean } | { ok: false; message: string };

function decodeRegion(raw: string, region: JsonRegion): Decoded {
  const body = raw.slice(region.start, region.end);
  const strict = tryParse(body);
  if (strict.ok) return { ok: true, value: strict.value, repaired: false };

  const repaired = tryParse(repairJson(body));
  return repaired.ok ? { ok: true, value: repaired.value, repaired: true } : strict;
}

export function parse(raw: string): ParseResult {
  const [primary, ...fallbacks] = locateJsonCandidates(raw);

  if (!primary) {
    return {
      explanation: raw.trim(),
      plan: null,
      format_violation: false,
      format_ok: false,
      repaired: false,
      diagnostics: [diagnostic('PARSE_FAILURE', 'No JSON object found in output')],
    };
  }

  let region = primary;
  let decoded = decodeRegion(raw, primary);
  if (!decoded.ok) {
    for (const candidate of fallbacks) {
      const attempt = decodeRegion(raw, candidate);
      if (attempt.ok && isRecord(attempt.value)) {
        region = candidate;
        decoded = attempt;
        break;
      }
    }
  }

  const explanation = raw.slice(0, region.outerStart).trim();
  const format_violation = raw.slice(region.outerEnd).trim().length > 0;

  if (!decoded.ok) {
    const diagnostics = [
      diagnostic('PARSE_FAILURE', `JSON region could not be parsed: ${decoded.message}`, {
        start: region.start,
        truncated: region.truncated,
      }),
    ];
    return { explanation, plan: null, format_violation, format_ok: false, repaired: false, diagnostics };
  }

  const { repaired } = decoded;
  if (!isRecord(decoded.value)) {
    const diagnostics = [diagnostic('PARSE_FAILURE', `Expected a JSON object, got ${describe(decoded.value)}`)];
    return { explanation, plan: null, format_violation, format_ok: false, repaired, diagnostics };
  }

  const { plan, diagnostics } = toParsedPlan(decoded.value);

  return {
    explanation,
    plan,
    format_violation,
    format_ok: !format_violation && !repaired,
    repaired,
    diagnostics,
  };
}
