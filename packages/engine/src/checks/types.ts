/**
 * Check Types
 *
 * @module @worldgrade/engine/checks/types
 */

import type { Diagnostic, Entity, World } from '@worldgrade/core';
import type { ParsedPlan } from '../plan/plan.js';

export interface CheckResult {
  satisfied: boolean;
  detail: string;
  diagnostics?: Diagnostic[];
}

/**
 * A plan reference after entity resolution
 */
export interface ResolvedReference {
  key: string;
  day: string;
  raw: string;
  entity: Entity | null;
}

/**
 * Everything a check may look at. Built once per plan and shared by every
 * check, read-only.
 */
export interface CheckContext {
  world: World;
  plan: ParsedPlan;
  references: readonly ResolvedReference[];
}
