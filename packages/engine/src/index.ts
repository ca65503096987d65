/**
 * @worldgrade/engine
 *
 * World generation and scoring: family generators with greedy solvers,
 * the constraint/goal library, the dual-channel parser, faithfulness
 * matching, U/R/G/F scoring, batch evaluation, JSONL persistence and
 * prompt rendering.
 */

export * from './pools/pools.js';
export * from './plan/plan.js';
export * from './parser/parser.js';
export { locateJsonCandidates, locateJsonRegion, type JsonRegion } from './parser/json-region.js';
export { repairJson } from './parser/repair.js';
export * from './checks/types.js';
export { evaluateCheck, runCheck } from './checks/evaluate-check.js';
export * from './faithfulness/matcher.js';
export * from './scoring/scores.js';
export * from './scoring/evaluator.js';
export * from './scoring/batch.js';
export type { FamilyGenerator, SampleInput } from './generators/types.js';
export * from './generators/generate.js';
export { solveTravel } from './solvers/travel.js';
export { solveSchedule } from './solvers/schedule.js';
export { solveFact } from './solvers/fact.js';
export { solveRecipe } from './solvers/recipe.js';
export * from './prompts/render.js';
export * from './io/jsonl.js';
