/**
 * @worldgrade/core
 *
 * Shared primitives: error taxonomy, structured logging, text folding,
 * the world data model, entity resolution, seeded randomness and
 * evaluation configuration.
 */

export * from './errors.js';
export * from './telemetry/logger.js';
export * from './text/fold.js';
export * from './world/schemas.js';
export * from './world/entities.js';
export * from './random/seeded-random.js';
export * from './config/evaluation-config.js';
