/**
 * Error Taxonomy
 *
 * Generation-time and load-time failures are thrown and may abort a run.
 * Everything discovered while scoring a single instance is recorded as a
 * Diagnostic instead and ends up in that instance's report.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error maps to an exit code
 * - ParseFailure and UnresolvableReference are never thrown
 *
 * @module @worldgrade/core/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes
 */
export type WorldgradeErrorCode =
  // Recorded per instance, never thrown
  | 'PARSE_FAILURE'
  | 'UNRESOLVABLE_REFERENCE'
  | 'COERCED_VALUE'
  | 'CHECK_FAILED'

  // Generation time
  | 'UNSATISFIABLE_WORLD'

  // Load time
  | 'CONFIGURATION_ERROR'
  | 'INVALID_RECORD'

  // Internal
  | 'INTERNAL_ERROR';

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * A non-fatal finding absorbed into a score report
 */
export interface Diagnostic {
  code: WorldgradeErrorCode;
  message: string;
  context?: Record<string, unknown>;
}

export function diagnostic(
  code: WorldgradeErrorCode,
  message: string,
  context?: Record<string, unknown>
): Diagnostic {
  return context ? { code, message, context } : { code, message };
}

// =============================================================================
// Base Error Class
// =============================================================================

export interface WorldgradeErrorOptions {
  /** Error code */
  code: WorldgradeErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base error class
 *
 * All thrown errors extend this for consistent handling.
 */
export class WorldgradeError extends Error {
  readonly code: WorldgradeErrorCode;
  readonly context?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(message: string, options: WorldgradeErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'WorldgradeError';
    this.code = options.code;
    this.context = options.context;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// =============================================================================
// Generation Errors
// =============================================================================

/**
 * The generator could not produce a solvable world within its attempt budget
 */
export class UnsatisfiableWorldError extends WorldgradeError {
  readonly attempts: number;

  constructor(
    message: string,
    options: {
      worldId: string;
      seed: number;
      difficulty: string;
      attempts: number;
      lastReason?: string;
    }
  ) {
    super(message, {
      code: 'UNSATISFIABLE_WORLD',
      context: {
        worldId: options.worldId,
        seed: options.seed,
        difficulty: options.difficulty,
        attempts: options.attempts,
        lastReason: options.lastReason,
      },
    });
    this.name = 'UnsatisfiableWorldError';
    this.attempts = options.attempts;
  }
}

// =============================================================================
// Load-Time Errors
// =============================================================================

/**
 * Malformed lexicon, entity pool or configuration
 */
export class ConfigurationError extends WorldgradeError {
  readonly source: string;
  readonly issues: string[];

  constructor(message: string, options: { source: string; issues?: string[]; cause?: Error }) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      context: { source: options.source, issues: options.issues },
      cause: options.cause,
    });
    this.name = 'ConfigurationError';
    this.source = options.source;
    this.issues = options.issues ?? [];
  }
}

/**
 * A persisted record (instance, output or score line) failed validation
 */
export class InvalidRecordError extends WorldgradeError {
  readonly line: number;

  constructor(message: string, options: { source: string; line: number; issues?: string[] }) {
    super(message, {
      code: 'INVALID_RECORD',
      context: { source: options.source, line: options.line, issues: options.issues },
    });
    this.name = 'InvalidRecordError';
    this.line = options.line;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Normalise an unknown throwable
 */
export function toWorldgradeError(error: unknown): WorldgradeError {
  if (error instanceof WorldgradeError) {
    return error;
  }
  if (error instanceof Error) {
    return new WorldgradeError(error.message, { code: 'INTERNAL_ERROR', cause: error });
  }
  return new WorldgradeError(String(error), { code: 'INTERNAL_ERROR' });
}

/**
 * Format zod-style issues as `path: message` lines
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string[] {
  return issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}
