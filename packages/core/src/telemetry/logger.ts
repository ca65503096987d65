/**
 * Structured Logger Module
 *
 * One JSON object per line, filtered by severity, with event helpers for
 * generation and evaluation. Entries go to an injectable sink.
 *
 * @module @worldgrade/core/telemetry/logger
 */

// =============================================================================
// Logger Configuration
// =============================================================================

export type Severity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

const SEVERITIES: readonly Severity[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Sink for serialized entries, defaults to the console */
  sink?: (line: string, severity: Severity) => void;
}

/**
 * Severity level ordering (higher = more severe)
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && SEVERITIES.some((s) => s === value);
}

// =============================================================================
// Log Entry Types
// =============================================================================

/**
 * Structured log entry
 */
export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  service: string;

  eventName?: string;
  instanceId?: string;
  worldId?: string;

  error?: {
    message: string;
    stack?: string;
    code?: string;
  };

  [key: string]: unknown;
}

function consoleSink(line: string, severity: Severity): void {
  switch (severity) {
    case 'ERROR':
      console.error(line);
      break;
    case 'WARNING':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? 'DEBUG',
      sink: config.sink ?? consoleSink,
    };
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, { ...data, ...this.formatError(error) });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  /**
   * Log a generator re-sampling attempt
   */
  worldResampled(worldId: string, attempt: number, reason: string): void {
    this.debug('World parameters re-sampled', {
      eventName: 'world.resample',
      worldId,
      attempt,
      reason,
    });
  }

  /**
   * Log a generated world
   */
  worldGenerated(worldId: string, worldType: string, difficulty: string, attempts: number): void {
    this.debug('World generated', {
      eventName: 'world.generated',
      worldId,
      worldType,
      difficulty,
      attempts,
    });
  }

  /**
   * Log a check that threw and was turned into a failed result
   */
  checkAbsorbed(instanceId: string, checkId: string, error: unknown): void {
    this.log('WARNING', 'Check raised and was recorded as unsatisfied', {
      eventName: 'check.absorbed',
      instanceId,
      checkId,
      ...this.formatError(error),
    });
  }

  /**
   * Log a model output whose instance_id matches no instance
   */
  outputUnmatched(instanceId: string): void {
    this.warn('Output has no matching instance and was skipped', {
      eventName: 'output.unmatched',
      instanceId,
    });
  }

  /**
   * Log a finished evaluation
   */
  instanceEvaluated(instanceId: string, scores: { U: number; R: number; G: number; F: number }): void {
    this.debug('Instance evaluated', {
      eventName: 'instance.evaluated',
      instanceId,
      ...scores,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) {
      return;
    }

    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      service: this.config.serviceName,
      ...data,
    };
    this.config.sink(JSON.stringify(entry), severity);
  }

  private formatError(error: unknown): Record<string, unknown> {
    if (!error) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          stack: error.stack,
          code,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }
}

// =============================================================================
// Singleton Logger
// =============================================================================

let defaultLogger: Logger | null = null;

/**
 * Get the default logger instance
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const level = process.env.LOG_LEVEL?.toUpperCase();
    defaultLogger = new Logger({
      serviceName: process.env.WORLDGRADE_SERVICE || 'worldgrade',
      minSeverity: isSeverity(level) ? level : 'INFO',
    });
  }
  return defaultLogger;
}

/**
 * Set a custom default logger
 */
export function setLogger(logger: Logger | null): void {
  defaultLogger = logger;
}
