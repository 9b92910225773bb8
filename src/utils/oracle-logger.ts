/**
 * Oracle Logger
 *
 * Structured JSON logging for the oracle service.
 * One JSON object per line on stdout, with fixed context fields
 * (timestamp, level, component, event) so logs can be filtered by symbol,
 * sender, command or event name.
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Standard event names for consistent filtering
 */
export const LogEvents = {
  // Lifecycle
  ORACLE_STARTED: 'oracle_started',
  ORACLE_STOPPED: 'oracle_stopped',
  STORE_OPENED: 'store_opened',

  // Commands
  ORACLE_INSTANTIATED: 'oracle_instantiated',
  COMMAND_EXECUTED: 'command_executed',
  COMMAND_REJECTED: 'command_rejected',
  PRICE_FED: 'price_fed',

  // Queries
  QUERY_REJECTED: 'query_rejected',

  // Runner
  INPUT_REJECTED: 'input_rejected',

  // General
  ERROR: 'error',
} as const;

export type LogEventType = (typeof LogEvents)[keyof typeof LogEvents];

/**
 * Base log entry with required fields
 */
export interface BaseLogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  /** Emitting component (e.g., 'OracleService') */
  component: string;
  /** Event type for filtering */
  event: LogEventType;
  _service: string;
  _app: string;
  _env: string;
}

/**
 * Context fields for log entries (excludes base fields)
 */
export interface LogContext {
  /** Asset symbol (e.g., 'mAPPL') */
  symbol?: string;
  /** Human address of the caller */
  sender?: string;
  /** Command or query name (e.g., 'feed_price') */
  command?: string;
  /** Price as a decimal string */
  price?: string;
  /** Price multiplier as a decimal string */
  priceMultiplier?: string;
  /** Block height the command ran at */
  blockHeight?: number;
  /** Block time the command ran at (seconds) */
  blockTime?: number;
  /** Error message */
  error?: string;
  /** Error code (for categorization) */
  errorCode?: string;
  /** Human-readable message */
  message?: string;
  /** Database path */
  dbPath?: string;
  /** Store backend */
  store?: string;
  /** Input line number (runner) */
  line?: number;
}

/**
 * Full log entry combining base fields and context
 */
export interface LogEntry extends BaseLogEntry, LogContext {}

/**
 * Configuration for OracleLogger
 */
export interface OracleLoggerConfig {
  /** Component name to include in all logs */
  component: string;
  /** Whether to enable logging (default: true) */
  enabled?: boolean;
  /** Service name (default: 'price-oracle') */
  service?: string;
  /** Application name (default: 'oracle') */
  app?: string;
  /** Environment (e.g., 'production', 'staging', 'development') */
  environment?: string;
}

// ============================================================================
// IOracleLogger Interface
// ============================================================================

/**
 * Interface for oracle loggers
 *
 * Enables dependency injection and testability.
 */
export interface IOracleLogger {
  info(event: LogEventType, context?: LogContext): void;
  warn(event: LogEventType, context?: LogContext): void;
  error(event: LogEventType, context?: LogContext): void;
  isEnabled(): boolean;
}

// ============================================================================
// OracleLogger Implementation
// ============================================================================

/** Maximum error message length to prevent log bloat */
const MAX_ERROR_MESSAGE_LENGTH = 200;

/**
 * Structured JSON logger
 *
 * @example
 * const logger = new OracleLogger({ component: 'OracleService' });
 *
 * logger.info(LogEvents.PRICE_FED, { symbol: 'mAPPL', price: '1.2' });
 *
 * // Outputs:
 * // {"symbol":"mAPPL","price":"1.2","timestamp":"...","level":"INFO","component":"OracleService",...}
 */
export class OracleLogger implements IOracleLogger {
  private readonly config: {
    readonly component: string;
    readonly service: string;
    readonly app: string;
    readonly environment: string;
  };
  private readonly enabled: boolean;

  constructor(config: OracleLoggerConfig) {
    this.enabled = config.enabled ?? true;
    this.config = {
      component: config.component,
      service: config.service ?? 'price-oracle',
      app: config.app ?? 'oracle',
      environment: config.environment ?? process.env.NODE_ENV ?? 'development',
    };
  }

  // ============================================================================
  // Public API
  // ============================================================================

  /**
   * Normal operational events: instantiation, executed commands, price feeds.
   */
  info(event: LogEventType, context?: LogContext): void {
    this.log('INFO', event, context);
  }

  /**
   * Rejected commands and queries (unauthorized, unknown symbol, bad input).
   */
  warn(event: LogEventType, context?: LogContext): void {
    this.log('WARN', event, context);
  }

  /**
   * Failures of the store or the process itself.
   */
  error(event: LogEventType, context?: LogContext): void {
    this.log('ERROR', event, context);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Sanitize error message to prevent log bloat
   */
  static sanitizeErrorMessage(error: unknown): string {
    const msg = error instanceof Error ? error.message : String(error);
    if (msg.length > MAX_ERROR_MESSAGE_LENGTH) {
      return msg.substring(0, MAX_ERROR_MESSAGE_LENGTH) + '...';
    }
    return msg;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /**
   * Base fields are applied after context so context cannot override them.
   */
  private log(level: LogLevel, event: LogEventType, context?: LogContext): void {
    if (!this.enabled) {
      return;
    }

    const entry: LogEntry = {
      ...context,
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      event,
      _service: this.config.service,
      _app: this.config.app,
      _env: this.config.environment,
    };

    console.log(JSON.stringify(entry));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a logger for the oracle service
 */
export function createOracleLogger(
  options?: Partial<Omit<OracleLoggerConfig, 'component'>>
): IOracleLogger {
  return new OracleLogger({
    component: 'OracleService',
    ...options,
  });
}
