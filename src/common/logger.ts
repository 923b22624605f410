/**
 * Logging utility for the monitoring summary library
 * Provides configurable logging for the registry, store and aggregator components
 */

export interface LoggingConfig {
  enableRegistryLogs?: boolean;
  enableStoreLogs?: boolean;
  enableAggregatorLogs?: boolean;
  enableTestMode?: boolean;
}

export class SummaryLogger {
  private readonly config: LoggingConfig;

  constructor(config: LoggingConfig = {}) {
    this.config = { ...config };
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log schema registry messages (definition loading, version checks)
   */
  registry(message: string, ...args: unknown[]): void {
    if (this.config.enableRegistryLogs && !this.config.enableTestMode) {
      console.log(`[REGISTRY] ${message}`, ...args);
    }
  }

  /**
   * Log coordination store reads and writes
   */
  store(message: string, ...args: unknown[]): void {
    if (this.config.enableStoreLogs && !this.config.enableTestMode) {
      console.log(`[STORE] ${message}`, ...args);
    }
  }

  /**
   * Log summary rollup messages
   */
  aggregator(message: string, ...args: unknown[]): void {
    if (this.config.enableAggregatorLogs && !this.config.enableTestMode) {
      console.log(`[AGGREGATOR] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): SummaryLogger {
  return new SummaryLogger(config);
}

