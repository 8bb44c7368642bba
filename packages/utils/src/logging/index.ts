/**
 * Package-aware Logging
 * =====================
 * Namespaced loggers shared per package.
 *
 * Usage:
 * ```typescript
 * import { createPackageLogger } from '@tradesim/utils';
 *
 * const logger = createPackageLogger('@tradesim/simulation');
 * logger.info('Simulation started', { signals: 120 });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Get all registered package loggers
 */
export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}

/**
 * Structured log helpers for common operations
 */
export class LogHelpers {
  /**
   * Log the duration of an operation, at warn level when it crosses the threshold
   */
  static performance(
    logger: Logger,
    operation: string,
    durationMs: number,
    context?: LogContext,
    slowThresholdMs = 1000
  ): void {
    const payload = { operation, durationMs, ...context };
    if (durationMs >= slowThresholdMs) {
      logger.warn('Slow operation', payload);
    } else {
      logger.debug('Operation completed', payload);
    }
  }
}
