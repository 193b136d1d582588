/**
 * Logging helpers
 *
 * Analyses log per-call summaries at debug level. Building those context
 * objects (sorted slope counts, exclusion tallies) is skipped entirely
 * unless the level is enabled.
 */

import type { Logger } from 'pino';

type LogMethod = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Log with a context object that is only built when the level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param contextBuilder - Called only if the entry will be written
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ analysis: 'deming', n }), 'Deming fit computed');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogMethod,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
