// ============================================================================
// Logger
// ============================================================================

/**
 * Sink for operator-facing diagnostic lines. The format is informative only.
 */
export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/**
 * Wrap a logger so every line carries a `[bench-matrix:<scope>] [LEVEL]` prefix.
 *
 * @example
 * ```typescript
 * const log = createScopedLogger(consoleLogger, "sync");
 * log.warn("Suite 'Sort': global teardown failed");
 * // [bench-matrix:sync] [WARN] Suite 'Sort': global teardown failed
 * ```
 */
export function createScopedLogger(logger: Logger, scope: string): Logger {
  const prefix = `[bench-matrix:${scope}]`;
  return {
    info: (message) => logger.info(`${prefix} ${message}`),
    warn: (message) => logger.warn(`${prefix} [WARN] ${message}`),
    error: (message) => logger.error(`${prefix} [ERROR] ${message}`),
  };
}
