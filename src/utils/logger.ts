import pino, { Logger } from 'pino';

/**
 * Structured logging context attached to child loggers
 */
export interface LogContext {
  component?: string;
  operation?: string;
  [key: string]: unknown;
}

function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
}

/**
 * Resolve the log level: LOG_LEVEL wins, tests are silent by default
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  return isTestEnvironment() ? 'silent' : 'info';
}

/**
 * Simple logger configuration.
 * Logs go to stderr; stdout is reserved for lifecycle announcements.
 */
function createSimpleLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(),
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    },
    process.stderr,
  );
}

let rootLogger: Logger | undefined;

/**
 * Get or create the root logger
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createSimpleLogger();
  }
  return rootLogger;
}

/**
 * Create a child logger with component-specific context
 */
export function createLogger(componentName: string, baseContext: LogContext = {}): Logger {
  return getRootLogger().child({ component: componentName, ...baseContext });
}

/**
 * Component-specific logger factories
 */
export const loggers = {
  registry: () => createLogger('ServiceRegistry'),
  manager: () => createLogger('ServiceManager'),
  cli: () => createLogger('CLI'),
} as const;

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
