/**
 * Sink for the human-readable lines services print while starting and stopping
 */
export interface LifecycleReporter {
  announce(line: string): void;
}

/**
 * Writes announcements to stdout
 */
export const consoleReporter: LifecycleReporter = {
  announce(line: string): void {
    console.log(line);
  },
};

export type LineLogger = (message: string) => void;

/**
 * Logging helper for services that report free-form messages: prefixes
 * every message with "[LOG]: ".
 */
export function createLineLogger(reporter: LifecycleReporter): LineLogger {
  return (message: string): void => {
    reporter.announce(`[LOG]: ${message}`);
  };
}
