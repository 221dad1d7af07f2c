import { LifecycleReporter } from '../../services/core/lifecycle-reporter';

/**
 * Collects announcements in memory so tests can assert exact lines
 */
export class RecordingReporter implements LifecycleReporter {
  readonly lines: string[] = [];

  announce(line: string): void {
    this.lines.push(line);
  }
}
