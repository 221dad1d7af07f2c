import { ServerConfig } from '../../config/server-config';
import { consoleReporter, LifecycleReporter } from '../core/lifecycle-reporter';
import { LifecycleService } from '../core/service.interface';

/**
 * Base class for managed services.
 *
 * start() and stop() run the onStartup()/onShutdown() hooks and then announce
 * the transition. A hook that throws aborts the call before the announcement.
 * This class is never registered; concrete services are.
 */
export abstract class BaseService implements LifecycleService {
  protected readonly config: ServerConfig;
  protected readonly reporter: LifecycleReporter;

  constructor(config: ServerConfig, reporter: LifecycleReporter = consoleReporter) {
    this.config = config;
    this.reporter = reporter;
  }

  get serviceName(): string {
    return this.constructor.name;
  }

  start(): void {
    this.onStartup();
    this.reporter.announce(`${this.serviceName} started.`);
  }

  stop(): void {
    this.onShutdown();
    this.reporter.announce(`${this.serviceName} stopped.`);
  }

  /**
   * Shorthand for start()
   */
  run(): void {
    this.start();
  }

  protected onStartup(): void {}

  protected onShutdown(): void {}

  toString(): string {
    return `${this.serviceName}(${this.config.host}:${this.config.port})`;
  }
}
