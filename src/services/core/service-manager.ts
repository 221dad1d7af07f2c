import { Logger } from 'pino';

import { ServerConfig } from '../../config/server-config';
import { DependencyCycleError, ServiceNotFoundError } from '../../errors';
import { loggers } from '../../utils/logger';
import { consoleReporter, LifecycleReporter } from './lifecycle-reporter';
import { LifecycleService, RegistryEntry } from './service.interface';
import { defaultRegistry, ServiceRegistry } from './service-registry.service';

export interface ServiceManagerOptions {
  registry?: ServiceRegistry;
  reporter?: LifecycleReporter;
  logger?: Logger;
}

/**
 * Builds every registered service against one configuration and drives
 * start/stop across the built instances in registry order.
 *
 * Declared dependencies are built fresh through getService() for each
 * dependent, so a dependent never shares an instance with the manager's own
 * list. Errors are not isolated: the first failure aborts the operation.
 */
export class ServiceManager {
  private readonly instances: LifecycleService[] = [];
  private readonly serviceRegistry: ServiceRegistry;
  private readonly reporter: LifecycleReporter;
  private readonly logger: Logger;

  constructor(options: ServiceManagerOptions = {}) {
    this.serviceRegistry = options.registry ?? defaultRegistry;
    this.reporter = options.reporter ?? consoleReporter;
    this.logger = options.logger ?? loggers.manager();
  }

  get registry(): ServiceRegistry {
    return this.serviceRegistry;
  }

  /**
   * Instantiate every registered service and append it to the instance list.
   * Calling this again appends a second set.
   */
  loadServices(config: ServerConfig): void {
    this.logger.info({ services: this.serviceRegistry.names() }, 'Loading services');

    for (const entry of this.serviceRegistry.entries()) {
      const instance = this.build(entry, config, []);
      this.instances.push(instance);
      this.logger.debug({ service: entry.name }, 'Service loaded');
    }

    this.logger.info({ count: this.instances.length }, 'Services loaded');
  }

  /**
   * Build a new, unmanaged instance of the named service
   */
  getService(name: string, config: ServerConfig): LifecycleService {
    return this.resolve(name, config, []);
  }

  startAll(): void {
    this.logger.info('Starting all services');
    for (const service of this.instances) {
      service.start();
      this.logger.debug({ service: service.serviceName }, 'Service started');
    }
  }

  stopAll(): void {
    this.logger.info('Stopping all services');
    for (const service of this.instances) {
      service.stop();
      this.logger.debug({ service: service.serviceName }, 'Service stopped');
    }
  }

  getInstances(): readonly LifecycleService[] {
    return this.instances;
  }

  private resolve(name: string, config: ServerConfig, chain: readonly string[]): LifecycleService {
    const entry = this.serviceRegistry.get(name);
    if (!entry) {
      throw new ServiceNotFoundError(name);
    }
    return this.build(entry, config, chain);
  }

  private build(entry: RegistryEntry, config: ServerConfig, chain: readonly string[]): LifecycleService {
    if (chain.includes(entry.name)) {
      throw new DependencyCycleError([...chain, entry.name]);
    }

    const path = [...chain, entry.name];
    const dependencies = new Map<string, LifecycleService>();
    for (const dependencyName of entry.dependencies) {
      dependencies.set(dependencyName, this.resolve(dependencyName, config, path));
      this.logger.debug({ service: entry.name, dependency: dependencyName }, 'Dependency injected');
    }

    return entry.factory(config, dependencies, this.reporter);
  }
}
