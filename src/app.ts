import { ServerConfig } from './config/server-config';
import { registerBuiltinServices } from './services/builtin';
import { consoleReporter, LifecycleReporter } from './services/core/lifecycle-reporter';
import { ServiceManager } from './services/core/service-manager';
import { defaultRegistry, ServiceRegistry } from './services/core/service-registry.service';

export interface RunDemoOptions {
  host: unknown;
  port: unknown;
  reporter?: LifecycleReporter;
  registry?: ServiceRegistry;
}

/**
 * Register the built-in services, then load, start and stop all of them
 * against one configuration, announcing each phase.
 */
export function runDemo(options: RunDemoOptions): ServiceManager {
  const reporter = options.reporter ?? consoleReporter;
  const registry = registerBuiltinServices(options.registry ?? defaultRegistry);

  const config = new ServerConfig(options.host, options.port);
  const manager = new ServiceManager({ registry, reporter });

  reporter.announce(`Registered Services: ${manager.registry.describe()}`);

  manager.loadServices(config);

  reporter.announce('');
  reporter.announce('Starting all services:');
  manager.startAll();

  reporter.announce('');
  reporter.announce('Stopping all services:');
  manager.stopAll();

  return manager;
}

/**
 * One line per registry entry, with declared dependencies after an arrow
 */
export function describeRegistry(registry: ServiceRegistry): string[] {
  return registry.entries().map((entry) =>
    entry.dependencies.length > 0
      ? `${entry.name} -> ${entry.dependencies.join(', ')}`
      : entry.name,
  );
}
