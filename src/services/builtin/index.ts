import { ServiceFactory } from '../core/service.interface';
import { defaultRegistry, ServiceRegistry } from '../core/service-registry.service';
import { EmailService } from './email.service';
import { EMAIL_DEPENDENCY, NotificationService } from './notification.service';
import { TestService } from './test.service';

export { EmailService } from './email.service';
export { NotificationService } from './notification.service';
export { TestService } from './test.service';

interface BuiltinDefinition {
  name: string;
  factory: ServiceFactory;
  dependencies?: readonly string[];
}

/**
 * Built-in services in registration order
 */
export const BUILTIN_SERVICES: readonly BuiltinDefinition[] = [
  {
    name: 'TestService',
    factory: (config, _dependencies, reporter) => new TestService(config, reporter),
  },
  {
    name: 'EmailService',
    factory: (config, _dependencies, reporter) => new EmailService(config, reporter),
  },
  {
    name: 'NotificationService',
    factory: (config, dependencies, reporter) =>
      NotificationService.fromDependencies(config, dependencies, reporter),
    dependencies: [EMAIL_DEPENDENCY],
  },
];

export function registerBuiltinServices(registry: ServiceRegistry = defaultRegistry): ServiceRegistry {
  for (const definition of BUILTIN_SERVICES) {
    registry.register(definition.name, definition.factory, {
      dependencies: definition.dependencies,
    });
  }
  return registry;
}

// Built-ins are available in the process-wide registry as soon as this module loads
registerBuiltinServices(defaultRegistry);
