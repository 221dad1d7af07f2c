/**
 * Service lifecycle orchestrator - library entry point
 *
 * Run the demo from the command line with `service-orchestrator run`.
 */
export { describeRegistry, runDemo } from './app';
export { ServerConfig } from './config/server-config';
export type { ServerConfigData } from './config/server-config';
export {
  DependencyCycleError,
  OrchestratorError,
  ServiceNotFoundError,
  TypeMismatchError,
} from './errors';
export { BaseService } from './services/base/base.service';
export {
  BUILTIN_SERVICES,
  EmailService,
  NotificationService,
  registerBuiltinServices,
  TestService,
} from './services/builtin';
export { consoleReporter, createLineLogger } from './services/core/lifecycle-reporter';
export type { LifecycleReporter, LineLogger } from './services/core/lifecycle-reporter';
export { withService, withServiceAsync } from './services/core/scoped-service';
export type {
  LifecycleService,
  RegistrationOptions,
  RegistryEntry,
  ServiceDependencies,
  ServiceFactory,
} from './services/core/service.interface';
export { ServiceManager } from './services/core/service-manager';
export type { ServiceManagerOptions } from './services/core/service-manager';
export { defaultRegistry, ServiceRegistry } from './services/core/service-registry.service';
export { ValidatedField } from './utils/validated-field';
