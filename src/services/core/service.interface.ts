import { ServerConfig } from '../../config/server-config';
import { LifecycleReporter } from './lifecycle-reporter';

/**
 * Capability every managed service exposes
 */
export interface LifecycleService {
  readonly serviceName: string;
  start(): void;
  stop(): void;
}

/**
 * Instances resolved for the dependency names a registry entry declares
 */
export type ServiceDependencies = ReadonlyMap<string, LifecycleService>;

/**
 * Builds a service instance. Factories for services without declared
 * dependencies receive an empty map.
 */
export type ServiceFactory = (
  config: ServerConfig,
  dependencies: ServiceDependencies,
  reporter: LifecycleReporter,
) => LifecycleService;

export interface RegistrationOptions {
  /** Names of registered services this factory needs injected */
  dependencies?: readonly string[];
}

export interface RegistryEntry {
  readonly name: string;
  readonly factory: ServiceFactory;
  readonly dependencies: readonly string[];
}
