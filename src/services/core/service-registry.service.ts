import { Logger } from 'pino';

import { loggers } from '../../utils/logger';
import { RegistrationOptions, RegistryEntry, ServiceFactory } from './service.interface';

/**
 * Name-to-factory mapping for service implementations.
 *
 * Registering a name that already exists replaces the factory silently; the
 * entry keeps its original position in iteration order. There is no removal.
 */
export class ServiceRegistry {
  private readonly entriesByName = new Map<string, RegistryEntry>();
  private readonly logger: Logger;

  constructor(logger: Logger = loggers.registry()) {
    this.logger = logger;
  }

  register(name: string, factory: ServiceFactory, options: RegistrationOptions = {}): void {
    const dependencies = [...(options.dependencies ?? [])];
    if (this.entriesByName.has(name)) {
      this.logger.debug({ service: name }, 'Replacing existing registration');
    }
    this.entriesByName.set(name, { name, factory, dependencies });
    this.logger.debug({ service: name, dependencies }, 'Service registered');
  }

  get(name: string): RegistryEntry | undefined {
    return this.entriesByName.get(name);
  }

  has(name: string): boolean {
    return this.entriesByName.has(name);
  }

  names(): string[] {
    return [...this.entriesByName.keys()];
  }

  entries(): RegistryEntry[] {
    return [...this.entriesByName.values()];
  }

  get size(): number {
    return this.entriesByName.size;
  }

  /**
   * Registered names in iteration order, comma separated
   */
  describe(): string {
    return this.names().join(', ');
  }
}

/**
 * Process-wide registry used when no other registry is supplied
 */
export const defaultRegistry = new ServiceRegistry();
