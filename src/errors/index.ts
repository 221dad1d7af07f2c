/**
 * Error codes raised by the orchestrator
 */
export type OrchestratorErrorCode = 'SERVICE_NOT_FOUND' | 'TYPE_MISMATCH' | 'DEPENDENCY_CYCLE';

/**
 * Base class for every error the orchestrator throws
 */
export class OrchestratorError extends Error {
  constructor(
    message: string,
    public readonly code: OrchestratorErrorCode,
  ) {
    super(message);
    this.name = 'OrchestratorError';
  }
}

/**
 * A requested service name is absent from the registry
 */
export class ServiceNotFoundError extends OrchestratorError {
  constructor(public readonly serviceName: string) {
    super(`Service '${serviceName}' not found`, 'SERVICE_NOT_FOUND');
    this.name = 'ServiceNotFoundError';
  }
}

/**
 * A validated field received a value of the wrong type
 */
export class TypeMismatchError extends OrchestratorError {
  constructor(
    public readonly field: string,
    public readonly expectedType: string,
  ) {
    super(`Expected ${expectedType} for ${field}`, 'TYPE_MISMATCH');
    this.name = 'TypeMismatchError';
  }
}

/**
 * Declared dependencies loop back onto a service that is already being built
 */
export class DependencyCycleError extends OrchestratorError {
  constructor(public readonly path: readonly string[]) {
    super(`Dependency cycle detected: ${path.join(' -> ')}`, 'DEPENDENCY_CYCLE');
    this.name = 'DependencyCycleError';
  }
}
