import { LifecycleService } from './service.interface';

/**
 * Start a service, run the block, and stop the service however the block exits.
 * If start() throws, the block does not run and stop() is not called.
 */
export function withService<S extends LifecycleService, R>(service: S, block: (service: S) => R): R {
  service.start();
  try {
    return block(service);
  } finally {
    service.stop();
  }
}

/**
 * Async variant of withService: stop() runs once the block's promise settles
 */
export async function withServiceAsync<S extends LifecycleService, R>(
  service: S,
  block: (service: S) => Promise<R>,
): Promise<R> {
  service.start();
  try {
    return await block(service);
  } finally {
    service.stop();
  }
}
