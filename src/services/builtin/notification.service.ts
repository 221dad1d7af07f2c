import { ServerConfig } from '../../config/server-config';
import { ServiceNotFoundError } from '../../errors';
import { BaseService } from '../base/base.service';
import {
  consoleReporter,
  createLineLogger,
  LifecycleReporter,
  LineLogger,
} from '../core/lifecycle-reporter';
import { LifecycleService, ServiceDependencies } from '../core/service.interface';

export const EMAIL_DEPENDENCY = 'EmailService';

/**
 * Sends notifications through an injected email service.
 *
 * The email service is borrowed: it is started in onStartup() and stopped in
 * onShutdown(), even though the manager may run another EmailService instance
 * of its own.
 */
export class NotificationService extends BaseService {
  private readonly log: LineLogger;

  constructor(
    config: ServerConfig,
    private readonly emailService: LifecycleService,
    reporter: LifecycleReporter = consoleReporter,
  ) {
    super(config, reporter);
    this.log = createLineLogger(reporter);
  }

  static fromDependencies(
    config: ServerConfig,
    dependencies: ServiceDependencies,
    reporter: LifecycleReporter,
  ): NotificationService {
    const emailService = dependencies.get(EMAIL_DEPENDENCY);
    if (!emailService) {
      throw new ServiceNotFoundError(EMAIL_DEPENDENCY);
    }
    return new NotificationService(config, emailService, reporter);
  }

  protected onStartup(): void {
    this.log(`Notification service running at ${this.config.host}:${this.config.port}`);
    this.emailService.start();
  }

  protected onShutdown(): void {
    this.log('Notification service stopping...');
    this.emailService.stop();
  }
}
