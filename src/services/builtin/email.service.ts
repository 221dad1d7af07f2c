import { BaseService } from '../base/base.service';

/**
 * Stand-in mail transport; only announces its connection lifecycle
 */
export class EmailService extends BaseService {
  protected onStartup(): void {
    this.reporter.announce('Connecting to SMTP...');
  }

  protected onShutdown(): void {
    this.reporter.announce('Closing SMTP...');
  }
}
