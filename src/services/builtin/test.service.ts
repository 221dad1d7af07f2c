import { BaseService } from '../base/base.service';

export class TestService extends BaseService {
  protected onStartup(): void {
    this.reporter.announce('TestService is starting up...');
  }

  protected onShutdown(): void {
    this.reporter.announce('TestService is shutting down...');
  }
}
