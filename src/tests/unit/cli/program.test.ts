import { createProgram } from '../../../cli/program';
import { registerBuiltinServices } from '../../../services/builtin';
import { ServiceRegistry } from '../../../services/core/service-registry.service';
import { RecordingReporter } from '../../utils/recording-reporter';

describe('createProgram', () => {
  let registry: ServiceRegistry;
  let reporter: RecordingReporter;
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let exitSpy: jest.SpyInstance;

  beforeEach(() => {
    registry = registerBuiltinServices(new ServiceRegistry());
    reporter = new RecordingReporter();
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    exitSpy = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit: ${code}`);
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('run', () => {
    it('should be the default command and use the environment defaults', async () => {
      const program = createProgram({ registry, reporter, env: { SERVICE_PORT: '9000' } });

      await program.parseAsync([], { from: 'user' });

      expect(reporter.lines[0]).toBe(
        'Registered Services: TestService, EmailService, NotificationService',
      );
      expect(reporter.lines).toContain('[LOG]: Notification service running at localhost:9000');
      expect(reporter.lines[reporter.lines.length - 1]).toBe('NotificationService stopped.');
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('should let --host and --port override the defaults', async () => {
      const program = createProgram({ registry, reporter, env: {} });

      await program.parseAsync(['run', '--host', 'mail.internal', '--port', '2525'], {
        from: 'user',
      });

      expect(reporter.lines).toContain('[LOG]: Notification service running at mail.internal:2525');
    });

    it('should report an invalid port once and exit with code 1', async () => {
      const program = createProgram({ registry, reporter, env: {} });

      await expect(
        program.parseAsync(['run', '--port', 'http'], { from: 'user' }),
      ).rejects.toThrow('process.exit: 1');

      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith('❌ TypeMismatchError: Expected integer for port');
      expect(reporter.lines).toEqual([]);
    });
  });

  describe('list', () => {
    it('should print the registry with declared dependencies', async () => {
      const program = createProgram({ registry, reporter, env: {} });

      await program.parseAsync(['list'], { from: 'user' });

      expect(logSpy.mock.calls).toEqual([
        ['Registered Services: TestService, EmailService, NotificationService'],
        ['  TestService'],
        ['  EmailService'],
        ['  NotificationService -> EmailService'],
      ]);
      expect(reporter.lines).toEqual([]);
    });
  });
});
