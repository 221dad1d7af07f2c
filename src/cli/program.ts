import { Command } from 'commander';

import { describeRegistry, runDemo } from '../app';
import { readEnvSettings } from '../config/env';
import { parsePort } from '../config/server-config';
import '../services/builtin';
import { LifecycleReporter } from '../services/core/lifecycle-reporter';
import { defaultRegistry, ServiceRegistry } from '../services/core/service-registry.service';
import { loggers, toError } from '../utils/logger';

interface RunCommandOptions {
  host: string;
  port: string;
}

export interface ProgramOptions {
  registry?: ServiceRegistry;
  reporter?: LifecycleReporter;
  /** Source of the --host/--port defaults */
  env?: NodeJS.ProcessEnv;
}

/**
 * Build the service-orchestrator command line program
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const logger = loggers.cli();
  const registry = options.registry ?? defaultRegistry;
  const defaults = readEnvSettings(options.env);
  const program = new Command();

  program
    .name('service-orchestrator')
    .description('Register, wire and drive the start/stop lifecycle of the built-in services')
    .version('1.0.0');

  program
    .command('run', { isDefault: true })
    .description('Load every registered service, start them all, then stop them all')
    .option('--host <host>', 'Host passed to every service', defaults.host)
    .option('--port <port>', 'Port passed to every service', String(defaults.port))
    .action((runOptions: RunCommandOptions) => {
      try {
        runDemo({
          host: runOptions.host,
          port: parsePort(runOptions.port),
          reporter: options.reporter,
          registry,
        });
      } catch (error) {
        const err = toError(error);
        logger.debug({ error: err.message, stack: err.stack, command: 'run' }, 'Run failed');
        console.error(`❌ ${err.name}: ${err.message}`);
        process.exit(1);
      }
    });

  program
    .command('list')
    .description('Print the registered services and their declared dependencies')
    .action(() => {
      console.log(`Registered Services: ${registry.describe()}`);
      for (const line of describeRegistry(registry)) {
        console.log(`  ${line}`);
      }
    });

  return program;
}
