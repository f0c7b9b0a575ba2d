#!/usr/bin/env node

import { parseArgs } from 'util';

import { type EnvConfig, loadEnvConfig } from './config';
import { ProbeExecutor } from './monitor/executeProbe';
import { loadMonitorConfig } from './monitor/loadMonitorConfig';
import { ProbeRunner } from './monitor/runTests';
import { createSmtpTransport, EmailNotifier, type MailTransport } from './notify/emailNotifier';
import type { MonitorConfig } from './types/probe';
import { ConfigurationError, getErrorMessage } from './utils/errors';
import { logger } from './utils/logger';

export interface MainDependencies {
  loadEnv?: () => EnvConfig;
  loadConfig?: (filePath: string) => MonitorConfig;
  createTransport?: (env: EnvConfig, config: MonitorConfig) => MailTransport;
  createExecutor?: (env: EnvConfig) => ProbeExecutor;
}

const USAGE = 'Usage: endpoint-monitor [-p|--path <config.json>] [-v|--verbose]';

/**
 * One complete run. Resolves to the process exit code.
 */
export async function main(argv: string[], deps: MainDependencies = {}): Promise<number> {
  let options: { path: string; verbose: boolean };
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        path: { type: 'string', short: 'p', default: './config.json' },
        verbose: { type: 'boolean', short: 'v', default: false },
      },
      strict: true,
    });
    options = { path: values.path ?? './config.json', verbose: values.verbose ?? false };
  } catch (error) {
    logger.error(`${getErrorMessage(error)}\n${USAGE}`);
    return 1;
  }

  if (options.verbose) {
    logger.setLevel('debug');
  }

  let env: EnvConfig;
  let config: MonitorConfig;
  try {
    env = (deps.loadEnv ?? loadEnvConfig)();
    config = (deps.loadConfig ?? loadMonitorConfig)(options.path);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message, error.context);
      return 1;
    }
    throw error;
  }

  const notifier = new EmailNotifier({
    contacts: config.contacts,
    metadata: config.emailMetadata,
    transport: (deps.createTransport ?? ((e, c) => createSmtpTransport(e.smtp, c.contacts)))(env, config),
  });
  const executor = (deps.createExecutor ?? ((e) => new ProbeExecutor({ timeoutMs: e.requestTimeoutMs })))(env);
  const runner = new ProbeRunner({ executor });

  logger.info(`Running ${config.tests.length} test(s) from ${options.path}`);

  try {
    const summary = await runner.runAndNotify(config.tests, config.contacts, notifier);
    if (summary.down.length > 0 || summary.errors.length > 0) {
      logger.warn('API or service tests failed; alerts sent');
    }
    return 0;
  } catch (error) {
    logger.error(`Script encountered an error: ${getErrorMessage(error)}`, {
      stack: error instanceof Error ? error.stack : undefined,
    });
    try {
      await notifier.sendFatalError(error);
    } catch (sendError) {
      logger.error(`Could not report script error: ${getErrorMessage(sendError)}`);
    }
    return 1;
  }
}

// Run if called directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error(`Fatal error: ${getErrorMessage(error)}`);
      process.exitCode = 1;
    });
}
