#!/usr/bin/env node
/**
 * Service entry point: load config, wire the production container and poll
 * until SIGINT/SIGTERM.
 */

import 'dotenv/config';
import { loadConfig, type MonitorConfig } from '../config.js';
import { createLogProvider, createProductionContainer } from '../container.production.js';
import { errorFields } from '../errors.js';
import { ConsoleLogProvider } from '../providers/ConsoleLogProvider.js';
import { PollingScheduler } from '../scheduler.js';

async function main(): Promise<number> {
  let config: MonitorConfig;
  try {
    config = loadConfig();
  } catch (err) {
    new ConsoleLogProvider({ outputToConsole: true, retainEvents: false }).error(
      'Failed to initialize components',
      errorFields(err)
    );
    return 1;
  }

  const logProvider = createLogProvider(config);
  logProvider.info('Starting POI Monitor service...');
  const container = createProductionContainer(config, logProvider);
  const scheduler = new PollingScheduler(container.monitorService, logProvider, {
    intervalMs: config.checkIntervalSeconds * 1000,
  });
  logProvider.info('Successfully initialized all components', {
    checkIntervalSeconds: config.checkIntervalSeconds,
    retentionDays: config.notificationRetentionDays,
  });

  const shutdown = (signal: string): void => {
    logProvider.info('Shutting down POI Monitor service...', { signal });
    void scheduler.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  let exitCode = 0;
  try {
    await scheduler.start();
  } catch (err) {
    logProvider.error('Unexpected error', errorFields(err));
    exitCode = 1;
  }
  await logProvider.flush();
  return exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
