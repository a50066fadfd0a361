/**
 * Production container: Supabase ledger and POI store, Slack sink, Graphix discovery.
 * Logs go to Axiom when configured, otherwise to stdout as JSON lines.
 */

import { createContainer, type Container } from './container.js';
import type { MonitorConfig } from './config.js';
import { createSupabaseClient } from './db.js';
import { SupabasePoiRepository } from './repositories/SupabasePoiRepository.js';
import { SupabaseNotificationRepository } from './repositories/SupabaseNotificationRepository.js';
import { SlackNotificationSink } from './providers/SlackNotificationSink.js';
import { GraphixDiscoverySource } from './providers/GraphixDiscoverySource.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';

export function createLogProvider(config: MonitorConfig): ILogProvider {
  return config.axiom
    ? new AxiomLogProvider({
        apiToken: config.axiom.apiKey,
        dataset: config.axiom.dataset,
        minLevel: config.logLevel,
        requestTimeoutMs: config.httpTimeoutMs,
      })
    : new ConsoleLogProvider({
        outputToConsole: true,
        minLevel: config.logLevel,
        retainEvents: false,
      });
}

export function createProductionContainer(
  config: MonitorConfig,
  logProvider: ILogProvider = createLogProvider(config)
): Container {
  const db = createSupabaseClient(config);

  return createContainer({
    poiRepo: new SupabasePoiRepository(db, config.storeTimeoutMs),
    notificationRepo: new SupabaseNotificationRepository(db, config.storeTimeoutMs),
    discovery: new GraphixDiscoverySource(
      {
        apiUrl: config.graphixApiUrl,
        indexerLimit: config.indexerPageSize,
        timeoutMs: config.httpTimeoutMs,
      },
      logProvider
    ),
    sink: new SlackNotificationSink(
      { webhookUrl: config.slackWebhookUrl, timeoutMs: config.httpTimeoutMs },
      logProvider
    ),
    logProvider,
    options: {
      retentionDays: config.notificationRetentionDays,
      stepTimeoutMs: config.keyStepTimeoutMs,
    },
  });
}
