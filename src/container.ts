/**
 * Dependency wiring.
 * Constructs all services with their collaborators.
 * Production passes Supabase/Slack/Graphix implementations; tests pass mocks.
 */

import type { IPoiRepository } from './repositories/IPoiRepository.js';
import type { INotificationRepository } from './repositories/INotificationRepository.js';
import type { IDiscoverySource } from './providers/IDiscoverySource.js';
import type { INotificationSink } from './providers/INotificationSink.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { DiscrepancyDetector } from './services/DiscrepancyDetector.js';
import { ReuseAnalyzer } from './services/ReuseAnalyzer.js';
import { MonitorService, type MonitorServiceOptions } from './services/MonitorService.js';

export interface Container {
  detector: DiscrepancyDetector;
  reuseAnalyzer: ReuseAnalyzer;
  monitorService: MonitorService;
  notificationRepo: INotificationRepository;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  poiRepo: IPoiRepository;
  notificationRepo: INotificationRepository;
  discovery: IDiscoverySource;
  sink: INotificationSink;
  logProvider: ILogProvider;
  options: MonitorServiceOptions;
}): Container {
  const detector = new DiscrepancyDetector(deps.poiRepo, deps.notificationRepo);
  const reuseAnalyzer = new ReuseAnalyzer(deps.poiRepo, deps.logProvider);
  const monitorService = new MonitorService(
    deps.discovery,
    detector,
    reuseAnalyzer,
    deps.sink,
    deps.notificationRepo,
    deps.logProvider,
    deps.options
  );

  return {
    detector,
    reuseAnalyzer,
    monitorService,
    notificationRepo: deps.notificationRepo,
    logProvider: deps.logProvider,
  };
}
