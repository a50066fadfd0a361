export type * from './types/models.js';
export * from './errors.js';
export { loadConfig, type MonitorConfig } from './config.js';
export { createContainer, type Container } from './container.js';
export { createProductionContainer, createLogProvider } from './container.production.js';
export { PollingScheduler, type PollingSchedulerOptions } from './scheduler.js';
export { DiscrepancyDetector } from './services/DiscrepancyDetector.js';
export { ReuseAnalyzer } from './services/ReuseAnalyzer.js';
export { formatDiscrepancy } from './services/AlertFormatter.js';
export { MonitorService, type MonitorServiceOptions, type RunOptions } from './services/MonitorService.js';
export {
  buildFingerprintSet,
  disagreementIdentity,
  normalizeHex,
  sameIdentity,
} from './services/fingerprints.js';
export type { IPoiRepository } from './repositories/IPoiRepository.js';
export type { INotificationRepository } from './repositories/INotificationRepository.js';
export { SupabasePoiRepository } from './repositories/SupabasePoiRepository.js';
export { SupabaseNotificationRepository } from './repositories/SupabaseNotificationRepository.js';
export * from './providers/index.js';
