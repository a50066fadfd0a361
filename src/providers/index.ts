export type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export type { INotificationSink } from './INotificationSink.js';
export { SlackNotificationSink } from './SlackNotificationSink.js';
export type { IDiscoverySource } from './IDiscoverySource.js';
export { GraphixDiscoverySource } from './GraphixDiscoverySource.js';
