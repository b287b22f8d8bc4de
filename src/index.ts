export * from './features/update';
export { getCheckerConfiguration, parseLogLevel, normalizePresentationSize } from './configuration/settings';
export type { CheckerConfiguration, LogLevel, PresentationSize } from './configuration/settings';
export { logger } from './utils/logger';
export type { Logger, LogSink } from './utils/logger';
