export * from './ai/anomaly';
export { loadConfigFromEnv, getConfigSummary, ConfigValidationError } from './config';
export type { ServiceConfig, MqttConfig, Partitioning } from './config';
export { createLogger, logger } from './logging/logger';
export type { Logger, LogMeta } from './logging/logger';
export { LogComponents } from './logging/components';
export { TelemetrySubscriber, toAlertMessage } from './mqtt/telemetry-subscriber';
export type { AlertMessage, SubscriberStats, TelemetrySubscriberOptions } from './mqtt/telemetry-subscriber';
export { MqttTransport, topicMatches } from './mqtt/transport';
export type { TelemetryTransport, MessageHandler } from './mqtt/transport';
export { parseTelemetry, MalformedTelemetryError, deviceIdFromTopic } from './mqtt/payload';
export { createDetector, startService } from './main';
