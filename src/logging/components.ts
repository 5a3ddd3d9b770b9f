/**
 * Logging Component Names
 * 
 * Standardized component names for structured logging.
 * Use these constants instead of hardcoded strings to ensure consistency.
 * 
 * Usage:
 *   logger.info('Model retrained', { component: LogComponents.PREDICTOR });
 */

export const LogComponents = {
  // Service
  SERVICE: 'Service',
  CONFIG: 'Config',

  // Detection
  ANOMALY_ENGINE: 'AnomalyEngine',
  STATISTICAL_DETECTOR: 'StatisticalDetector',
  PREDICTIVE_DETECTOR: 'PredictiveDetector',
  PREDICTOR: 'PowerPredictor',

  // Transport
  MQTT: 'Mqtt',
  TELEMETRY_SUBSCRIBER: 'TelemetrySubscriber',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
