/**
 * Configuration Module
 * ====================
 * 
 * Environment-driven configuration for the detector service, validated with zod
 */

import { z } from 'zod';
import type { EngineOptions } from '../ai/anomaly/types';

export type Partitioning = 'pooled' | 'device';

export interface MqttConfig {
	brokerUrl: string;
	username?: string;
	password?: string;
	telemetryTopic: string;
	alertTopicPrefix: string;
}

export interface ServiceConfig {
	engine: EngineOptions;
	partitioning: Partitioning;
	mqtt: MqttConfig;
	statusLogIntervalMs: number;
	logLevel: string;
	logFormat: 'json' | 'pretty';
}

export class ConfigValidationError extends Error {
	constructor(readonly issues: string[]) {
		super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
		this.name = 'ConfigValidationError';
	}
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

const EnvSchema = z.object({
	ANOMALY_HISTORY_CAPACITY: positiveInt(1000),
	ANOMALY_WARMUP_SIZE: z.coerce.number().int().min(2).default(10),
	ANOMALY_MIN_TRAINING_SIZE: positiveInt(50),
	ANOMALY_RETRAIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30 * 60 * 1000),
	ANOMALY_RETRAIN_MODE: z.enum(['sync', 'background']).default('background'),
	ANOMALY_PARTITIONING: z.enum(['pooled', 'device']).default('pooled'),
	ANOMALY_MODEL_DEGREE: z.enum(['1', '2']).default('2'),
	ANOMALY_ZSCORE_THRESHOLD: positiveNumber(2.5),
	ANOMALY_ZSCORE_HIGH: positiveNumber(3.5),
	ANOMALY_IQR_MULTIPLIER: positiveNumber(1.5),
	ANOMALY_IQR_HIGH_FACTOR: positiveNumber(2),
	ANOMALY_PREDICTION_ERROR_THRESHOLD: positiveNumber(0.15),
	ANOMALY_PREDICTION_ERROR_HIGH: positiveNumber(0.3),
	MQTT_BROKER_URL: z.string().url().default('mqtt://localhost:1883'),
	MQTT_USERNAME: z.string().min(1).optional(),
	MQTT_PASSWORD: z.string().min(1).optional(),
	MQTT_TELEMETRY_TOPIC: z.string().min(1).default('telemetry/device/+'),
	MQTT_ALERT_TOPIC_PREFIX: z.string().min(1).default('alerts/device'),
	STATUS_LOG_INTERVAL_MS: z.coerce.number().int().nonnegative().default(30000),
	LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
	LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
})
	.refine(env => env.ANOMALY_ZSCORE_HIGH >= env.ANOMALY_ZSCORE_THRESHOLD, {
		message: 'ANOMALY_ZSCORE_HIGH must not be below ANOMALY_ZSCORE_THRESHOLD',
		path: ['ANOMALY_ZSCORE_HIGH'],
	})
	.refine(env => env.ANOMALY_PREDICTION_ERROR_HIGH >= env.ANOMALY_PREDICTION_ERROR_THRESHOLD, {
		message: 'ANOMALY_PREDICTION_ERROR_HIGH must not be below ANOMALY_PREDICTION_ERROR_THRESHOLD',
		path: ['ANOMALY_PREDICTION_ERROR_HIGH'],
	})
	.refine(env => env.ANOMALY_MIN_TRAINING_SIZE <= env.ANOMALY_HISTORY_CAPACITY, {
		message: 'ANOMALY_MIN_TRAINING_SIZE cannot exceed ANOMALY_HISTORY_CAPACITY',
		path: ['ANOMALY_MIN_TRAINING_SIZE'],
	});

/**
 * Load configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
	const present = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
	);

	const parsed = EnvSchema.safeParse(present);
	if (!parsed.success) {
		throw new ConfigValidationError(
			parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
		);
	}

	const e = parsed.data;
	return {
		engine: {
			historyCapacity: e.ANOMALY_HISTORY_CAPACITY,
			warmupSize: e.ANOMALY_WARMUP_SIZE,
			minTrainingSize: e.ANOMALY_MIN_TRAINING_SIZE,
			retrainIntervalMs: e.ANOMALY_RETRAIN_INTERVAL_MS,
			retrainMode: e.ANOMALY_RETRAIN_MODE,
			modelDegree: e.ANOMALY_MODEL_DEGREE === '1' ? 1 : 2,
			thresholds: {
				zScore: e.ANOMALY_ZSCORE_THRESHOLD,
				zScoreHigh: e.ANOMALY_ZSCORE_HIGH,
				iqrMultiplier: e.ANOMALY_IQR_MULTIPLIER,
				iqrHighFactor: e.ANOMALY_IQR_HIGH_FACTOR,
				predictionError: e.ANOMALY_PREDICTION_ERROR_THRESHOLD,
				predictionErrorHigh: e.ANOMALY_PREDICTION_ERROR_HIGH,
			},
		},
		partitioning: e.ANOMALY_PARTITIONING,
		mqtt: {
			brokerUrl: e.MQTT_BROKER_URL,
			username: e.MQTT_USERNAME,
			password: e.MQTT_PASSWORD,
			telemetryTopic: e.MQTT_TELEMETRY_TOPIC,
			alertTopicPrefix: e.MQTT_ALERT_TOPIC_PREFIX,
		},
		statusLogIntervalMs: e.STATUS_LOG_INTERVAL_MS,
		logLevel: e.LOG_LEVEL,
		logFormat: e.LOG_FORMAT,
	};
}

/**
 * Human-readable configuration summary for startup logs
 */
export function getConfigSummary(config: ServiceConfig): string {
	const { engine } = config;
	return `
Anomaly Detection Configuration:
  Partitioning: ${config.partitioning}
  History Capacity: ${engine.historyCapacity}
  Warm-up Size: ${engine.warmupSize}
  Min Training Size: ${engine.minTrainingSize}
  Retrain Interval: ${engine.retrainIntervalMs / 1000}s (${engine.retrainMode})
  Model Degree: ${engine.modelDegree}
  Z-Score Threshold: ${engine.thresholds.zScore} (high > ${engine.thresholds.zScoreHigh})
  Prediction Error Threshold: ${(engine.thresholds.predictionError * 100).toFixed(0)}% (high > ${(engine.thresholds.predictionErrorHigh * 100).toFixed(0)}%)
  Telemetry Topic: ${config.mqtt.telemetryTopic}
	`.trim();
}
