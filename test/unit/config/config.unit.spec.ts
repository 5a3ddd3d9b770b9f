import { ConfigValidationError, getConfigSummary, loadConfigFromEnv } from '../../../src/config';
import { DEFAULT_ENGINE_OPTIONS } from '../../../src/ai/anomaly/types';

describe('loadConfigFromEnv', () => {
	it('falls back to defaults for an empty environment', () => {
		const config = loadConfigFromEnv({});

		expect(config.engine).toEqual(DEFAULT_ENGINE_OPTIONS);
		expect(config.partitioning).toBe('pooled');
		expect(config.mqtt).toEqual({
			brokerUrl: 'mqtt://localhost:1883',
			username: undefined,
			password: undefined,
			telemetryTopic: 'telemetry/device/+',
			alertTopicPrefix: 'alerts/device',
		});
		expect(config.statusLogIntervalMs).toBe(30000);
		expect(config.logLevel).toBe('info');
		expect(config.logFormat).toBe('json');
	});

	it('applies overrides from the environment', () => {
		const config = loadConfigFromEnv({
			ANOMALY_HISTORY_CAPACITY: '500',
			ANOMALY_RETRAIN_MODE: 'sync',
			ANOMALY_PARTITIONING: 'device',
			ANOMALY_MODEL_DEGREE: '1',
			ANOMALY_ZSCORE_THRESHOLD: '3',
			ANOMALY_ZSCORE_HIGH: '4',
			MQTT_BROKER_URL: 'mqtt://broker.test:1883',
			MQTT_USERNAME: 'detector',
			MQTT_PASSWORD: 'test-secret',
			LOG_FORMAT: 'pretty',
		});

		expect(config.engine.historyCapacity).toBe(500);
		expect(config.engine.retrainMode).toBe('sync');
		expect(config.engine.modelDegree).toBe(1);
		expect(config.engine.thresholds.zScore).toBe(3);
		expect(config.engine.thresholds.zScoreHigh).toBe(4);
		expect(config.partitioning).toBe('device');
		expect(config.mqtt.brokerUrl).toBe('mqtt://broker.test:1883');
		expect(config.mqtt.username).toBe('detector');
		expect(config.mqtt.password).toBe('test-secret');
		expect(config.logFormat).toBe('pretty');
	});

	it('treats empty strings as unset', () => {
		const config = loadConfigFromEnv({ ANOMALY_HISTORY_CAPACITY: '', MQTT_USERNAME: '' });

		expect(config.engine.historyCapacity).toBe(1000);
		expect(config.mqtt.username).toBeUndefined();
	});

	it('rejects non-numeric values', () => {
		expect.assertions(3);
		try {
			loadConfigFromEnv({ ANOMALY_HISTORY_CAPACITY: 'abc' });
		} catch (error) {
			expect(error).toBeInstanceOf(ConfigValidationError);
			if (error instanceof ConfigValidationError) {
				expect(error.issues).toHaveLength(1);
				expect(error.issues[0].startsWith('ANOMALY_HISTORY_CAPACITY:')).toBe(true);
			}
		}
	});

	it('rejects out-of-range values', () => {
		expect(() => loadConfigFromEnv({ ANOMALY_HISTORY_CAPACITY: '0' })).toThrow(ConfigValidationError);
		expect(() => loadConfigFromEnv({ ANOMALY_RETRAIN_MODE: 'eager' })).toThrow(ConfigValidationError);
		expect(() => loadConfigFromEnv({ MQTT_BROKER_URL: 'not a url' })).toThrow(ConfigValidationError);
	});

	it('rejects a training size larger than the history', () => {
		expect(() => loadConfigFromEnv({ ANOMALY_HISTORY_CAPACITY: '100', ANOMALY_MIN_TRAINING_SIZE: '200' }))
			.toThrow('ANOMALY_MIN_TRAINING_SIZE cannot exceed ANOMALY_HISTORY_CAPACITY');
	});

	it('rejects a high tier below its threshold', () => {
		expect(() => loadConfigFromEnv({ ANOMALY_ZSCORE_THRESHOLD: '4' }))
			.toThrow('ANOMALY_ZSCORE_HIGH must not be below ANOMALY_ZSCORE_THRESHOLD');
	});
});

describe('getConfigSummary', () => {
	it('lists the effective engine settings', () => {
		const summary = getConfigSummary(loadConfigFromEnv({}));

		expect(summary.split('\n')).toEqual(expect.arrayContaining([
			'  Partitioning: pooled',
			'  Retrain Interval: 1800s (background)',
			'  Prediction Error Threshold: 15% (high > 30%)',
		]));
	});
});
