/**
 * Detector service entry point
 * 
 * Loads configuration from the environment, connects to the broker and feeds
 * telemetry through the anomaly engine until SIGINT/SIGTERM.
 */

import { AnomalyEngine } from './ai/anomaly/engine';
import { PartitionedAnomalyEngine } from './ai/anomaly/partitioned-engine';
import type { Detector } from './ai/anomaly/types';
import { getConfigSummary, loadConfigFromEnv } from './config';
import type { ServiceConfig } from './config';
import { LogComponents } from './logging/components';
import { createLogger, errorMeta } from './logging/logger';
import type { Logger } from './logging/logger';
import { TelemetrySubscriber } from './mqtt/telemetry-subscriber';
import { MqttTransport } from './mqtt/transport';

export interface DetectorService {
	detector: Detector;
	subscriber: TelemetrySubscriber;
	stop(): Promise<void>;
}

export function createDetector(config: ServiceConfig, logger: Logger): Detector {
	const options = { ...config.engine, logger };
	return config.partitioning === 'device'
		? new PartitionedAnomalyEngine(options)
		: new AnomalyEngine(options);
}

export async function startService(config: ServiceConfig, logger: Logger): Promise<DetectorService> {
	const detector = createDetector(config, logger);
	const transport = new MqttTransport({
		brokerUrl: config.mqtt.brokerUrl,
		username: config.mqtt.username,
		password: config.mqtt.password,
		logger,
	});
	const subscriber = new TelemetrySubscriber(detector, transport, {
		telemetryTopic: config.mqtt.telemetryTopic,
		alertTopicPrefix: config.mqtt.alertTopicPrefix,
		logger,
	});

	await subscriber.start();

	const statusTimer = config.statusLogIntervalMs > 0
		? setInterval(() => {
			logger.info('Detector status', {
				component: LogComponents.SERVICE,
				...detector.status(),
				...subscriber.getStats(),
			});
		}, config.statusLogIntervalMs)
		: undefined;

	return {
		detector,
		subscriber,
		async stop() {
			if (statusTimer) clearInterval(statusTimer);
			await subscriber.stop();
		},
	};
}

async function main(): Promise<void> {
	const config = loadConfigFromEnv();
	const logger = createLogger({ level: config.logLevel, format: config.logFormat });

	logger.info(getConfigSummary(config), { component: LogComponents.CONFIG });

	const service = await startService(config, logger);

	const shutdown = (signal: string) => {
		logger.info('Shutting down', { component: LogComponents.SERVICE, signal });
		service.stop().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error('Shutdown failed', { component: LogComponents.SERVICE, ...errorMeta(error) });
				process.exit(1);
			}
		);
	};
	process.once('SIGINT', () => shutdown('SIGINT'));
	process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
	main().catch((error: unknown) => {
		console.error('Detector service failed to start:', error);
		process.exit(1);
	});
}
