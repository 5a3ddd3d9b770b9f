/**
 * TELEMETRY SUBSCRIBER
 * ====================
 * 
 * Bridges the broker and the anomaly engine:
 * 1. receives telemetry messages on the configured topic filter
 * 2. validates them (malformed payloads are dropped here)
 * 3. feeds valid samples to the detector, in arrival order
 * 4. publishes every finding as an alert on `<alertTopicPrefix>/<deviceId>`
 */

import type { Detector, Finding, Sample } from '../ai/anomaly/types';
import type { Logger } from '../logging/logger';
import { errorMeta } from '../logging/logger';
import { LogComponents } from '../logging/components';
import { MalformedTelemetryError, parseTelemetry } from './payload';
import type { TelemetryTransport } from './transport';

export interface TelemetrySubscriberOptions {
	telemetryTopic: string;
	alertTopicPrefix: string;
	logger?: Logger;
	now?: () => number;
}

export interface AlertMessage {
	deviceId: string;
	type: Finding['kind'];
	method: Finding['detectionMethod'];
	metric: Finding['metric'];
	severity: Finding['severity'];
	score: number;
	value: number;
	expectedRange: [number, number];
	message: string;
	timestamp: string;
}

export interface SubscriberStats {
	received: number;
	rejected: number;
	alertsPublished: number;
	publishFailures: number;
}

export function toAlertMessage(sample: Sample, finding: Finding): AlertMessage {
	return {
		deviceId: sample.deviceId,
		type: finding.kind,
		method: finding.detectionMethod,
		metric: finding.metric,
		severity: finding.severity,
		score: finding.score,
		value: finding.value,
		expectedRange: finding.expectedRange,
		message: finding.message,
		timestamp: sample.timestamp.toISOString(),
	};
}

export class TelemetrySubscriber {
	private pending: Promise<void> = Promise.resolve();
	private stopping = false;
	private readonly logger?: Logger;
	private readonly now: () => number;
	private readonly stats: SubscriberStats = {
		received: 0,
		rejected: 0,
		alertsPublished: 0,
		publishFailures: 0,
	};

	constructor(
		private readonly detector: Detector,
		private readonly transport: TelemetryTransport,
		private readonly options: TelemetrySubscriberOptions
	) {
		this.logger = options.logger;
		this.now = options.now ?? Date.now;
	}

	async start(): Promise<void> {
		this.stopping = false;
		await this.transport.connect();
		await this.transport.subscribe(this.options.telemetryTopic, (topic, payload) => {
			if (this.stopping) return;
			this.pending = this.pending.then(() => this.handleMessage(topic, payload));
		});

		this.logger?.info('Telemetry subscriber started', {
			component: LogComponents.TELEMETRY_SUBSCRIBER,
			topic: this.options.telemetryTopic,
		});
	}

	/**
	 * Finish in-flight messages, then close the connection.
	 * Messages arriving after stop() is called are ignored.
	 */
	async stop(): Promise<void> {
		this.stopping = true;
		await this.pending;
		await this.transport.disconnect();
		this.logger?.info('Telemetry subscriber stopped', {
			component: LogComponents.TELEMETRY_SUBSCRIBER,
			...this.stats,
		});
	}

	/**
	 * Resolves when all messages received so far have been processed
	 */
	drain(): Promise<void> {
		return this.pending;
	}

	getStats(): SubscriberStats {
		return { ...this.stats };
	}

	/**
	 * Process one message. Never rejects.
	 */
	async handleMessage(topic: string, payload: Buffer): Promise<void> {
		this.stats.received++;

		let sample: Sample;
		try {
			sample = parseTelemetry(topic, payload, new Date(this.now()));
		} catch (error) {
			this.stats.rejected++;
			this.logger?.warn('Dropping malformed telemetry message', {
				component: LogComponents.TELEMETRY_SUBSCRIBER,
				topic,
				reason: error instanceof MalformedTelemetryError ? error.reason : String(error),
			});
			return;
		}

		let findings: Finding[];
		try {
			findings = await this.detector.ingest(sample);
		} catch (error) {
			this.logger?.error('Detector rejected telemetry sample', {
				component: LogComponents.TELEMETRY_SUBSCRIBER,
				deviceId: sample.deviceId,
				...errorMeta(error),
			});
			return;
		}

		for (const finding of findings) {
			await this.publishAlert(sample, finding);
		}
	}

	private async publishAlert(sample: Sample, finding: Finding): Promise<void> {
		const topic = `${this.options.alertTopicPrefix}/${sample.deviceId}`;
		try {
			await this.transport.publish(topic, JSON.stringify(toAlertMessage(sample, finding)));
			this.stats.alertsPublished++;
		} catch (error) {
			this.stats.publishFailures++;
			this.logger?.error('Failed to publish anomaly alert', {
				component: LogComponents.TELEMETRY_SUBSCRIBER,
				topic,
				kind: finding.kind,
				...errorMeta(error),
			});
		}
	}
}
