/**
 * In-process stand-in for the MQTT transport
 */

import type { MessageHandler, TelemetryTransport } from '../../src/mqtt/transport';
import { topicMatches } from '../../src/mqtt/transport';

export interface PublishedMessage {
	topic: string;
	payload: string;
}

export class MockTransport implements TelemetryTransport {
	connected = false;
	subscriptions: Array<{ topic: string; handler: MessageHandler }> = [];
	published: PublishedMessage[] = [];
	publishError: Error | null = null;

	async connect(): Promise<void> {
		this.connected = true;
	}

	async subscribe(topic: string, handler: MessageHandler): Promise<void> {
		if (!this.connected) {
			throw new Error('MQTT client not connected');
		}
		this.subscriptions.push({ topic, handler });
	}

	async publish(topic: string, payload: string): Promise<void> {
		if (this.publishError) {
			throw this.publishError;
		}
		this.published.push({ topic, payload });
	}

	async disconnect(): Promise<void> {
		this.connected = false;
	}

	/**
	 * Simulate a message arriving from the broker
	 */
	deliver(topic: string, payload: unknown): void {
		const body = Buffer.from(typeof payload === 'string' ? payload : JSON.stringify(payload));
		for (const subscription of this.subscriptions) {
			if (topicMatches(subscription.topic, topic)) {
				subscription.handler(topic, body);
			}
		}
	}
}
