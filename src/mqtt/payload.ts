/**
 * Telemetry payload validation
 * 
 * Devices publish JSON with PascalCase or camelCase keys, e.g.
 *   {"DeviceIdentifier":"meter-01","Timestamp":"2026-01-01T00:00:00Z","Voltage":230.1,"Current":4.9,"Power":1120.4}
 * Anything that does not validate is rejected here and never reaches the engine.
 */

import { z } from 'zod';
import type { Sample } from '../ai/anomaly/types';

export class MalformedTelemetryError extends Error {
	constructor(readonly reason: string) {
		super(`Malformed telemetry: ${reason}`);
		this.name = 'MalformedTelemetryError';
	}
}

const TimestampSchema = z
	.union([z.string().datetime({ offset: true }), z.number().int().nonnegative()])
	.transform(value => new Date(value));

export const TelemetryPayloadSchema = z.object({
	deviceidentifier: z.string().trim().min(1).optional(),
	deviceid: z.string().trim().min(1).optional(),
	timestamp: TimestampSchema.optional(),
	voltage: z.number().finite(),
	current: z.number().finite(),
	power: z.number().finite(),
	energy: z.number().finite().optional(),
});

export type TelemetryPayload = z.infer<typeof TelemetryPayloadSchema>;

const DEVICE_TOPIC = /^telemetry\/device\/([^/]+)$/;

/**
 * Device id carried in a `telemetry/device/<id>` topic, if any
 */
export function deviceIdFromTopic(topic: string): string | undefined {
	return DEVICE_TOPIC.exec(topic)?.[1];
}

function lowerCaseKeys(value: unknown): unknown {
	if (typeof value !== 'object' || value === null || Array.isArray(value)) {
		return value;
	}
	return Object.fromEntries(Object.entries(value).map(([key, v]) => [key.toLowerCase(), v]));
}

/**
 * Parse a raw MQTT payload into a Sample.
 * The payload's device id wins over the one in the topic.
 */
export function parseTelemetry(topic: string, payload: Buffer | string, receivedAt: Date = new Date()): Sample {
	let json: unknown;
	try {
		json = JSON.parse(payload.toString());
	} catch (error) {
		throw new MalformedTelemetryError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`);
	}

	const parsed = TelemetryPayloadSchema.safeParse(lowerCaseKeys(json));
	if (!parsed.success) {
		const reason = parsed.error.issues
			.map(issue => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
			.join('; ');
		throw new MalformedTelemetryError(reason);
	}

	const data = parsed.data;
	const deviceId = data.deviceidentifier ?? data.deviceid ?? deviceIdFromTopic(topic);
	if (!deviceId) {
		throw new MalformedTelemetryError('missing device identifier');
	}

	return {
		deviceId,
		timestamp: data.timestamp ?? receivedAt,
		voltage: data.voltage,
		current: data.current,
		power: data.power,
	};
}
