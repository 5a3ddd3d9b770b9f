import { MalformedTelemetryError, deviceIdFromTopic, parseTelemetry } from '../../../src/mqtt/payload';

const RECEIVED_AT = new Date('2026-03-01T12:00:00.000Z');

function parse(topic: string, payload: unknown) {
	return parseTelemetry(topic, Buffer.from(JSON.stringify(payload)), RECEIVED_AT);
}

function reasonOf(fn: () => unknown): string {
	try {
		fn();
	} catch (error) {
		if (error instanceof MalformedTelemetryError) return error.reason;
		throw error;
	}
	throw new Error('expected MalformedTelemetryError');
}

describe('parseTelemetry', () => {
	it('accepts PascalCase device payloads', () => {
		const sample = parse('telemetry/device/meter-01', {
			DeviceIdentifier: 'meter-01',
			Timestamp: '2026-03-01T11:59:58Z',
			Voltage: 230.4,
			Current: 4.8,
			Power: 1105.9,
			Energy: 12.5,
		});

		expect(sample).toEqual({
			deviceId: 'meter-01',
			timestamp: new Date('2026-03-01T11:59:58Z'),
			voltage: 230.4,
			current: 4.8,
			power: 1105.9,
		});
	});

	it('accepts camelCase keys and epoch-millisecond timestamps', () => {
		const sample = parse('telemetry/device/x', {
			deviceId: 'meter-02',
			timestamp: 1767225600000,
			voltage: 229,
			current: 2,
			power: 458,
		});

		expect(sample.deviceId).toBe('meter-02');
		expect(sample.timestamp.toISOString()).toBe('2026-01-01T00:00:00.000Z');
	});

	it('takes the device id from the topic when the payload has none', () => {
		const sample = parse('telemetry/device/meter-03', { voltage: 230, current: 1, power: 230 });

		expect(sample.deviceId).toBe('meter-03');
		expect(sample.timestamp).toEqual(RECEIVED_AT);
	});

	it('rejects invalid JSON', () => {
		expect(() => parseTelemetry('telemetry/device/a', Buffer.from('{not json'), RECEIVED_AT))
			.toThrow(MalformedTelemetryError);
	});

	it('rejects a missing reading', () => {
		expect(reasonOf(() => parse('telemetry/device/a', { voltage: 230, current: 1 }))).toBe('power: Required');
	});

	it('rejects readings sent as strings', () => {
		expect(reasonOf(() => parse('telemetry/device/a', { voltage: '230', current: 1, power: 230 })))
			.toBe('voltage: Expected number, received string');
	});

	it('rejects a sample without any device id', () => {
		expect(reasonOf(() => parse('sensors/raw', { voltage: 230, current: 1, power: 230 })))
			.toBe('missing device identifier');
	});

	it('rejects a non-object payload', () => {
		expect(() => parse('telemetry/device/a', [230, 1, 230])).toThrow(MalformedTelemetryError);
	});
});

describe('deviceIdFromTopic', () => {
	it('extracts the last level of a device telemetry topic', () => {
		expect(deviceIdFromTopic('telemetry/device/meter-01')).toBe('meter-01');
		expect(deviceIdFromTopic('telemetry/device/meter-01/extra')).toBeUndefined();
		expect(deviceIdFromTopic('alerts/device/meter-01')).toBeUndefined();
	});
});
