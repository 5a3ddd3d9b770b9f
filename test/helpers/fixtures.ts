/**
 * Test fixtures for anomaly detection
 * ====================================
 * 
 * Factory functions for samples, histories and training sets.
 */

import { engineerFeatures } from '../../src/ai/anomaly/features';
import { HistoryStore } from '../../src/ai/anomaly/history';
import type { FeatureRecord, Sample } from '../../src/ai/anomaly/types';
import type { Logger } from '../../src/logging/logger';

export const T0 = Date.UTC(2026, 0, 1, 0, 0, 0);

export function createSample(overrides: Partial<Sample> = {}): Sample {
	return {
		deviceId: 'meter-01',
		timestamp: new Date(T0),
		voltage: 230,
		current: 5,
		power: 1150,
		...overrides,
	};
}

/**
 * Samples that follow power = voltage * current exactly.
 * Voltage cycles 220..240 and current 2..8 independently.
 */
export function createOhmicSamples(count: number, deviceId = 'meter-01'): Sample[] {
	return Array.from({ length: count }, (_, i) => {
		const voltage = 220 + 5 * (i % 5);
		const current = 2 + (i % 7);
		return createSample({
			deviceId,
			timestamp: new Date(T0 + i * 1000),
			voltage,
			current,
			power: voltage * current,
		});
	});
}

export function createOhmicRecords(count: number): FeatureRecord[] {
	return createOhmicSamples(count).map(engineerFeatures);
}

/**
 * History holding the given samples, oldest first
 */
export function historyOf(samples: Sample[], capacity = 1000): HistoryStore {
	const history = new HistoryStore(capacity);
	for (const sample of samples) {
		history.append(engineerFeatures(sample));
	}
	return history;
}

export function createMockLogger(): jest.Mocked<Logger> {
	return {
		debug: jest.fn(),
		info: jest.fn(),
		warn: jest.fn(),
		error: jest.fn(),
	};
}

/**
 * Manually advanced clock for retraining tests
 */
export class FakeClock {
	constructor(private current: number = T0) {}

	now = (): number => this.current;

	advance(ms: number): void {
		this.current += ms;
	}
}
