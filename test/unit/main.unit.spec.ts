import { AnomalyEngine } from '../../src/ai/anomaly/engine';
import { PartitionedAnomalyEngine } from '../../src/ai/anomaly/partitioned-engine';
import { loadConfigFromEnv } from '../../src/config';
import { createDetector } from '../../src/main';
import { createMockLogger } from '../helpers/fixtures';

describe('createDetector', () => {
	it('builds a single pooled engine by default', () => {
		const detector = createDetector(loadConfigFromEnv({}), createMockLogger());
		expect(detector).toBeInstanceOf(AnomalyEngine);
	});

	it('builds a per-device engine when partitioning by device', () => {
		const detector = createDetector(loadConfigFromEnv({ ANOMALY_PARTITIONING: 'device' }), createMockLogger());
		expect(detector).toBeInstanceOf(PartitionedAnomalyEngine);
	});

	it('starts with an empty, untrained history', () => {
		const detector = createDetector(loadConfigFromEnv({ ANOMALY_HISTORY_CAPACITY: '200' }), createMockLogger());
		expect(detector.status()).toEqual({ historySize: 0, modelTrained: false, lastTrained: null });
	});
});
