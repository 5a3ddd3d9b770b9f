/**
 * Per-device detection: one AnomalyEngine (history + model) per device id,
 * created on first sight of the device.
 *
 * Engines are never evicted, so memory is bounded by one engine (and at most
 * historyCapacity records) per device id seen.
 */

import { AnomalyEngine } from './engine';
import type { AnomalyEngineOptions } from './engine';
import type { Detector, EngineStatus, Finding, Sample } from './types';

export interface PartitionedStatus extends EngineStatus {
	partitions: number;
}

export class PartitionedAnomalyEngine implements Detector {
	private readonly engines = new Map<string, AnomalyEngine>();

	constructor(private readonly options: AnomalyEngineOptions = {}) {}

	ingest(sample: Sample): Promise<Finding[]> {
		return this.engineFor(sample.deviceId).ingest(sample);
	}

	status(): PartitionedStatus {
		let historySize = 0;
		let modelTrained = false;
		let lastTrained: Date | null = null;

		for (const engine of this.engines.values()) {
			const status = engine.status();
			historySize += status.historySize;
			modelTrained = modelTrained || status.modelTrained;
			if (status.lastTrained && (!lastTrained || status.lastTrained > lastTrained)) {
				lastTrained = status.lastTrained;
			}
		}

		return { historySize, modelTrained, lastTrained, partitions: this.engines.size };
	}

	/**
	 * Status of a single device, undefined if it has not reported yet
	 */
	deviceStatus(deviceId: string): EngineStatus | undefined {
		return this.engines.get(deviceId)?.status();
	}

	async whenIdle(): Promise<void> {
		await Promise.all(Array.from(this.engines.values(), engine => engine.whenIdle()));
	}

	private engineFor(deviceId: string): AnomalyEngine {
		let engine = this.engines.get(deviceId);
		if (!engine) {
			engine = new AnomalyEngine(this.options);
			this.engines.set(deviceId, engine);
		}
		return engine;
	}
}
