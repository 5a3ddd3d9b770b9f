/**
 * SLIDING HISTORY STORE
 * =====================
 * 
 * Fixed-capacity FIFO of feature records, backed by a circular buffer so that
 * eviction of the oldest record is O(1).
 */

import type { FeatureRecord, MetricSelector } from './types';

export class HistoryStore {
	readonly capacity: number;
	private readonly records: Array<FeatureRecord | undefined>;
	private head = 0;       // index of the oldest record
	private count = 0;

	constructor(capacity: number = 1000) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
		this.records = new Array<FeatureRecord | undefined>(capacity).fill(undefined);
	}

	/**
	 * Append a record, evicting the oldest once at capacity
	 */
	append(record: FeatureRecord): void {
		const tail = (this.head + this.count) % this.capacity;
		this.records[tail] = record;

		if (this.count < this.capacity) {
			this.count++;
		} else {
			this.head = (this.head + 1) % this.capacity;
		}
	}

	size(): number {
		return this.count;
	}

	/**
	 * One metric across history, oldest first
	 */
	projection(selector: MetricSelector): number[] {
		return this.snapshot().map(selector);
	}

	/**
	 * Copy of all records, oldest first
	 */
	snapshot(): FeatureRecord[] {
		const result: FeatureRecord[] = [];
		for (let i = 0; i < this.count; i++) {
			const record = this.records[(this.head + i) % this.capacity];
			if (record) result.push(record);
		}
		return result;
	}
}
