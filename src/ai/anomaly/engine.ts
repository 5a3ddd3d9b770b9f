/**
 * ANOMALY ENGINE - MAIN ORCHESTRATOR
 * ===================================
 * 
 * Owns the sliding history and the power predictor. Every ingest runs as one
 * critical section: feature engineering, history append, statistical and
 * predictive detection, and the retraining guard. Model fits may run after the
 * critical section (background mode) and publish their result with a single
 * reference swap.
 */

import type { Logger } from '../../logging/logger';
import { errorMeta } from '../../logging/logger';
import { LogComponents } from '../../logging/components';
import { PredictiveDetector, StatisticalDetector } from './detectors';
import { engineerFeatures } from './features';
import { HistoryStore } from './history';
import { PowerPredictor } from './predictor';
import { RidgePolynomialRegressor } from './regression';
import type { Regressor } from './regression';
import {
	DEFAULT_ENGINE_OPTIONS,
	type DetectionThresholds,
	type Detector,
	type EngineOptions,
	type EngineStatus,
	type FeatureRecord,
	type Finding,
	type Sample,
} from './types';

export interface AnomalyEngineOptions extends Partial<Omit<EngineOptions, 'thresholds'>> {
	thresholds?: Partial<DetectionThresholds>;
	logger?: Logger;
	now?: () => number;
	regressor?: Regressor;
}

export class AnomalyEngine implements Detector {
	private readonly options: EngineOptions;
	private readonly history: HistoryStore;
	private readonly predictor: PowerPredictor;
	private readonly statistical: StatisticalDetector;
	private readonly predictive: PredictiveDetector;
	private readonly logger?: Logger;
	private readonly now: () => number;
	private queue: Promise<void> = Promise.resolve();
	private retraining: Promise<void> | null = null;

	constructor(options: AnomalyEngineOptions = {}) {
		const { logger, now, regressor, thresholds, ...rest } = options;
		this.options = {
			...DEFAULT_ENGINE_OPTIONS,
			...rest,
			thresholds: { ...DEFAULT_ENGINE_OPTIONS.thresholds, ...thresholds },
		};
		this.logger = logger;
		this.now = now ?? Date.now;

		this.history = new HistoryStore(this.options.historyCapacity);
		this.predictor = new PowerPredictor({
			regressor: regressor ?? new RidgePolynomialRegressor({ degree: this.options.modelDegree }),
			minTrainingSize: this.options.minTrainingSize,
			now: this.now,
		});
		this.statistical = new StatisticalDetector(this.options.thresholds, this.options.warmupSize, logger);
		this.predictive = new PredictiveDetector(this.options.thresholds, logger);
	}

	/**
	 * Process one sample and return its findings: statistical first, then the
	 * predictive finding if any. Never rejects for internal faults.
	 */
	ingest(sample: Sample): Promise<Finding[]> {
		return this.serialize(() => this.process(sample));
	}

	status(): EngineStatus {
		const lastTrained = this.predictor.lastTrained();
		return {
			historySize: this.history.size(),
			modelTrained: this.predictor.isReady(),
			lastTrained: lastTrained === null ? null : new Date(lastTrained),
		};
	}

	/**
	 * Resolves once queued ingests and any in-flight retrain have finished
	 */
	async whenIdle(): Promise<void> {
		await this.queue;
		while (this.retraining) {
			await this.retraining;
		}
	}

	/**
	 * Run fn after every previously queued call has settled
	 */
	private serialize<T>(fn: () => T): Promise<T> {
		const result = this.queue.then(fn);
		this.queue = result.then(
			() => undefined,
			() => undefined
		);
		return result;
	}

	private process(sample: Sample): Finding[] {
		let findings: Finding[] = [];

		try {
			this.history.append(engineerFeatures(sample));
			const historySize = this.history.size();

			findings = this.statistical.detect(sample, this.history);

			const predictive = this.predictive.detect(sample, this.predictor, historySize);
			if (predictive) {
				findings.push(predictive);
			}
		} catch (error) {
			this.logger?.error('Anomaly detection failed', {
				component: LogComponents.ANOMALY_ENGINE,
				deviceId: sample.deviceId,
				...errorMeta(error),
			});
			findings = [];
		}

		for (const finding of findings) {
			this.logger?.warn('Anomaly detected', {
				component: LogComponents.ANOMALY_ENGINE,
				deviceId: sample.deviceId,
				kind: finding.kind,
				method: finding.detectionMethod,
				severity: finding.severity,
				score: finding.score,
			});
		}

		this.maybeRetrain();
		return findings;
	}

	private retrainDue(): boolean {
		if (this.retraining) return false;
		if (this.history.size() < this.options.minTrainingSize) return false;

		const lastTrained = this.predictor.lastTrained();
		return lastTrained === null || this.now() - lastTrained >= this.options.retrainIntervalMs;
	}

	private maybeRetrain(): void {
		if (!this.retrainDue()) return;

		const records = this.history.snapshot();
		if (this.options.retrainMode === 'sync') {
			this.retrain(records);
			return;
		}

		this.retraining = new Promise<void>(resolve => {
			setImmediate(() => {
				this.retrain(records);
				this.retraining = null;
				resolve();
			});
		});
	}

	private retrain(records: FeatureRecord[]): void {
		const startedAt = this.now();
		try {
			const model = this.predictor.train(records);
			this.predictor.install(model);
			this.logger?.info('Power model retrained', {
				component: LogComponents.PREDICTOR,
				records: records.length,
				mode: this.options.retrainMode,
				durationMs: this.now() - startedAt,
			});
		} catch (error) {
			this.logger?.error('Power model training failed, keeping previous model', {
				component: LogComponents.PREDICTOR,
				records: records.length,
				modelTrained: this.predictor.isReady(),
				...errorMeta(error),
			});
		}
	}
}
