/**
 * POWER PREDICTOR
 * ===============
 * 
 * Owns the live regression model of power draw. A fit builds the replacement
 * model completely before swapping the single reference, so readers only ever
 * see a finished model and a failed fit leaves the previous one in place.
 */

import { InsufficientDataError, ModelNotReadyError } from './errors';
import { queryFeatures } from './features';
import type { RegressionModel, Regressor } from './regression';
import type { FeatureRecord } from './types';

export interface PowerPredictorOptions {
	regressor: Regressor;
	minTrainingSize: number;
	now?: () => number;
}

export class PowerPredictor {
	private model: RegressionModel | null = null;
	private lastTrainedAt: number | null = null;
	private readonly regressor: Regressor;
	private readonly now: () => number;
	readonly minTrainingSize: number;

	constructor(options: PowerPredictorOptions) {
		this.regressor = options.regressor;
		this.minTrainingSize = options.minTrainingSize;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Train a new model on the given records and make it live
	 */
	fit(records: readonly FeatureRecord[]): void {
		this.install(this.train(records));
	}

	/**
	 * Build a model without publishing it
	 */
	train(records: readonly FeatureRecord[]): RegressionModel {
		if (records.length < this.minTrainingSize) {
			throw new InsufficientDataError(this.minTrainingSize, records.length, 'model training');
		}
		return this.regressor.fit(records);
	}

	/**
	 * Swap in a finished model and stamp the training time
	 */
	install(model: RegressionModel): void {
		this.model = model;
		this.lastTrainedAt = this.now();
	}

	predict(voltage: number, current: number): number {
		const model = this.model;
		if (!model) {
			throw new ModelNotReadyError();
		}
		return model.predict(queryFeatures(voltage, current));
	}

	isReady(): boolean {
		return this.model !== null;
	}

	/**
	 * Epoch ms of the last successful fit, null when never trained
	 */
	lastTrained(): number | null {
		return this.lastTrainedAt;
	}

	trainedOn(): number {
		return this.model?.trainedOn ?? 0;
	}
}
