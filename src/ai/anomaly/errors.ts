/**
 * Anomaly engine errors
 */

export class AnomalyEngineError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'AnomalyEngineError';
	}
}

/**
 * Raised when a computation is asked for more history than is available.
 * Detectors treat this as a normal skip, never as a fault.
 */
export class InsufficientDataError extends AnomalyEngineError {
	constructor(readonly required: number, readonly available: number, what: string) {
		super(`Insufficient data for ${what}: need at least ${required} samples, have ${available}`);
		this.name = 'InsufficientDataError';
	}
}

export class ModelNotReadyError extends AnomalyEngineError {
	constructor() {
		super('Power model has not been trained yet');
		this.name = 'ModelNotReadyError';
	}
}

export class TrainingError extends AnomalyEngineError {
	constructor(reason: string) {
		super(`Model training failed: ${reason}`);
		this.name = 'TrainingError';
	}
}
