/**
 * ANOMALY DETECTION - TYPE DEFINITIONS
 * ======================================
 * 
 * Streaming anomaly detection for electrical telemetry (voltage, current, power)
 */

/**
 * One telemetry reading as delivered by the transport
 */
export interface Sample {
	readonly deviceId: string;
	readonly timestamp: Date;
	readonly voltage: number;   // V
	readonly current: number;   // A
	readonly power: number;     // W
}

/**
 * Feature-engineered reading kept in history
 */
export interface FeatureRecord {
	readonly voltage: number;
	readonly current: number;
	readonly power: number;
	readonly powerFactor: number;   // power / (voltage * current), 0 when degenerate
	readonly efficiency: number;    // powerFactor * 100
}

export type Metric = 'voltage' | 'current' | 'power';

export type MetricSelector = (record: FeatureRecord) => number;

export interface StatSummary {
	mean: number;
	stdDev: number;     // population standard deviation
	min: number;
	max: number;
	q1: number;         // nearest-rank 25th percentile
	q3: number;         // nearest-rank 75th percentile
}

/**
 * Detection methods available
 */
export type DetectionMethod =
	| 'zscore'        // Z-score (standard deviations from mean)
	| 'iqr'           // Interquartile Range fences
	| 'predictive';   // Relative error against the regression model

export type FindingKind =
	| 'voltage_anomaly'
	| 'current_anomaly'
	| 'power_anomaly'
	| 'power_outlier'
	| 'power_prediction_anomaly';

/**
 * Severity tiers. 'low' is reserved; default thresholds yield medium or high.
 */
export type Severity = 'low' | 'medium' | 'high';

export interface Finding {
	isAnomaly: true;
	score: number;
	kind: FindingKind;
	detectionMethod: DetectionMethod;
	metric: Metric;
	value: number;
	expectedRange: [number, number];
	message: string;
	severity: Severity;
}

/**
 * Tunable detection thresholds
 */
export interface DetectionThresholds {
	zScore: number;                    // finding when z > zScore
	zScoreHigh: number;                // high when z > zScoreHigh
	iqrMultiplier: number;             // Tukey fence width in IQRs
	iqrHighFactor: number;             // high when fence distance > factor * IQR
	predictionError: number;           // finding when relative error > this
	predictionErrorHigh: number;       // high when relative error > this
}

export const DEFAULT_THRESHOLDS: DetectionThresholds = {
	zScore: 2.5,
	zScoreHigh: 3.5,
	iqrMultiplier: 1.5,
	iqrHighFactor: 2,
	predictionError: 0.15,
	predictionErrorHigh: 0.3,
};

export type RetrainMode = 'sync' | 'background';

export interface EngineOptions {
	historyCapacity: number;
	warmupSize: number;
	minTrainingSize: number;
	retrainIntervalMs: number;
	retrainMode: RetrainMode;
	modelDegree: 1 | 2;
	thresholds: DetectionThresholds;
}

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
	historyCapacity: 1000,
	warmupSize: 10,
	minTrainingSize: 50,
	retrainIntervalMs: 30 * 60 * 1000,
	retrainMode: 'background',
	modelDegree: 2,
	thresholds: DEFAULT_THRESHOLDS,
};

export interface EngineStatus {
	historySize: number;
	modelTrained: boolean;
	lastTrained: Date | null;
}

/**
 * Surface the transport depends on; both the pooled engine and the
 * per-device partitioned engine implement it.
 */
export interface Detector {
	ingest(sample: Sample): Promise<Finding[]>;
	status(): EngineStatus;
}
