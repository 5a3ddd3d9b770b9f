/**
 * ANOMALY DETECTORS - STATISTICAL & PREDICTIVE
 * =============================================
 * 
 * Statistical: Z-score on voltage, current and power, plus Tukey IQR fences on
 * power. Predictive: relative error of the observed power against the model.
 */

import type { Logger } from '../../logging/logger';
import { errorMeta } from '../../logging/logger';
import { LogComponents } from '../../logging/components';
import type { HistoryStore } from './history';
import type { PowerPredictor } from './predictor';
import { classifySeverity } from './severity';
import { computeStatSummary, isDegenerate } from './stats';
import type {
	DetectionThresholds,
	Finding,
	FindingKind,
	Metric,
	Sample,
	StatSummary,
} from './types';

interface ZScoreMetric {
	metric: Metric;
	kind: FindingKind;
	label: string;
	unit: string;
}

const Z_SCORE_METRICS: readonly ZScoreMetric[] = [
	{ metric: 'voltage', kind: 'voltage_anomaly', label: 'Voltage', unit: 'V' },
	{ metric: 'current', kind: 'current_anomaly', label: 'Current', unit: 'A' },
	{ metric: 'power', kind: 'power_anomaly', label: 'Power', unit: 'W' },
];

/**
 * Z-score of a value against a summary; 0 when the metric has no spread
 */
export function zScoreOf(value: number, summary: StatSummary): number {
	if (isDegenerate(summary)) return 0;
	return Math.abs(value - summary.mean) / summary.stdDev;
}

export class StatisticalDetector {
	constructor(
		private readonly thresholds: DetectionThresholds,
		private readonly warmupSize: number = 10,
		private readonly logger?: Logger
	) {
		// population statistics need at least two records
		if (!Number.isInteger(warmupSize) || warmupSize < 2) {
			throw new RangeError(`Warm-up size must be an integer of at least 2, got ${warmupSize}`);
		}
	}

	/**
	 * Compare a sample against history. Findings come out in the order
	 * voltage, current, power (Z-score), power (IQR).
	 */
	detect(sample: Sample, history: HistoryStore): Finding[] {
		if (history.size() < this.warmupSize) {
			this.logger?.debug('Statistical detection skipped during warm-up', {
				component: LogComponents.STATISTICAL_DETECTOR,
				historySize: history.size(),
				warmupSize: this.warmupSize,
			});
			return [];
		}

		const findings: Finding[] = [];
		let powerSummary: StatSummary | undefined;

		for (const metric of Z_SCORE_METRICS) {
			const summary = computeStatSummary(history.projection(r => r[metric.metric]));
			if (metric.metric === 'power') powerSummary = summary;

			const value = sample[metric.metric];
			const zScore = zScoreOf(value, summary);
			if (zScore > this.thresholds.zScore) {
				findings.push(this.zScoreFinding(metric, value, zScore, summary));
			}
		}

		if (powerSummary) {
			const outlier = this.iqrFinding(sample.power, powerSummary);
			if (outlier) findings.push(outlier);
		}

		return findings;
	}

	private zScoreFinding(metric: ZScoreMetric, value: number, zScore: number, summary: StatSummary): Finding {
		const { mean, stdDev } = summary;
		const band = this.thresholds.zScore * stdDev;
		return {
			isAnomaly: true,
			score: zScore,
			kind: metric.kind,
			detectionMethod: 'zscore',
			metric: metric.metric,
			value,
			expectedRange: [mean - band, mean + band],
			message: `${metric.label} ${value.toFixed(1)}${metric.unit} is ${zScore.toFixed(1)} standard deviations from normal ` +
				`(${mean.toFixed(1)}±${stdDev.toFixed(1)}${metric.unit})`,
			severity: classifySeverity({ method: 'zscore', score: zScore }, this.thresholds),
		};
	}

	private iqrFinding(power: number, summary: StatSummary): Finding | null {
		const iqr = summary.q3 - summary.q1;
		const lowerFence = summary.q1 - this.thresholds.iqrMultiplier * iqr;
		const upperFence = summary.q3 + this.thresholds.iqrMultiplier * iqr;

		if (power >= lowerFence && power <= upperFence) {
			return null;
		}

		const distance = Math.min(Math.abs(power - lowerFence), Math.abs(power - upperFence));
		return {
			isAnomaly: true,
			score: distance,
			kind: 'power_outlier',
			detectionMethod: 'iqr',
			metric: 'power',
			value: power,
			expectedRange: [lowerFence, upperFence],
			message: `Power ${power.toFixed(1)}W is an outlier (normal range: ${lowerFence.toFixed(1)}-${upperFence.toFixed(1)}W)`,
			severity: classifySeverity({ method: 'iqr', score: distance, iqr }, this.thresholds),
		};
	}
}

export class PredictiveDetector {
	constructor(
		private readonly thresholds: DetectionThresholds,
		private readonly logger?: Logger
	) {}

	/**
	 * Check observed power against the model. Returns null when the model is
	 * not usable yet or prediction faults; a fault never aborts ingestion.
	 */
	detect(sample: Sample, predictor: PowerPredictor, historySize: number): Finding | null {
		if (!predictor.isReady() || historySize < predictor.minTrainingSize) {
			return null;
		}

		let predicted: number;
		try {
			predicted = predictor.predict(sample.voltage, sample.current);
		} catch (error) {
			this.logger?.warn('Power prediction failed, skipping predictive detection', {
				component: LogComponents.PREDICTIVE_DETECTOR,
				deviceId: sample.deviceId,
				...errorMeta(error),
			});
			return null;
		}

		if (!Number.isFinite(predicted)) {
			this.logger?.warn('Power prediction was not finite, skipping predictive detection', {
				component: LogComponents.PREDICTIVE_DETECTOR,
				deviceId: sample.deviceId,
				predicted,
			});
			return null;
		}

		const scale = Math.max(predicted, 1);
		const relativeError = Math.abs(sample.power - predicted) / scale;
		if (relativeError <= this.thresholds.predictionError) {
			return null;
		}

		const band = this.thresholds.predictionError * scale;
		return {
			isAnomaly: true,
			score: relativeError,
			kind: 'power_prediction_anomaly',
			detectionMethod: 'predictive',
			metric: 'power',
			value: sample.power,
			expectedRange: [predicted - band, predicted + band],
			message: `Power ${sample.power.toFixed(1)}W deviates ${(relativeError * 100).toFixed(1)}% from predicted ${predicted.toFixed(1)}W`,
			severity: classifySeverity({ method: 'predictive', score: relativeError }, this.thresholds),
		};
	}
}
