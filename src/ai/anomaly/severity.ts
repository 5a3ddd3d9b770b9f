/**
 * Severity tiers as a pure function of detection method and score
 */

import type { DetectionThresholds, Severity } from './types';

export type SeverityInput =
	| { method: 'zscore'; score: number }
	| { method: 'iqr'; score: number; iqr: number }
	| { method: 'predictive'; score: number };

export function classifySeverity(input: SeverityInput, thresholds: DetectionThresholds): Severity {
	switch (input.method) {
		case 'zscore':
			return input.score > thresholds.zScoreHigh ? 'high' : 'medium';
		case 'iqr':
			return input.score > thresholds.iqrHighFactor * input.iqr ? 'high' : 'medium';
		case 'predictive':
			return input.score > thresholds.predictionErrorHigh ? 'high' : 'medium';
	}
}
