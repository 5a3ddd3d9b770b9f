/**
 * STAT SUMMARY
 * ============
 * 
 * Population statistics and nearest-rank quartiles over one metric projection
 */

import { max, mean, min, standardDeviation } from 'simple-statistics';
import { InsufficientDataError } from './errors';
import type { StatSummary } from './types';

/**
 * Summarize a numeric sample. Needs at least two values; a single point has no
 * spread and any Z-score against it is undefined.
 */
export function computeStatSummary(values: readonly number[]): StatSummary {
	if (values.length < 2) {
		throw new InsufficientDataError(2, values.length, 'statistical summary');
	}

	const sorted = [...values].sort((a, b) => a - b);
	const n = sorted.length;

	return {
		mean: mean(sorted),
		stdDev: standardDeviation(sorted),
		min: min(sorted),
		max: max(sorted),
		q1: sorted[Math.floor(n * 0.25)],
		q3: sorted[Math.floor(n * 0.75)],
	};
}

/**
 * True when the spread is zero (or rounding noise around a constant series)
 */
export function isDegenerate(summary: StatSummary): boolean {
	return summary.stdDev <= 1e-12 * Math.max(1, Math.abs(summary.mean));
}
