/**
 * REGRESSION - POWER DRAW MODEL
 * ==============================
 * 
 * Polynomial least-squares regression for edge use:
 * - Basis expansion of the engineered features (degree 1 or 2)
 * - Per-column standardization; constant columns are dropped
 * - Small ridge penalty so collinear features (efficiency = 100 * powerFactor)
 *   still give a well-posed system
 * - Normal equations solved by Gaussian elimination with partial pivoting
 */

import { TrainingError } from './errors';
import type { FeatureRecord } from './types';

export interface RegressionModel {
	readonly trainedOn: number;
	predict(features: FeatureRecord): number;
}

export interface Regressor {
	fit(records: readonly FeatureRecord[]): RegressionModel;
}

export interface PolynomialRegressorOptions {
	degree: 1 | 2;
	ridge?: number;
}

function inputsOf(record: FeatureRecord): number[] {
	return [record.voltage, record.current, record.powerFactor, record.efficiency];
}

/**
 * Linear terms, followed by all pairwise products (squares included) for degree 2
 */
export function expandBasis(record: FeatureRecord, degree: 1 | 2): number[] {
	const x = inputsOf(record);
	if (degree === 1) return x;

	const terms = [...x];
	for (let i = 0; i < x.length; i++) {
		for (let j = i; j < x.length; j++) {
			terms.push(x[i] * x[j]);
		}
	}
	return terms;
}

/**
 * Solve A·w = b in place. Throws TrainingError on a (numerically) singular A.
 */
export function solveLinearSystem(a: number[][], b: number[]): number[] {
	const n = b.length;
	const scale = Math.max(1, ...a.map(row => Math.max(...row.map(Math.abs))));

	for (let col = 0; col < n; col++) {
		let pivot = col;
		for (let row = col + 1; row < n; row++) {
			if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
		}
		if (Math.abs(a[pivot][col]) < 1e-14 * scale) {
			throw new TrainingError('singular normal equations');
		}
		[a[col], a[pivot]] = [a[pivot], a[col]];
		[b[col], b[pivot]] = [b[pivot], b[col]];

		for (let row = col + 1; row < n; row++) {
			const factor = a[row][col] / a[col][col];
			if (factor === 0) continue;
			for (let k = col; k < n; k++) {
				a[row][k] -= factor * a[col][k];
			}
			b[row] -= factor * b[col];
		}
	}

	const w = new Array<number>(n).fill(0);
	for (let row = n - 1; row >= 0; row--) {
		let sum = b[row];
		for (let k = row + 1; k < n; k++) {
			sum -= a[row][k] * w[k];
		}
		w[row] = sum / a[row][row];
	}
	return w;
}

interface ColumnScale {
	index: number;
	mean: number;
	std: number;
}

class PolynomialModel implements RegressionModel {
	constructor(
		readonly trainedOn: number,
		private readonly degree: 1 | 2,
		private readonly columns: readonly ColumnScale[],
		private readonly weights: readonly number[],
		private readonly intercept: number
	) {}

	predict(features: FeatureRecord): number {
		const basis = expandBasis(features, this.degree);
		let y = this.intercept;
		this.columns.forEach((column, i) => {
			y += this.weights[i] * ((basis[column.index] - column.mean) / column.std);
		});
		return y;
	}
}

export class RidgePolynomialRegressor implements Regressor {
	private readonly degree: 1 | 2;
	private readonly ridge: number;

	constructor(options: PolynomialRegressorOptions = { degree: 2 }) {
		this.degree = options.degree;
		this.ridge = options.ridge ?? 1e-8;
	}

	fit(records: readonly FeatureRecord[]): RegressionModel {
		if (records.length === 0) {
			throw new TrainingError('no training records');
		}

		const rows = records.map(r => expandBasis(r, this.degree));
		const targets = records.map(r => r.power);
		if (!rows.every(row => row.every(Number.isFinite)) || !targets.every(Number.isFinite)) {
			throw new TrainingError('non-finite feature values');
		}

		const n = rows.length;
		const width = rows[0].length;

		const columns: ColumnScale[] = [];
		for (let index = 0; index < width; index++) {
			const values = rows.map(row => row[index]);
			const mean = values.reduce((sum, v) => sum + v, 0) / n;
			const std = Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / n);
			if (std > 1e-12 * Math.max(1, Math.abs(mean))) {
				columns.push({ index, mean, std });
			}
		}

		const targetMean = targets.reduce((sum, v) => sum + v, 0) / n;
		if (columns.length === 0) {
			return new PolynomialModel(n, this.degree, [], [], targetMean);
		}

		const z = rows.map(row => columns.map(c => (row[c.index] - c.mean) / c.std));
		const k = columns.length;
		const lambda = this.ridge * n;

		const a: number[][] = Array.from({ length: k }, () => new Array<number>(k).fill(0));
		const b = new Array<number>(k).fill(0);
		for (let r = 0; r < n; r++) {
			const centered = targets[r] - targetMean;
			for (let i = 0; i < k; i++) {
				b[i] += z[r][i] * centered;
				for (let j = i; j < k; j++) {
					a[i][j] += z[r][i] * z[r][j];
				}
			}
		}
		for (let i = 0; i < k; i++) {
			a[i][i] += lambda;
			for (let j = 0; j < i; j++) {
				a[i][j] = a[j][i];
			}
		}

		const weights = solveLinearSystem(a, b);
		if (!weights.every(Number.isFinite)) {
			throw new TrainingError('non-finite model coefficients');
		}

		return new PolynomialModel(n, this.degree, columns, weights, targetMean);
	}
}
