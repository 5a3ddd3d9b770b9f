/**
 * Feature engineering shared by history and the power predictor
 */

import type { FeatureRecord, Sample } from './types';

/**
 * Power factor of a reading; 0 when voltage * current is 0
 */
export function powerFactorOf(voltage: number, current: number, power: number): number {
	const apparent = voltage * current;
	if (apparent === 0) return 0;
	return power / apparent;
}

export function engineerFeatures(sample: Pick<Sample, 'voltage' | 'current' | 'power'>): FeatureRecord {
	const powerFactor = powerFactorOf(sample.voltage, sample.current, sample.power);
	return Object.freeze({
		voltage: sample.voltage,
		current: sample.current,
		power: sample.power,
		powerFactor,
		efficiency: powerFactor * 100,
	});
}

/**
 * Features for a prediction query. Power is what we are predicting, so it is
 * estimated as the apparent power and run through the same formulas.
 */
export function queryFeatures(voltage: number, current: number): FeatureRecord {
	return engineerFeatures({ voltage, current, power: voltage * current });
}
