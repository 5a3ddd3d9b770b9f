import { engineerFeatures, queryFeatures } from '../../../src/ai/anomaly/features';
import { classifySeverity } from '../../../src/ai/anomaly/severity';
import { DEFAULT_THRESHOLDS } from '../../../src/ai/anomaly/types';

describe('engineerFeatures', () => {
	it('derives power factor and efficiency', () => {
		const features = engineerFeatures({ voltage: 230, current: 5, power: 1035 });

		expect(features.powerFactor).toBeCloseTo(0.9, 12);
		expect(features.efficiency).toBeCloseTo(90, 10);
		expect(Object.isFrozen(features)).toBe(true);
	});

	it('treats a zero voltage or current as degenerate', () => {
		expect(engineerFeatures({ voltage: 0, current: 5, power: 10 })).toEqual({
			voltage: 0,
			current: 5,
			power: 10,
			powerFactor: 0,
			efficiency: 0,
		});
		expect(engineerFeatures({ voltage: 230, current: 0, power: 0 }).powerFactor).toBe(0);
	});

	it('estimates query power as apparent power', () => {
		expect(queryFeatures(230, 5)).toEqual({
			voltage: 230,
			current: 5,
			power: 1150,
			powerFactor: 1,
			efficiency: 100,
		});
		expect(queryFeatures(230, 0).powerFactor).toBe(0);
	});
});

describe('classifySeverity', () => {
	it('tiers Z-scores at 3.5', () => {
		expect(classifySeverity({ method: 'zscore', score: 3.5 }, DEFAULT_THRESHOLDS)).toBe('medium');
		expect(classifySeverity({ method: 'zscore', score: 3.51 }, DEFAULT_THRESHOLDS)).toBe('high');
	});

	it('tiers IQR distances at twice the IQR', () => {
		expect(classifySeverity({ method: 'iqr', score: 200, iqr: 100 }, DEFAULT_THRESHOLDS)).toBe('medium');
		expect(classifySeverity({ method: 'iqr', score: 201, iqr: 100 }, DEFAULT_THRESHOLDS)).toBe('high');
	});

	it('tiers relative prediction error at 30%', () => {
		expect(classifySeverity({ method: 'predictive', score: 0.2 }, DEFAULT_THRESHOLDS)).toBe('medium');
		expect(classifySeverity({ method: 'predictive', score: 0.31 }, DEFAULT_THRESHOLDS)).toBe('high');
	});

	it('follows custom thresholds', () => {
		const thresholds = { ...DEFAULT_THRESHOLDS, zScoreHigh: 5 };
		expect(classifySeverity({ method: 'zscore', score: 4 }, thresholds)).toBe('medium');
	});
});
