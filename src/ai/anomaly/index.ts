/**
 * Anomaly detection public surface
 */

export { AnomalyEngine } from './engine';
export type { AnomalyEngineOptions } from './engine';
export { PartitionedAnomalyEngine } from './partitioned-engine';
export type { PartitionedStatus } from './partitioned-engine';
export { StatisticalDetector, PredictiveDetector, zScoreOf } from './detectors';
export { PowerPredictor } from './predictor';
export { RidgePolynomialRegressor } from './regression';
export type { Regressor, RegressionModel } from './regression';
export { HistoryStore } from './history';
export { computeStatSummary } from './stats';
export { engineerFeatures, queryFeatures } from './features';
export { classifySeverity } from './severity';
export * from './errors';
export * from './types';
