/**
 * Move classification
 */

export { EvaluationUtils } from './EvaluationUtils.js';
export { CentipawnLossCalculator, centipawnLossCalculator } from './CentipawnLossCalculator.js';
export type { MoveMetrics, MoveMetricsInput } from './CentipawnLossCalculator.js';
export {
  BlunderClassifier,
  validateThresholds,
  isNotable,
  worstLabel,
} from './BlunderClassifier.js';
export type { ClassificationThresholds, BlunderClassifierOptions } from './BlunderClassifier.js';
