import { ResidualPair } from '../interfaces/calibration.interface';

/**
 * Population standard deviation (divide by N) of actual - estimated.
 * Returns 0 for an empty sample.
 */
export function residualSigma(pairs: readonly ResidualPair[]): number {
  if (pairs.length === 0) {
    return 0;
  }

  const residuals = pairs.map(p => p.actual - p.estimated);
  const mean = residuals.reduce((sum, r) => sum + r, 0) / residuals.length;
  const variance =
    residuals.reduce((sum, r) => sum + Math.pow(r - mean, 2), 0) / residuals.length;

  return Math.sqrt(variance);
}
