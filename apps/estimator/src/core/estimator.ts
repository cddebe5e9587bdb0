import { ESTIMATOR_DEFAULTS } from '../config/estimator.config';
import { getLogisticsMultiplier } from '../config/logistics-multipliers.config';
import {
  EstimateExplain,
  EstimateOptions,
  EstimateResult,
} from '../interfaces/price-estimate.interface';

/**
 * Distance-weighted base price
 *
 * Each market contributes with weight 1 / (1 + distance), so a market at
 * the destination (distance 0) counts fully and far markets fade out:
 *
 * Base = Σ(price_m * w_m) / Σ(w_m)
 *
 * Only markets present in `prices` contribute. A missing distance counts
 * as 0 and negative distances are clamped to 0. An empty `prices` map
 * yields 0.
 */
export function computeBase(
  prices: Readonly<Record<string, number>>,
  distances: Readonly<Record<string, number>>,
): number {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const [market, price] of Object.entries(prices)) {
    const distance = Math.max(0, distances[market] ?? 0);
    const weight = 1 / (1 + distance);

    weightedSum += price * weight;
    totalWeight += weight;
  }

  return weightedSum / (totalWeight || 1);
}

/**
 * Single-step EWMA: alpha * raw + (1 - alpha) * previous.
 * The first observation for a location (no previous) passes through as-is.
 *
 * Precondition: 0 < alpha <= 1.
 */
export function smooth(
  raw: number,
  previous: number | null | undefined,
  alpha: number = ESTIMATOR_DEFAULTS.alpha,
): number {
  if (previous === null || previous === undefined) {
    return raw;
  }
  return alpha * raw + (1 - alpha) * previous;
}

export const ewma = smooth;

/**
 * Scale-based sigma for callers with no calibrated value.
 */
export function fallbackSigma(pointEstimate: number): number {
  return Number.isFinite(pointEstimate) ? Math.max(0.5, 0.03 * pointEstimate) : 1.0;
}

/** Half-up at 3 decimals; see {@link EstimateExplain}. */
function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Point estimate for one location.
 *
 * 1. raw base from {@link computeBase}
 * 2. smoothed against `previousBase` (returned as `newBase` for the caller to persist)
 * 3. multiplied by season, logistics, shock, weather and variety factors
 * 4. band of ± sigma around the result
 *
 * Pure: identical inputs give identical output, and nothing is stored.
 */
export function estimate(
  prices: Readonly<Record<string, number>>,
  distances: Readonly<Record<string, number>>,
  previousBase: number | null | undefined,
  options: EstimateOptions = {},
): EstimateResult {
  const {
    seasonIndex = 0,
    logisticsMode = 'wholesale',
    shockIndex = 0,
    varietyGradeFactor = 1.0,
    weatherIndex = 0,
    k1 = ESTIMATOR_DEFAULTS.k1,
    k2 = ESTIMATOR_DEFAULTS.k2,
    k3 = ESTIMATOR_DEFAULTS.k3,
    alpha = ESTIMATOR_DEFAULTS.alpha,
  } = options;

  const rawBase = computeBase(prices, distances);
  const newBase = smooth(rawBase, previousBase, alpha);

  const seasonMult = 1 + k1 * seasonIndex;
  const logisticsMult = getLogisticsMultiplier(logisticsMode);
  const shockMult = 1 + k2 * shockIndex;
  const weatherMult = 1 + k3 * weatherIndex;
  const varietyMult = varietyGradeFactor;

  const pointEstimate =
    newBase * seasonMult * logisticsMult * shockMult * weatherMult * varietyMult;

  const sigma = options.sigma ?? fallbackSigma(pointEstimate);

  const explain: EstimateExplain = {
    baseSmoothed: round3(newBase),
    seasonMult: round3(seasonMult),
    logisticsMult: round3(logisticsMult),
    shockMult: round3(shockMult),
    weatherMult: round3(weatherMult),
    varietyMult: round3(varietyMult),
  };

  return {
    pointEstimate,
    band: [pointEstimate - sigma, pointEstimate + sigma],
    explain,
    newBase,
    sigma,
  };
}
