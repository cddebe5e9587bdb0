/**
 * Model coefficients and fallbacks shared by the estimator and its callers.
 */
export const ESTIMATOR_DEFAULTS = {
  /** Season coefficient */
  k1: 0.12,
  /** Shock coefficient */
  k2: 0.08,
  /** Weather coefficient */
  k3: 0.12,
  /** EWMA weight of the newest raw base */
  alpha: 0.4,
} as const;

/** Sigma assumed for a location that has never been calibrated */
export const DEFAULT_SIGMA = 1.0;

/** Friction assumed when a market's map has no entry for the destination */
export const DEFAULT_FRICTION = 100;

export const CALIBRATION_DEFAULTS = {
  trailingWindowDays: 30,
  minSamples: 10,
  /** Reference-market prices a replayed day needs to count */
  minMarketsPerDay: 2,
} as const;

/** Rainfall (mm/h) at which the weather index saturates at 1 */
export const WEATHER_RAIN_SATURATION_MM = 30;

/** Weather readings older than this are purged */
export const WEATHER_RETENTION_DAYS = 90;
