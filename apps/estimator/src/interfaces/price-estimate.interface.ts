/**
 * Market stage the estimate is quoted for.
 */
export type LogisticsMode = 'farmgate' | 'wholesale' | 'retail';

/**
 * Per-call adjustment inputs and model coefficients for the estimator.
 * Every field is optional and falls back to a neutral default.
 */
export interface EstimateOptions {
  /** Seasonal pressure in [-1, 1]; positive means scarce season */
  seasonIndex?: number;

  /**
   * Market stage. Unrecognised values price as wholesale rather than
   * failing; request DTOs restrict this to {@link LogisticsMode}.
   */
  logisticsMode?: LogisticsMode | string;

  /** Supply shock in [-1, 1] */
  shockIndex?: number;

  /** Variety/grade premium in [0.5, 2.0], applied as-is */
  varietyGradeFactor?: number;

  /** Adverse weather in [0, 1] */
  weatherIndex?: number;

  /** Season coefficient */
  k1?: number;

  /** Shock coefficient */
  k2?: number;

  /** Weather coefficient */
  k3?: number;

  /** Smoothing weight given to the new raw base. Precondition: 0 < alpha <= 1 */
  alpha?: number;

  /**
   * Half-width of the confidence band. When omitted the estimator
   * falls back to a scale-based sigma.
   */
  sigma?: number;
}

/**
 * Breakdown of the multiplicative adjustment chain, rounded to 3 decimals
 * with exact halves going toward +Infinity (`Math.round`): 1.0625 becomes
 * 1.063 and -1.0625 becomes -1.062. Ties are not rounded to even.
 */
export interface EstimateExplain {
  baseSmoothed: number;
  seasonMult: number;
  logisticsMult: number;
  shockMult: number;
  weatherMult: number;
  varietyMult: number;
}

/**
 * Output of a single estimator run.
 */
export interface EstimateResult {
  /** Adjusted price per kg */
  pointEstimate: number;

  /** [pointEstimate - sigma, pointEstimate + sigma] */
  band: [number, number];

  explain: EstimateExplain;

  /** Smoothed base the caller must persist for the next call */
  newBase: number;

  /** Sigma actually used for the band */
  sigma: number;
}
