import { EstimateExplain, LogisticsMode } from './price-estimate.interface';

/**
 * Where the band's sigma came from: a calibration run, or the default for
 * locations that have never been calibrated.
 */
export type SigmaSource = 'calibrated' | 'default';

/**
 * Price estimate served for a location, as returned to API clients.
 */
export interface LocationEstimate {
  location: string;
  logisticsMode: LogisticsMode;

  /** Point estimate per kg, rounded to 2 decimals */
  estimate: number;

  /** Confidence band, rounded to 2 decimals */
  range: [number, number];

  /** Currency per unit, e.g. KES/kg */
  units: string;

  explain: EstimateExplain;
  sigma: number;
  sigmaSource: SigmaSource;

  /** Markets whose prices went into the estimate */
  sources: string[];

  /** Unix timestamp in milliseconds */
  computedAt: number;
}
