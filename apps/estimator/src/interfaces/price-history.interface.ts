/**
 * A single recorded market price. Immutable once recorded.
 */
export interface PriceObservation {
  market: string;

  /** Price per kg, never negative */
  price: number;

  /** Unix timestamp in milliseconds */
  observedAt: number;

  /** Where the figure came from (e.g. a market survey feed) */
  source?: string;
}

/**
 * Weather conditions recorded for a market location.
 */
export interface WeatherReading {
  location: string;

  /** Unix timestamp in milliseconds */
  timestamp: number;

  /** Rainfall over the last hour */
  rainMm: number;

  /** Provider condition code, when known */
  weatherCode: string | null;

  /** Rainfall mapped onto [0, 1] for the estimator */
  weatherIndex: number;
}
