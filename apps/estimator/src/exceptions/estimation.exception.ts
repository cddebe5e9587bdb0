/**
 * Base exception for estimation and calibration errors
 */
export class EstimationException extends Error {
  constructor(
    message: string,
    public readonly location?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'EstimationException';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Exception when a location or market is missing from the market registry
 */
export class MarketNotFoundException extends EstimationException {
  constructor(market: string) {
    super(`Market not found in registry: ${market}`, market);
    this.name = 'MarketNotFoundException';
  }
}

/**
 * Exception when no reference market has a usable price
 */
export class InsufficientMarketDataException extends EstimationException {
  constructor(location: string, markets: string[]) {
    super(
      `No current prices available for ${location} from markets: ${markets.join(', ')}`,
      location,
    );
    this.name = 'InsufficientMarketDataException';
  }
}

/**
 * Exception when a calibration run is requested while another is in flight
 */
export class CalibrationInProgressException extends EstimationException {
  constructor() {
    super('A calibration run is already in progress');
    this.name = 'CalibrationInProgressException';
  }
}
