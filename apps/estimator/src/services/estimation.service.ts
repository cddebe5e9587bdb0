import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { estimate } from '../core/estimator';
import { DEFAULT_SIGMA } from '../config/estimator.config';
import { DebugService } from '../debug/debug.service';
import { EstimateRequestDto } from '../dto/estimate-request.dto';
import { InsufficientMarketDataException } from '../exceptions';
import {
  LocationEstimate,
  SigmaSource,
} from '../interfaces/location-estimate.interface';
import { MODEL_STATE_STORE, ModelStateStore } from '../interfaces/model-state.interface';
import { MetricsService } from '../metrics/metrics.service';
import { PriceHistoryRepository } from '../stores/price-history.repository';
import { MarketRegistryService } from './market-registry.service';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Estimation Service
 *
 * Serves live estimates for a location: gathers current reference-market
 * prices, distances, weather and the persisted model state, runs the
 * estimator, and writes the new smoothed base back.
 *
 * The read-then-write of the smoothed base is not guarded here; concurrent
 * requests for the same location are last-write-wins.
 */
@Injectable()
export class EstimationService {
  private readonly logger = new Logger(EstimationService.name);
  private readonly units: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: MarketRegistryService,
    private readonly history: PriceHistoryRepository,
    @Inject(MODEL_STATE_STORE) private readonly state: ModelStateStore,
    @Optional() private readonly metricsService?: MetricsService,
    @Optional() private readonly debugService?: DebugService,
  ) {
    this.units = this.configService.get<string>('PRICE_UNITS', 'KES/kg');
  }

  /**
   * Estimate the price at a location
   *
   * @throws MarketNotFoundException if the location is not a registered market
   * @throws InsufficientMarketDataException if no reference market has a price
   */
  async estimateFor(request: EstimateRequestDto): Promise<LocationEstimate> {
    const startTime = Date.now();
    const { location, logisticsMode } = request;

    try {
      this.registry.get(location);

      const markets = this.registry.getReferenceMarkets();
      const prices = await this.currentPrices(markets, request.overrides);
      const sources = Object.keys(prices);
      if (sources.length === 0) {
        throw new InsufficientMarketDataException(location, markets);
      }

      const distances = this.registry.distancesTo(location, sources);
      const previousBase = await this.state.getBase(location);
      const weatherIndex = await this.currentWeatherIndex(location, request.weatherOverride);
      const { sigma, sigmaSource } = await this.currentSigma(location);

      const result = estimate(prices, distances, previousBase, {
        seasonIndex: request.seasonIndex ?? 0,
        logisticsMode,
        shockIndex: request.shockIndex ?? 0,
        varietyGradeFactor: request.varietyGradeFactor ?? 1.0,
        weatherIndex,
        sigma,
      });

      await this.state.setBase(location, result.newBase);

      const response: LocationEstimate = {
        location,
        logisticsMode,
        estimate: round2(result.pointEstimate),
        range: [round2(result.band[0]), round2(result.band[1])],
        units: this.units,
        explain: result.explain,
        sigma,
        sigmaSource,
        sources,
        computedAt: Date.now(),
      };

      this.logger.log(
        `Estimated ${location}: ${response.estimate.toFixed(2)} ${this.units} ` +
          `(mode: ${logisticsMode}, sigma: ${sigma.toFixed(3)} ${sigmaSource}, markets: ${sources.length})`,
      );

      this.debugService?.setLastEstimate(location, response);
      this.metricsService?.recordEstimate(logisticsMode, (Date.now() - startTime) / 1000);
      return response;
    } catch (err) {
      this.metricsService?.recordError(logisticsMode);
      throw err;
    }
  }

  /**
   * Override prices win; otherwise the latest recorded price. Markets with
   * neither are left out.
   */
  private async currentPrices(
    markets: string[],
    overrides?: Record<string, number>,
  ): Promise<Record<string, number>> {
    const prices: Record<string, number> = {};

    for (const market of markets) {
      const override = overrides?.[market];
      if (override !== undefined) {
        prices[market] = override;
        continue;
      }

      const latest = await this.history.findLatestPrice(market);
      if (latest) {
        prices[market] = latest.price;
      } else {
        this.logger.debug(`No recorded price for ${market}, leaving it out`);
      }
    }

    return prices;
  }

  private async currentWeatherIndex(location: string, override?: number): Promise<number> {
    if (override !== undefined) {
      return override;
    }
    const latest = await this.history.findLatestWeather(location);
    return latest?.weatherIndex ?? 0;
  }

  private async currentSigma(
    location: string,
  ): Promise<{ sigma: number; sigmaSource: SigmaSource }> {
    const record = await this.state.getSigma(location);
    if (record) {
      return { sigma: record.sigma, sigmaSource: 'calibrated' };
    }
    return { sigma: DEFAULT_SIGMA, sigmaSource: 'default' };
  }
}
