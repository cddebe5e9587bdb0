import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { estimate } from '../core/estimator';
import { residualSigma } from '../core/residuals';
import { CALIBRATION_DEFAULTS } from '../config/estimator.config';
import { parseList } from '../config/env.validation';
import { DebugService } from '../debug/debug.service';
import { CalibrationInProgressException } from '../exceptions';
import {
  CalibrationOptions,
  CalibrationOutcome,
  CalibrationReport,
  ResidualPair,
} from '../interfaces/calibration.interface';
import { MODEL_STATE_STORE, ModelStateStore } from '../interfaces/model-state.interface';
import { MetricsService } from '../metrics/metrics.service';
import { PriceHistoryRepository } from '../stores/price-history.repository';
import { daysBefore, toDayKey } from '../utils/day';
import { MarketRegistryService } from './market-registry.service';

/**
 * Calibration Service
 *
 * Replays the estimator over a trailing window of past days and compares it
 * with the prices actually observed at each location. The population
 * standard deviation of those residuals becomes the location's sigma.
 */
@Injectable()
export class CalibrationService {
  private readonly logger = new Logger(CalibrationService.name);
  private readonly locations: string[];
  private readonly trailingWindowDays: number;
  private readonly minSamples: number;
  private running = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: MarketRegistryService,
    private readonly history: PriceHistoryRepository,
    @Inject(MODEL_STATE_STORE) private readonly state: ModelStateStore,
    @Optional() private readonly metricsService?: MetricsService,
    @Optional() private readonly debugService?: DebugService,
  ) {
    this.locations = parseList(this.configService.get<string>('CALIBRATION_LOCATIONS'));
    this.trailingWindowDays = this.configService.get<number>(
      'CALIBRATION_WINDOW_DAYS',
      CALIBRATION_DEFAULTS.trailingWindowDays,
    );
    this.minSamples = this.configService.get<number>(
      'CALIBRATION_MIN_SAMPLES',
      CALIBRATION_DEFAULTS.minSamples,
    );
  }

  /**
   * Locations calibrated by a full run: CALIBRATION_LOCATIONS, or every
   * registered market when unset.
   */
  getLocations(): string[] {
    return this.locations.length > 0
      ? [...this.locations]
      : this.registry.list().map(m => m.name);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Recompute and persist sigma for one location.
   *
   * @returns `updated` with the new sigma, or `skipped` when fewer than
   * `minSamples` days had enough data
   * @throws MarketNotFoundException if the location or a reference market is
   * missing from the registry
   */
  async calibrate(
    location: string,
    options: CalibrationOptions = {},
  ): Promise<CalibrationOutcome> {
    const {
      trailingWindowDays = this.trailingWindowDays,
      minSamples = this.minSamples,
      now = new Date(),
    } = options;

    this.registry.get(location);
    const markets = this.registry.getReferenceMarkets();
    const distances = this.registry.distancesTo(location, markets);
    const previousBase = await this.state.getBase(location);

    const pairs: ResidualPair[] = [];

    for (let daysAgo = 1; daysAgo <= trailingWindowDays; daysAgo++) {
      const day = daysBefore(now, daysAgo);

      const actual = await this.history.findDailyPrice(location, day);
      if (actual === undefined) {
        continue;
      }

      const prices: Record<string, number> = {};
      for (const market of markets) {
        const price = await this.history.findDailyPrice(market, day);
        if (price !== undefined) {
          prices[market] = price;
        }
      }
      if (Object.keys(prices).length < CALIBRATION_DEFAULTS.minMarketsPerDay) {
        continue;
      }

      const weatherIndex = (await this.history.findDailyWeatherIndex(location, day)) ?? 0;
      const { pointEstimate } = estimate(prices, distances, previousBase, { weatherIndex });

      if (!Number.isFinite(pointEstimate)) {
        this.logger.warn(`Non-finite estimate for ${location} on ${toDayKey(day)}, skipping day`);
        continue;
      }

      pairs.push({ actual, estimated: pointEstimate });
    }

    if (pairs.length < minSamples) {
      this.logger.warn(
        `Insufficient data for ${location}: ${pairs.length} samples (need ${minSamples})`,
      );
      return {
        status: 'skipped',
        location,
        reason: 'insufficient-data',
        samples: pairs.length,
      };
    }

    const sigma = residualSigma(pairs);
    const lastUpdated = new Date().toISOString();
    await this.state.setSigma(location, { sigma, lastUpdated });

    this.logger.log(`Updated sigma for ${location}: ${sigma.toFixed(3)} (${pairs.length} samples)`);
    return { status: 'updated', location, sigma, samples: pairs.length, lastUpdated };
  }

  /**
   * Calibrate every location. A failure for one location is logged and
   * reported; it never stops the others.
   *
   * @throws CalibrationInProgressException if a run is already in flight
   */
  async calibrateAll(
    locations: string[] = this.getLocations(),
    options: CalibrationOptions = {},
  ): Promise<CalibrationReport> {
    if (this.running) {
      throw new CalibrationInProgressException();
    }

    this.running = true;
    const startedAt = new Date().toISOString();
    const outcomes: CalibrationOutcome[] = [];

    try {
      for (const location of locations) {
        let outcome: CalibrationOutcome;
        try {
          outcome = await this.calibrate(location, options);
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          this.logger.error(`Failed to compute sigma for ${location}: ${message}`);
          outcome = { status: 'failed', location, error: message };
        }

        outcomes.push(outcome);
        this.metricsService?.recordCalibration(
          location,
          outcome.status,
          outcome.status === 'updated' ? outcome.sigma : undefined,
        );
      }
    } finally {
      this.running = false;
    }

    const report: CalibrationReport = {
      startedAt,
      finishedAt: new Date().toISOString(),
      outcomes,
      updated: outcomes.filter(o => o.status === 'updated').map(o => o.location),
      skipped: outcomes.filter(o => o.status === 'skipped').map(o => o.location),
      failed: outcomes.filter(o => o.status === 'failed').map(o => o.location),
    };

    this.logger.log(
      `Calibration complete: ${report.updated.length} updated, ` +
        `${report.skipped.length} skipped, ${report.failed.length} failed`,
    );
    this.debugService?.setLastCalibration(report);
    return report;
  }
}
