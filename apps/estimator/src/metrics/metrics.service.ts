import { Injectable } from '@nestjs/common';
import {
  Registry,
  Counter,
  Gauge,
  Histogram,
  collectDefaultMetrics,
} from 'prom-client';
import { CalibrationStatus } from '../interfaces/calibration.interface';

/**
 * Service that registers and updates Prometheus metrics for the estimator.
 * Exposes estimate count, latency and errors, plus calibration outcomes.
 */
@Injectable()
export class MetricsService {
  private readonly register: Registry;

  /** Total number of estimates served */
  readonly estimateCount: Counter<string>;

  /** Latency of an estimate request in seconds */
  readonly estimateLatency: Histogram<string>;

  /** Total number of failed estimate requests */
  readonly estimateErrors: Counter<string>;

  /** Calibration results per location and outcome */
  readonly calibrationOutcomes: Counter<string>;

  /** Most recently calibrated sigma per location */
  readonly locationSigma: Gauge<string>;

  constructor() {
    this.register = new Registry();
    this.estimateCount = new Counter({
      name: 'estimator_estimates_total',
      help: 'Total number of price estimates served',
      labelNames: ['logistics_mode'],
      registers: [this.register],
    });
    this.estimateLatency = new Histogram({
      name: 'estimator_estimate_duration_seconds',
      help: 'Price estimate duration in seconds',
      labelNames: ['logistics_mode'],
      buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
      registers: [this.register],
    });
    this.estimateErrors = new Counter({
      name: 'estimator_errors_total',
      help: 'Total number of failed price estimates',
      labelNames: ['logistics_mode'],
      registers: [this.register],
    });
    this.calibrationOutcomes = new Counter({
      name: 'estimator_calibrations_total',
      help: 'Calibration results per location',
      labelNames: ['location', 'status'],
      registers: [this.register],
    });
    this.locationSigma = new Gauge({
      name: 'estimator_sigma',
      help: 'Residual sigma from the latest calibration',
      labelNames: ['location'],
      registers: [this.register],
    });
    collectDefaultMetrics({ register: this.register, prefix: 'estimator_' });
  }

  /**
   * Record a served estimate with duration.
   */
  recordEstimate(logisticsMode: string, durationSeconds: number): void {
    this.estimateCount.inc({ logistics_mode: logisticsMode }, 1);
    this.estimateLatency.observe({ logistics_mode: logisticsMode }, durationSeconds);
  }

  /**
   * Record a failed estimate.
   */
  recordError(logisticsMode: string): void {
    this.estimateErrors.inc({ logistics_mode: logisticsMode }, 1);
  }

  /**
   * Record one location's calibration outcome. Sigma is set only for updates.
   */
  recordCalibration(location: string, status: CalibrationStatus, sigma?: number): void {
    this.calibrationOutcomes.inc({ location, status }, 1);
    if (status === 'updated' && sigma !== undefined) {
      this.locationSigma.set({ location }, sigma);
    }
  }

  /**
   * Get the Prometheus registry for scraping.
   */
  getRegister(): Registry {
    return this.register;
  }

  /**
   * Get metrics in Prometheus text format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }

  /**
   * Get content type for Prometheus exposition format.
   */
  getContentType(): string {
    return this.register.contentType;
  }
}
