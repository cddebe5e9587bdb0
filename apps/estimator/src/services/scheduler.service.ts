import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as cron from 'node-cron';
import { CalibrationInProgressException } from '../exceptions';
import { CalibrationService } from './calibration.service';
import { WeatherService } from './weather.service';

/**
 * Periodic jobs: sigma calibration on a cron expression, weather fetch and
 * cleanup on a fixed interval. Job failures are logged and never rethrown.
 */
@Injectable()
export class SchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private calibrationTask: cron.ScheduledTask | null = null;
  private weatherIntervalId: NodeJS.Timeout | null = null;
  private readonly enabled: boolean;
  private readonly calibrationCron: string;
  private readonly weatherIntervalMs: number;
  private isRunning = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly calibrationService: CalibrationService,
    private readonly weatherService: WeatherService,
  ) {
    this.enabled = this.configService.get<boolean>('SCHEDULER_ENABLED', false);
    this.calibrationCron = this.configService.get<string>('CALIBRATION_CRON', '0 2 * * *');
    this.weatherIntervalMs = this.configService.get<number>('WEATHER_FETCH_INTERVAL_MS', 3600000);
  }

  onModuleInit(): void {
    if (this.enabled) {
      this.startScheduler();
    } else {
      this.logger.log('Scheduler disabled (SCHEDULER_ENABLED is not set)');
    }
  }

  onModuleDestroy(): void {
    this.stopScheduler();
  }

  startScheduler(): void {
    if (this.isRunning) {
      this.logger.warn('Scheduler is already running');
      return;
    }

    if (!cron.validate(this.calibrationCron)) {
      throw new Error(`Invalid CALIBRATION_CRON expression: ${this.calibrationCron}`);
    }

    this.logger.log(
      `Starting scheduler: calibration "${this.calibrationCron}", weather every ${this.weatherIntervalMs}ms`,
    );

    this.calibrationTask = cron.schedule(this.calibrationCron, () => {
      void this.runCalibration();
    });

    // Fetch weather immediately, then on the interval
    void this.runWeatherFetch();
    this.weatherIntervalId = setInterval(() => {
      void this.runWeatherFetch();
    }, this.weatherIntervalMs);

    this.isRunning = true;
  }

  stopScheduler(): void {
    if (this.calibrationTask) {
      this.calibrationTask.stop();
      this.calibrationTask = null;
    }
    if (this.weatherIntervalId) {
      clearInterval(this.weatherIntervalId);
      this.weatherIntervalId = null;
    }
    if (this.isRunning) {
      this.isRunning = false;
      this.logger.log('Scheduler stopped');
    }
  }

  isSchedulerRunning(): boolean {
    return this.isRunning;
  }

  getCalibrationCron(): string {
    return this.calibrationCron;
  }

  getWeatherIntervalMs(): number {
    return this.weatherIntervalMs;
  }

  async runCalibration(): Promise<void> {
    const startTime = Date.now();
    this.logger.log('Scheduled calibration starting...');

    try {
      const report = await this.calibrationService.calibrateAll();
      this.logger.log(
        `Scheduled calibration finished in ${Date.now() - startTime}ms: ` +
          `updated [${report.updated.join(', ')}]`,
      );
    } catch (error) {
      if (error instanceof CalibrationInProgressException) {
        this.logger.warn('Previous calibration still running, skipping this tick');
        return;
      }
      this.logger.error(
        `Scheduled calibration failed after ${Date.now() - startTime}ms: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }

  async runWeatherFetch(): Promise<void> {
    try {
      await this.weatherService.fetchAll();
      await this.weatherService.purgeOlderThan();
    } catch (error) {
      this.logger.error(
        `Scheduled weather fetch failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }
  }
}
