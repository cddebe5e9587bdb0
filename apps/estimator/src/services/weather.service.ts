import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import {
  WEATHER_RAIN_SATURATION_MM,
  WEATHER_RETENTION_DAYS,
} from '../config/estimator.config';
import { MarketDefinition } from '../interfaces/market.interface';
import { WeatherReading } from '../interfaces/price-history.interface';
import { PriceHistoryRepository } from '../stores/price-history.repository';
import { daysBefore } from '../utils/day';
import { MarketRegistryService } from './market-registry.service';

/**
 * Subset of the OpenWeather One Call response that the estimator reads
 */
interface OneCallResponse {
  current?: {
    rain?: { '1h'?: number };
    weather?: Array<{ id?: number }>;
  };
}

export interface WeatherFetchSummary {
  updated: number;
  total: number;
}

/**
 * Map rainfall onto the estimator's weather index: 0 when dry, rising
 * linearly to 1 at {@link WEATHER_RAIN_SATURATION_MM} and capped there.
 */
export function toWeatherIndex(rainMm: number): number {
  if (!Number.isFinite(rainMm) || rainMm <= 0) {
    return 0;
  }
  return Math.min(1, rainMm / WEATHER_RAIN_SATURATION_MM);
}

@Injectable()
export class WeatherService {
  private readonly logger = new Logger(WeatherService.name);
  private readonly apiUrl: string;
  private readonly apiKey: string | undefined;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
    private readonly registry: MarketRegistryService,
    private readonly history: PriceHistoryRepository,
  ) {
    this.apiUrl = this.configService.get<string>(
      'WEATHER_API_URL',
      'https://api.openweathermap.org/data/3.0/onecall',
    );
    this.apiKey = this.configService.get<string>('WEATHER_API_KEY');
  }

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  /**
   * Fetch current conditions at a market and record them
   */
  async fetchForMarket(market: MarketDefinition): Promise<WeatherReading> {
    if (!this.apiKey) {
      throw new Error('WEATHER_API_KEY is not defined');
    }

    const response = await firstValueFrom(
      this.httpService.get<OneCallResponse>(this.apiUrl, {
        params: {
          lat: market.lat,
          lon: market.lon,
          appid: this.apiKey,
          units: 'metric',
          exclude: 'minutely',
        },
      }),
    );

    const current = response.data.current ?? {};
    const rainMm = current.rain?.['1h'] ?? 0;
    const code = current.weather?.[0]?.id;

    const reading: WeatherReading = {
      location: market.name,
      timestamp: Date.now(),
      rainMm,
      weatherCode: code === undefined ? null : String(code),
      weatherIndex: toWeatherIndex(rainMm),
    };

    await this.history.recordWeather(reading);
    this.logger.debug(
      `Weather for ${market.name}: ${rainMm}mm rain, index ${reading.weatherIndex.toFixed(3)}`,
    );
    return reading;
  }

  /**
   * Fetch weather for every registered market. Failures are logged per
   * market and do not stop the others.
   */
  async fetchAll(): Promise<WeatherFetchSummary> {
    const markets = this.registry.list();

    if (!this.apiKey) {
      this.logger.warn('WEATHER_API_KEY not set, skipping weather fetch');
      return { updated: 0, total: markets.length };
    }

    let updated = 0;
    for (const market of markets) {
      try {
        await this.fetchForMarket(market);
        updated++;
      } catch (error) {
        this.logger.error(
          `Failed to fetch weather for market ${market.name}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        );
      }
    }

    this.logger.log(`Updated weather data for ${updated}/${markets.length} markets`);
    return { updated, total: markets.length };
  }

  /**
   * Latest recorded reading for a location, fetching one on demand when
   * nothing is recorded yet and the API is configured
   */
  async getLatest(location: string): Promise<WeatherReading | undefined> {
    const market = this.registry.get(location);
    const latest = await this.history.findLatestWeather(location);
    if (latest || !this.apiKey) {
      return latest;
    }
    return this.fetchForMarket(market);
  }

  async getHistory(location: string, days: number): Promise<WeatherReading[]> {
    this.registry.get(location);
    return this.history.findWeatherSince(location, daysBefore(new Date(), days));
  }

  /**
   * Drop readings older than the retention period
   */
  async purgeOlderThan(days: number = WEATHER_RETENTION_DAYS): Promise<number> {
    const removed = await this.history.purgeWeatherBefore(daysBefore(new Date(), days));
    this.logger.log(`Cleaned up ${removed} old weather records`);
    return removed;
  }
}
