import { Injectable } from '@nestjs/common';
import {
  PriceObservation,
  WeatherReading,
} from '../interfaces/price-history.interface';
import { toDayKey } from '../utils/day';

/**
 * Append-only store of market price observations and weather readings,
 * indexed by market/location and UTC day.
 *
 * Reads return the earliest record of a day, matching how a daily market
 * survey is reported once per day.
 */
@Injectable()
export class PriceHistoryRepository {
  private readonly prices = new Map<string, PriceObservation[]>();
  private weather = new Map<string, WeatherReading[]>();

  /**
   * @throws RangeError if `observedAt` is not a finite timestamp
   */
  async recordPrice(observation: PriceObservation): Promise<void> {
    if (!Number.isFinite(observation.observedAt)) {
      throw new RangeError(`Invalid observation time for ${observation.market}`);
    }
    const list = this.prices.get(observation.market) ?? [];
    list.push({ ...observation });
    list.sort((a, b) => a.observedAt - b.observedAt);
    this.prices.set(observation.market, list);
  }

  async findDailyPrice(market: string, day: Date): Promise<number | undefined> {
    const key = toDayKey(day);
    return this.prices.get(market)?.find(p => toDayKey(p.observedAt) === key)?.price;
  }

  async findLatestPrice(market: string): Promise<PriceObservation | undefined> {
    const list = this.prices.get(market);
    return list && list.length > 0 ? { ...list[list.length - 1] } : undefined;
  }

  async recordWeather(reading: WeatherReading): Promise<void> {
    const list = this.weather.get(reading.location) ?? [];
    list.push({ ...reading });
    list.sort((a, b) => a.timestamp - b.timestamp);
    this.weather.set(reading.location, list);
  }

  async findDailyWeatherIndex(location: string, day: Date): Promise<number | undefined> {
    const key = toDayKey(day);
    return this.weather.get(location)?.find(w => toDayKey(w.timestamp) === key)?.weatherIndex;
  }

  async findLatestWeather(location: string): Promise<WeatherReading | undefined> {
    const list = this.weather.get(location);
    return list && list.length > 0 ? { ...list[list.length - 1] } : undefined;
  }

  /**
   * Readings at or after `since`, newest first.
   */
  async findWeatherSince(location: string, since: Date): Promise<WeatherReading[]> {
    const cutoff = since.getTime();
    return (this.weather.get(location) ?? [])
      .filter(w => w.timestamp >= cutoff)
      .reverse()
      .map(w => ({ ...w }));
  }

  /**
   * Drop weather readings older than `cutoff`. Returns how many were removed.
   */
  async purgeWeatherBefore(cutoff: Date): Promise<number> {
    const limit = cutoff.getTime();
    let removed = 0;
    const kept = new Map<string, WeatherReading[]>();

    for (const [location, readings] of this.weather) {
      const recent = readings.filter(w => w.timestamp >= limit);
      removed += readings.length - recent.length;
      if (recent.length > 0) {
        kept.set(location, recent);
      }
    }

    this.weather = kept;
    return removed;
  }
}
