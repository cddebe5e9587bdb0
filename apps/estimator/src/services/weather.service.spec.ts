import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { of, throwError } from 'rxjs';
import { toWeatherIndex, WeatherService } from './weather.service';
import { MarketRegistryService } from './market-registry.service';
import { PriceHistoryRepository } from '../stores/price-history.repository';
import { MarketNotFoundException } from '../exceptions';
import { createConfigServiceMock, DAY_MS, testMarkets } from '../__mocks__/market.fixtures';

describe('toWeatherIndex', () => {
  it('should be 0 when dry', () => {
    expect(toWeatherIndex(0)).toBe(0);
  });

  it('should scale linearly up to the saturation point', () => {
    expect(toWeatherIndex(15)).toBe(0.5);
    expect(toWeatherIndex(30)).toBe(1);
  });

  it('should cap at 1', () => {
    expect(toWeatherIndex(75)).toBe(1);
  });

  it('should treat negative and non-finite rainfall as dry', () => {
    expect(toWeatherIndex(-2)).toBe(0);
    expect(toWeatherIndex(Number.NaN)).toBe(0);
  });
});

describe('WeatherService', () => {
  let history: PriceHistoryRepository;
  let httpService: { get: jest.Mock };

  async function createService(config: Record<string, unknown> = {}): Promise<WeatherService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WeatherService,
        MarketRegistryService,
        PriceHistoryRepository,
        { provide: ConfigService, useValue: createConfigServiceMock(config) },
        { provide: HttpService, useValue: httpService },
      ],
    }).compile();

    history = module.get<PriceHistoryRepository>(PriceHistoryRepository);
    module.get<MarketRegistryService>(MarketRegistryService).register(testMarkets);
    return module.get<WeatherService>(WeatherService);
  }

  beforeEach(() => {
    httpService = {
      get: jest.fn().mockReturnValue(
        of({ data: { current: { rain: { '1h': 6 }, weather: [{ id: 500 }] } } }),
      ),
    };
  });

  describe('fetchForMarket', () => {
    it('should query One Call with the market coordinates and record the reading', async () => {
      const service = await createService({
        WEATHER_API_KEY: 'test-key',
        WEATHER_API_URL: 'http://weather.test/onecall',
      });

      const reading = await service.fetchForMarket(testMarkets[1]);

      expect(httpService.get).toHaveBeenCalledWith('http://weather.test/onecall', {
        params: {
          lat: -0.4,
          lon: 36.9,
          appid: 'test-key',
          units: 'metric',
          exclude: 'minutely',
        },
      });
      expect(reading).toMatchObject({
        location: 'Hilltop',
        rainMm: 6,
        weatherCode: '500',
        weatherIndex: 0.2,
      });
      expect(await history.findLatestWeather('Hilltop')).toEqual(reading);
    });

    it('should treat a response without rain as dry', async () => {
      httpService.get.mockReturnValue(of({ data: { current: {} } }));
      const service = await createService({ WEATHER_API_KEY: 'test-key' });

      const reading = await service.fetchForMarket(testMarkets[0]);

      expect(reading.rainMm).toBe(0);
      expect(reading.weatherCode).toBeNull();
      expect(reading.weatherIndex).toBe(0);
    });

    it('should throw without an API key', async () => {
      const service = await createService();

      await expect(service.fetchForMarket(testMarkets[0])).rejects.toThrow(
        'WEATHER_API_KEY is not defined',
      );
      expect(httpService.get).not.toHaveBeenCalled();
    });
  });

  describe('fetchAll', () => {
    it('should skip the fetch when no API key is configured', async () => {
      const service = await createService();

      expect(service.isConfigured()).toBe(false);
      expect(await service.fetchAll()).toEqual({ updated: 0, total: 4 });
      expect(httpService.get).not.toHaveBeenCalled();
    });

    it('should continue past a failing market', async () => {
      httpService.get
        .mockReturnValueOnce(throwError(() => new Error('timeout')))
        .mockReturnValue(of({ data: { current: { rain: { '1h': 3 } } } }));
      const service = await createService({ WEATHER_API_KEY: 'test-key' });

      const summary = await service.fetchAll();

      expect(summary).toEqual({ updated: 3, total: 4 });
      expect(await history.findLatestWeather('Riverside')).toBeUndefined();
      expect((await history.findLatestWeather('Portside'))?.weatherIndex).toBe(0.1);
    });
  });

  describe('getLatest', () => {
    it('should return the recorded reading without fetching', async () => {
      const service = await createService({ WEATHER_API_KEY: 'test-key' });
      const reading = {
        location: 'Lakeview',
        timestamp: Date.now(),
        rainMm: 12,
        weatherCode: '501',
        weatherIndex: 0.4,
      };
      await history.recordWeather(reading);

      expect(await service.getLatest('Lakeview')).toEqual(reading);
      expect(httpService.get).not.toHaveBeenCalled();
    });

    it('should fetch on demand when nothing is recorded', async () => {
      const service = await createService({ WEATHER_API_KEY: 'test-key' });

      const reading = await service.getLatest('Lakeview');

      expect(reading?.weatherIndex).toBe(0.2);
      expect(httpService.get).toHaveBeenCalledTimes(1);
    });

    it('should return undefined when nothing is recorded and no API key is set', async () => {
      const service = await createService();

      expect(await service.getLatest('Lakeview')).toBeUndefined();
    });

    it('should reject unknown locations', async () => {
      const service = await createService();

      await expect(service.getLatest('Nowhere')).rejects.toThrow(MarketNotFoundException);
    });
  });

  describe('history and retention', () => {
    it('should return readings within the requested days, newest first', async () => {
      const service = await createService();
      const now = Date.now();
      for (const age of [1, 3, 10]) {
        await history.recordWeather({
          location: 'Riverside',
          timestamp: now - age * DAY_MS,
          rainMm: age,
          weatherCode: null,
          weatherIndex: toWeatherIndex(age),
        });
      }

      const readings = await service.getHistory('Riverside', 7);

      expect(readings.map(r => r.rainMm)).toEqual([1, 3]);
    });

    it('should purge readings past the retention period', async () => {
      const service = await createService();
      const now = Date.now();
      await history.recordWeather({
        location: 'Riverside',
        timestamp: now - 100 * DAY_MS,
        rainMm: 0,
        weatherCode: null,
        weatherIndex: 0,
      });
      await history.recordWeather({
        location: 'Riverside',
        timestamp: now - DAY_MS,
        rainMm: 0,
        weatherCode: null,
        weatherIndex: 0,
      });

      expect(await service.purgeOlderThan()).toBe(1);
      expect(await service.getHistory('Riverside', 120)).toHaveLength(1);
    });
  });
});
