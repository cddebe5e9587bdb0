import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { WeatherController } from './weather.controller';
import { WeatherService } from '../services/weather.service';
import { WeatherReading } from '../interfaces/price-history.interface';

describe('WeatherController', () => {
  let controller: WeatherController;
  let weatherService: { getLatest: jest.Mock; getHistory: jest.Mock };

  const reading: WeatherReading = {
    location: 'Hilltop',
    timestamp: 1711872000000,
    rainMm: 9,
    weatherCode: '500',
    weatherIndex: 0.3,
  };

  beforeEach(async () => {
    weatherService = {
      getLatest: jest.fn().mockResolvedValue(reading),
      getHistory: jest.fn().mockResolvedValue([reading]),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [WeatherController],
      providers: [{ provide: WeatherService, useValue: weatherService }],
    }).compile();

    controller = module.get<WeatherController>(WeatherController);
  });

  describe('GET /weather/latest', () => {
    it('should return the latest reading', async () => {
      expect(await controller.latest({ location: 'Hilltop' })).toEqual(reading);
      expect(weatherService.getLatest).toHaveBeenCalledWith('Hilltop');
    });

    it('should throw NotFoundException when there is no reading', async () => {
      weatherService.getLatest.mockResolvedValue(undefined);

      await expect(controller.latest({ location: 'Hilltop' })).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe('GET /weather/history', () => {
    it('should default to the last 7 days', async () => {
      const result = await controller.history({ location: 'Hilltop' });

      expect(weatherService.getHistory).toHaveBeenCalledWith('Hilltop', 7);
      expect(result).toEqual({
        location: 'Hilltop',
        daysRequested: 7,
        recordsFound: 1,
        history: [reading],
      });
    });

    it('should pass the requested days through', async () => {
      await controller.history({ location: 'Hilltop', days: 21 });

      expect(weatherService.getHistory).toHaveBeenCalledWith('Hilltop', 21);
    });
  });
});
