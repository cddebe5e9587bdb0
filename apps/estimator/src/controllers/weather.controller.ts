import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Query,
} from '@nestjs/common';
import { WeatherQueryDto } from '../dto/weather-query.dto';
import { WeatherReading } from '../interfaces/price-history.interface';
import { WeatherService } from '../services/weather.service';

/**
 * - GET /weather/latest?location=        - Latest reading for a market location.
 * - GET /weather/history?location=&days= - Readings over the last `days` days (max 30).
 */
@Controller('weather')
export class WeatherController {
  constructor(private readonly weatherService: WeatherService) {}

  @Get('latest')
  @HttpCode(HttpStatus.OK)
  async latest(@Query() query: WeatherQueryDto): Promise<WeatherReading> {
    const reading = await this.weatherService.getLatest(query.location);
    if (!reading) {
      throw new NotFoundException(`No weather data for ${query.location}`);
    }
    return reading;
  }

  @Get('history')
  @HttpCode(HttpStatus.OK)
  async history(@Query() query: WeatherQueryDto): Promise<{
    location: string;
    daysRequested: number;
    recordsFound: number;
    history: WeatherReading[];
  }> {
    const days = query.days ?? 7;
    const history = await this.weatherService.getHistory(query.location, days);
    return {
      location: query.location,
      daysRequested: days,
      recordsFound: history.length,
      history,
    };
  }
}
