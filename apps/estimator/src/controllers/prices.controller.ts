import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { EstimateRequestDto } from '../dto/estimate-request.dto';
import { PriceObservationDto } from '../dto/price-observation.dto';
import { LocationEstimate } from '../interfaces/location-estimate.interface';
import { PriceObservation } from '../interfaces/price-history.interface';
import { EstimationService } from '../services/estimation.service';
import { MarketRegistryService } from '../services/market-registry.service';
import { PriceHistoryRepository } from '../stores/price-history.repository';

export interface MarketSummaryDto {
  name: string;
  county: string;
  lat: number;
  lon: number;
  latestPrice: { price: number; observedAt: string; source: string | null } | null;
}

/**
 * - POST /prices/estimate      - Price estimate for a location.
 * - POST /prices/observations  - Record a market price observation.
 * - GET  /prices/markets       - Registered markets with their latest price.
 */
@Controller('prices')
export class PricesController {
  constructor(
    private readonly estimationService: EstimationService,
    private readonly registry: MarketRegistryService,
    private readonly history: PriceHistoryRepository,
  ) {}

  @Post('estimate')
  @HttpCode(HttpStatus.OK)
  async estimate(@Body() request: EstimateRequestDto): Promise<LocationEstimate> {
    return this.estimationService.estimateFor(request);
  }

  @Post('observations')
  @HttpCode(HttpStatus.CREATED)
  async recordObservation(@Body() dto: PriceObservationDto): Promise<PriceObservation> {
    this.registry.get(dto.market);

    const observation: PriceObservation = {
      market: dto.market,
      price: dto.price,
      observedAt: Date.parse(dto.observedAt),
      source: dto.source,
    };
    await this.history.recordPrice(observation);
    return observation;
  }

  @Get('markets')
  @HttpCode(HttpStatus.OK)
  async listMarkets(): Promise<{ markets: MarketSummaryDto[]; count: number }> {
    const markets: MarketSummaryDto[] = [];

    for (const market of this.registry.list()) {
      const latest = await this.history.findLatestPrice(market.name);
      markets.push({
        name: market.name,
        county: market.county,
        lat: market.lat,
        lon: market.lon,
        latestPrice: latest
          ? {
              price: latest.price,
              observedAt: new Date(latest.observedAt).toISOString(),
              source: latest.source ?? null,
            }
          : null,
      });
    }

    return { markets, count: markets.length };
  }
}
