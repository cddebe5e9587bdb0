import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { CalibrationController } from '../controllers/calibration.controller';
import { PricesController } from '../controllers/prices.controller';
import { WeatherController } from '../controllers/weather.controller';
import { DebugModule } from '../debug/debug.module';
import { MetricsModule } from '../metrics/metrics.module';
import { CalibrationService } from '../services/calibration.service';
import { EstimationService } from '../services/estimation.service';
import { MarketRegistryService } from '../services/market-registry.service';
import { SchedulerService } from '../services/scheduler.service';
import { WeatherService } from '../services/weather.service';
import { modelStateStoreProvider } from '../stores/model-state.provider';
import { PriceHistoryRepository } from '../stores/price-history.repository';

@Module({
  imports: [
    HttpModule.register({
      timeout: 10000,
      maxRedirects: 0,
    }),
    MetricsModule,
    DebugModule,
  ],
  controllers: [PricesController, CalibrationController, WeatherController],
  providers: [
    MarketRegistryService,
    PriceHistoryRepository,
    modelStateStoreProvider,
    EstimationService,
    CalibrationService,
    WeatherService,
    SchedulerService,
  ],
  exports: [EstimationService, CalibrationService, MarketRegistryService, PriceHistoryRepository],
})
export class EstimationModule {}
