import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { EstimationModule } from '../modules/estimation.module';
import { HealthController } from './health.controller';
import { MarketRegistryHealthIndicator } from './indicators/market-registry.health';
import { RedisHealthIndicator } from './indicators/redis.health';

@Module({
  imports: [TerminusModule, EstimationModule],
  controllers: [HealthController],
  providers: [RedisHealthIndicator, MarketRegistryHealthIndicator],
})
export class HealthModule {}
