import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { validate } from './config/env.validation';
import { DebugModule } from './debug/debug.module';
import { EstimationExceptionFilter } from './exceptions';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { EstimationModule } from './modules/estimation.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, envFilePath: '.env', validate }),
    EstimationModule,
    HealthModule,
    MetricsModule,
    DebugModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: EstimationExceptionFilter }],
})
export class AppModule {}
