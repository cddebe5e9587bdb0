import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheck,
  HealthCheckResult,
  HealthCheckService,
  HealthIndicatorFunction,
} from '@nestjs/terminus';
import { MarketRegistryHealthIndicator } from './indicators/market-registry.health';
import { RedisHealthIndicator } from './indicators/redis.health';

const startTime = Date.now();

export interface ServiceStatusDto {
  status: string;
  uptimeSeconds: number;
  timestamp: number;
  version: string;
  stateBackend: 'redis' | 'memory';
  memory: NodeJS.MemoryUsage;
  checks: HealthCheckResult;
}

/**
 * - GET /health  - Redis and market registry checks. 503 when either is down.
 * - GET /ready   - Same checks, for readiness probes.
 * - GET /live    - Process is up; no dependency checks.
 * - GET /status  - Check results plus uptime, memory and the model state backend.
 */
@Controller()
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly redis: RedisHealthIndicator,
    private readonly markets: MarketRegistryHealthIndicator,
    private readonly configService: ConfigService,
  ) {}

  @Get('health')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async check(): Promise<HealthCheckResult> {
    return this.requireHealthy();
  }

  @Get('ready')
  @HealthCheck()
  @HttpCode(HttpStatus.OK)
  async ready(): Promise<HealthCheckResult> {
    return this.requireHealthy();
  }

  @Get('live')
  @HttpCode(HttpStatus.OK)
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get('status')
  @HttpCode(HttpStatus.OK)
  async status(): Promise<ServiceStatusDto> {
    const checks = await this.health.check(this.indicators());
    return {
      status: checks.status,
      uptimeSeconds: (Date.now() - startTime) / 1000,
      timestamp: Date.now(),
      version: process.env.npm_package_version ?? '0.0.0',
      stateBackend: this.configService.get<string>('REDIS_URL') ? 'redis' : 'memory',
      memory: process.memoryUsage(),
      checks,
    };
  }

  private indicators(): HealthIndicatorFunction[] {
    return [() => this.redis.isHealthy('redis'), () => this.markets.isHealthy('markets')];
  }

  private async requireHealthy(): Promise<HealthCheckResult> {
    const result = await this.health.check(this.indicators());
    if (result.status !== 'ok') {
      throw new ServiceUnavailableException(result);
    }
    return result;
  }
}
