import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import Redis from 'ioredis';

/**
 * Checks the Redis instance holding model state. Reports up without
 * connecting when REDIS_URL is unset, since state is then kept in memory.
 */
@Injectable()
export class RedisHealthIndicator extends HealthIndicator {
  constructor(private readonly configService: ConfigService) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const redisUrl = this.configService.get<string>('REDIS_URL');
    if (!redisUrl) {
      return this.getStatus(key, true, { message: 'Redis not configured, using in-memory state' });
    }

    const redis = new Redis(redisUrl, {
      maxRetriesPerRequest: 1,
      connectTimeout: 5000,
      lazyConnect: true,
    });

    try {
      await redis.connect();
      const pong = await redis.ping();
      await redis.quit();
      if (pong === 'PONG') {
        return this.getStatus(key, true, { message: 'Redis is reachable' });
      }
      throw new HealthCheckError(
        'Redis check failed',
        this.getStatus(key, false, { message: 'PING did not return PONG' }),
      );
    } catch (err) {
      redis.disconnect();
      if (err instanceof HealthCheckError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : 'Unknown error';
      throw new HealthCheckError(
        'Redis check failed',
        this.getStatus(key, false, { message }),
      );
    }
  }
}
