import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import {
  baseKey,
  ModelStateStore,
  SigmaRecord,
  sigmaKey,
} from '../interfaces/model-state.interface';

/**
 * Model state kept in Redis as JSON values under `base:<location>` and
 * `sigma:<location>`. Each write is a single SET, so a location's record is
 * replaced atomically.
 */
export class RedisModelStateStore implements ModelStateStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisModelStateStore.name);

  constructor(private readonly redis: Redis) {}

  async getBase(location: string): Promise<number | null> {
    const value = await this.readJson(baseKey(location));
    if (!isRecord(value) || typeof value.base !== 'number') {
      return null;
    }
    return value.base;
  }

  async setBase(location: string, base: number): Promise<void> {
    await this.redis.set(baseKey(location), JSON.stringify({ base }));
  }

  async getSigma(location: string): Promise<SigmaRecord | null> {
    const value = await this.readJson(sigmaKey(location));
    if (
      !isRecord(value) ||
      typeof value.sigma !== 'number' ||
      typeof value.lastUpdated !== 'string'
    ) {
      return null;
    }
    return { sigma: value.sigma, lastUpdated: value.lastUpdated };
  }

  async setSigma(location: string, record: SigmaRecord): Promise<void> {
    await this.redis.set(
      sigmaKey(location),
      JSON.stringify({ sigma: record.sigma, lastUpdated: record.lastUpdated }),
    );
  }

  async onModuleDestroy(): Promise<void> {
    await this.redis.quit();
  }

  private async readJson(key: string): Promise<unknown> {
    const raw = await this.redis.get(key);
    if (raw === null) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (error) {
      this.logger.warn(
        `Ignoring malformed model state at ${key}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return null;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
