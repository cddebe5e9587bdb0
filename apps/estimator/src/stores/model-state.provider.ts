import { FactoryProvider, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { MODEL_STATE_STORE, ModelStateStore } from '../interfaces/model-state.interface';
import { InMemoryModelStateStore } from './in-memory-model-state.store';
import { RedisModelStateStore } from './redis-model-state.store';

const logger = new Logger('ModelStateStore');

/**
 * Redis-backed model state when REDIS_URL is configured, in-memory otherwise.
 */
export const modelStateStoreProvider: FactoryProvider<ModelStateStore> = {
  provide: MODEL_STATE_STORE,
  inject: [ConfigService],
  useFactory: (configService: ConfigService): ModelStateStore => {
    const redisUrl = configService.get<string>('REDIS_URL');
    if (!redisUrl) {
      logger.warn('REDIS_URL not set, model state will not survive a restart');
      return new InMemoryModelStateStore();
    }

    logger.log('Using Redis for model state');
    return new RedisModelStateStore(
      new Redis(redisUrl, {
        maxRetriesPerRequest: 3,
        connectTimeout: 5000,
      }),
    );
  },
};
