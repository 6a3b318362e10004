import {
  Global,
  Inject,
  Injectable,
  Logger,
  Module,
  OnApplicationShutdown,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient } from 'redis';
import { CACHE_STORE } from './cache.types';
import { MemoryCacheStore } from './memory-cache.store';
import { RedisCacheStore, type RedisClient } from './redis-cache.store';

export const REDIS_CLIENT = Symbol('REDIS_CLIENT');

@Injectable()
class RedisLifecycle implements OnApplicationShutdown {
  constructor(
    @Optional() @Inject(REDIS_CLIENT) private readonly client?: RedisClient | null,
  ) {}

  async onApplicationShutdown(): Promise<void> {
    if (this.client?.isOpen) {
      await this.client.quit();
    }
  }
}

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      useFactory: async (
        configService: ConfigService,
      ): Promise<RedisClient | null> => {
        const url = configService.get<string>('REDIS_URL');
        if (!url) {
          Logger.log('REDIS_URL not set, using in-memory cache', 'CacheModule');
          return null;
        }
        const client = createClient({ url });
        client.on('error', (error) => {
          Logger.error('Redis cache client error', error, 'CacheModule');
        });
        await client.connect();
        return client;
      },
      inject: [ConfigService],
    },
    {
      provide: CACHE_STORE,
      useFactory: (client: RedisClient | null) =>
        client ? new RedisCacheStore(client) : new MemoryCacheStore(),
      inject: [REDIS_CLIENT],
    },
    RedisLifecycle,
  ],
  exports: [CACHE_STORE],
})
export class CacheModule {}
