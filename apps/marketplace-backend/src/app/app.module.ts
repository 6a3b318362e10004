import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { AuthModule } from '../auth/auth.module';
import { BookingsModule } from '../bookings/bookings.module';
import { CacheModule } from '../cache/cache.module';
import { DomainExceptionFilter } from '../common/filters/domain-exception.filter';
import { validateEnv } from '../config/env.schema';
import { DbModule } from '../db/db.module';
import { HealthModule } from '../health/health.module';
import { ProvidersModule } from '../providers/providers.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['apps/marketplace-backend/.env', '.env'],
      validate: validateEnv,
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          ttl: configService.get<number>('THROTTLE_TTL_MS') ?? 60000,
          limit: configService.get<number>('THROTTLE_LIMIT') ?? 100,
        },
      ],
    }),
    DbModule,
    CacheModule,
    AuthModule,
    ProvidersModule,
    BookingsModule,
    HealthModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: DomainExceptionFilter }],
})
export class AppModule {}
