import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import { createDrizzle, DB_POOL, DRIZZLE_DB } from './drizzle';
import { DbService } from './db.service';

const createPool = (configService: ConfigService): Pool => {
  const pool = new Pool({
    connectionString: configService.getOrThrow<string>('DATABASE_URL'),
    max: configService.get<number>('DATABASE_POOL_SIZE') ?? 10,
    application_name: 'marketplace-backend',
  });
  // Idle clients can fail between queries; pg emits those on the pool.
  pool.on('error', (error) => {
    Logger.error('Idle database client error', error.stack, 'DbModule');
  });
  return pool;
};

@Module({
  providers: [
    DbService,
    {
      provide: DB_POOL,
      useFactory: createPool,
      inject: [ConfigService],
    },
    {
      provide: DRIZZLE_DB,
      useFactory: (pool: Pool) => createDrizzle(pool),
      inject: [DB_POOL],
    },
  ],
  exports: [DRIZZLE_DB, DB_POOL, DbService],
})
export class DbModule {}
