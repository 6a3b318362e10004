import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import type { Pool } from 'pg';
import { DB_POOL } from './drizzle';

@Injectable()
export class DbService implements OnApplicationShutdown {
  private readonly logger = new Logger(DbService.name);

  constructor(@Inject(DB_POOL) private readonly pool: Pool) {}

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('select 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `ping failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
  }
}
