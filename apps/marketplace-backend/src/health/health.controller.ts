import { Controller, Get, ServiceUnavailableException } from '@nestjs/common';
import {
  ApiOkResponse,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { DbService } from '../db/db.service';

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly dbService: DbService) {}

  @ApiOkResponse({ description: 'Service and database are reachable' })
  @ApiServiceUnavailableResponse({ description: 'Database is unreachable' })
  @Get()
  async check(): Promise<{ status: 'ok'; database: 'up' }> {
    if (!(await this.dbService.ping())) {
      throw new ServiceUnavailableException({
        code: 'SERVICE_UNAVAILABLE',
        message: 'Database is unreachable',
      });
    }
    return { status: 'ok', database: 'up' };
  }
}
