import { Controller, Get, UseGuards } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';
import { ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { CategoryListResponseDto } from './providers.dto';
import { ProvidersService } from './providers.service';
import type { CategoryResponse } from './providers.types';

@ApiTags('Categories')
@Controller('categories')
@UseGuards(ThrottlerGuard)
export class CategoriesController {
  constructor(private readonly providersService: ProvidersService) {}

  @ApiOkResponse({ type: CategoryListResponseDto })
  @Get()
  async listCategories(): Promise<{ data: CategoryResponse[] }> {
    return { data: await this.providersService.listCategories() };
  }
}
