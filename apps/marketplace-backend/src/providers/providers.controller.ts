import {
  Body,
  Controller,
  Get,
  Param,
  Patch,
  Query,
  Req,
  UseGuards,
} from '@nestjs/common';
import type { Request } from 'express';
import { ThrottlerGuard } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiBody,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiParam,
  ApiQuery,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { resolveActor } from '../auth/actor';
import type { AuthUser } from '../auth/auth.types';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import { roles } from '../auth/roles.decorator';
import { RolesGuard } from '../auth/roles.guard';
import {
  ErrorResponseDto,
  ValidationErrorResponseDto,
} from '../common/dto/error-response.dto';
import { ZodValidationPipe } from '../common/validation/zod-validation.pipe';
import {
  ProviderPageResponseDto,
  ProviderResponseDto,
  UpdateAvailabilityRequestDto,
} from './providers.dto';
import {
  listProvidersSchema,
  providerIdParamSchema,
  updateAvailabilitySchema,
  type ListProvidersInput,
  type ProviderIdParam,
  type UpdateAvailabilityInput,
} from './providers.schemas';
import { ProvidersService } from './providers.service';
import type { ProviderResponse } from './providers.types';

@ApiTags('Providers')
@Controller('providers')
@UseGuards(ThrottlerGuard)
export class ProvidersController {
  constructor(private readonly providersService: ProvidersService) {}

  @ApiQuery({ name: 'page', required: false })
  @ApiQuery({ name: 'size', required: false })
  @ApiQuery({ name: 'categoryId', required: false })
  @ApiQuery({ name: 'area', required: false })
  @ApiOkResponse({ type: ProviderPageResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @Get()
  async listProviders(
    @Query(new ZodValidationPipe(listProvidersSchema, 'query'))
    query: ListProvidersInput,
  ): Promise<{
    data: ProviderResponse[];
    page: number;
    size: number;
    totalElements: number;
    totalPages: number;
  }> {
    const page = await this.providersService.listProviders(query);
    return {
      data: page.items,
      page: page.page,
      size: page.size,
      totalElements: page.totalElements,
      totalPages: page.totalPages,
    };
  }

  @ApiBearerAuth()
  @ApiBody({ type: UpdateAvailabilityRequestDto })
  @ApiOkResponse({ type: ProviderResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @ApiUnauthorizedResponse({ type: ErrorResponseDto })
  @ApiForbiddenResponse({ type: ErrorResponseDto })
  @Patch('me/availability')
  @UseGuards(JwtAuthGuard, RolesGuard)
  @roles('provider')
  async updateAvailability(
    @Req() req: Request & { user: AuthUser },
    @Body(new ZodValidationPipe(updateAvailabilitySchema, 'body'))
    body: UpdateAvailabilityInput,
  ): Promise<{ data: ProviderResponse }> {
    const provider = await this.providersService.setAvailability(
      resolveActor(req.user),
      body.available,
    );
    return { data: provider };
  }

  @ApiParam({ name: 'id', description: 'Provider user id' })
  @ApiOkResponse({ type: ProviderResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @Get(':id')
  async getProvider(
    @Param(new ZodValidationPipe(providerIdParamSchema, 'params'))
    params: ProviderIdParam,
  ): Promise<{ data: ProviderResponse }> {
    return { data: await this.providersService.getProvider(params.id) };
  }
}
