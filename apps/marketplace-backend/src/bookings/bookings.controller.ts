import {
  Body,
  Controller,
  Get,
  Param,
  Post,
  Put,
  Query,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { ThrottlerGuard } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiBody,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiForbiddenResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiParam,
  ApiQuery,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { resolveActor } from '../auth/actor';
import { JwtAuthGuard } from '../auth/jwt-auth.guard';
import type { AuthUser } from '../auth/auth.types';
import {
  ErrorResponseDto,
  ValidationErrorResponseDto,
} from '../common/dto/error-response.dto';
import type { Page } from '../common/pagination/pagination';
import { ZodValidationPipe } from '../common/validation/zod-validation.pipe';
import {
  BookingListResponseDto,
  BookingPageResponseDto,
  BookingResponseDto,
  CancelBookingRequestDto,
  CompleteBookingRequestDto,
  CreateBookingRequestDto,
  ReviewBookingRequestDto,
} from './bookings.dto';
import {
  bookingIdParamSchema,
  cancelBookingSchema,
  completeBookingSchema,
  createBookingSchema,
  listBookingsSchema,
  reviewBookingSchema,
  type BookingIdParam,
  type CancelBookingInput,
  type CompleteBookingInput,
  type CreateBookingInput,
  type ListBookingsInput,
  type ReviewBookingInput,
} from './bookings.schemas';
import { BookingsService } from './bookings.service';
import { BOOKING_STATUSES } from './bookings.types';
import type { Booking, BookingResponse } from './bookings.types';

type AuthedRequest = Request & { user: AuthUser };

type PageEnvelope = {
  data: BookingResponse[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
};

@ApiTags('Bookings')
@ApiBearerAuth()
@Controller('bookings')
@UseGuards(JwtAuthGuard, ThrottlerGuard)
@ApiUnauthorizedResponse({ type: ErrorResponseDto })
@ApiForbiddenResponse({ type: ErrorResponseDto })
export class BookingsController {
  constructor(private readonly bookingsService: BookingsService) {}

  @ApiBody({ type: CreateBookingRequestDto })
  @ApiCreatedResponse({ type: BookingResponseDto })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiConflictResponse({ type: ErrorResponseDto })
  @ApiUnprocessableEntityResponse({ type: ErrorResponseDto })
  @Post()
  async createBooking(
    @Req() req: AuthedRequest,
    @Res() res: Response,
    @Body(new ZodValidationPipe(createBookingSchema, 'body'))
    body: CreateBookingInput,
  ): Promise<void> {
    const result = await this.bookingsService.createBooking(
      resolveActor(req.user),
      body,
    );

    // A replayed idempotency key answers 200 with the original booking.
    res.status(result.idempotent ? 200 : 201).json({
      data: this.mapBooking(result.booking, { includeIdempotencyKey: true }),
    });
  }

  @ApiQuery({ name: 'page', required: false })
  @ApiQuery({ name: 'size', required: false })
  @ApiQuery({ name: 'status', required: false, enum: BOOKING_STATUSES })
  @ApiOkResponse({ type: BookingPageResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @Get('my')
  async listMyBookings(
    @Req() req: AuthedRequest,
    @Query(new ZodValidationPipe(listBookingsSchema, 'query'))
    query: ListBookingsInput,
  ): Promise<PageEnvelope> {
    const page = await this.bookingsService.listByCustomer(
      resolveActor(req.user),
      query,
    );
    return this.mapPage(page);
  }

  @ApiQuery({ name: 'page', required: false })
  @ApiQuery({ name: 'size', required: false })
  @ApiQuery({ name: 'status', required: false, enum: BOOKING_STATUSES })
  @ApiOkResponse({ type: BookingPageResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @Get('provider')
  async listProviderBookings(
    @Req() req: AuthedRequest,
    @Query(new ZodValidationPipe(listBookingsSchema, 'query'))
    query: ListBookingsInput,
  ): Promise<PageEnvelope> {
    const page = await this.bookingsService.listByProvider(
      resolveActor(req.user),
      query,
    );
    return this.mapPage(page);
  }

  @ApiOkResponse({ type: BookingListResponseDto })
  @Get('provider/pending')
  async listPending(
    @Req() req: AuthedRequest,
  ): Promise<{ data: BookingResponse[] }> {
    const items = await this.bookingsService.listPendingForProvider(
      resolveActor(req.user),
    );
    return { data: items.map((booking) => this.mapBooking(booking)) };
  }

  @ApiOkResponse({ type: BookingListResponseDto })
  @Get('provider/upcoming')
  async listUpcoming(
    @Req() req: AuthedRequest,
  ): Promise<{ data: BookingResponse[] }> {
    const items = await this.bookingsService.listUpcomingForProvider(
      resolveActor(req.user),
    );
    return { data: items.map((booking) => this.mapBooking(booking)) };
  }

  @ApiParam({ name: 'id', description: 'Booking id' })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @Get(':id')
  async getBooking(
    @Req() req: AuthedRequest,
    @Param(new ZodValidationPipe(bookingIdParamSchema, 'params'))
    params: BookingIdParam,
  ): Promise<{ data: BookingResponse }> {
    const booking = await this.bookingsService.getBooking(
      resolveActor(req.user),
      params.id,
    );
    return { data: this.mapBooking(booking) };
  }

  @ApiParam({ name: 'id', description: 'Booking id' })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiConflictResponse({ type: ErrorResponseDto })
  @Put(':id/accept')
  async accept(
    @Req() req: AuthedRequest,
    @Param(new ZodValidationPipe(bookingIdParamSchema, 'params'))
    params: BookingIdParam,
  ): Promise<{ data: BookingResponse }> {
    const booking = await this.bookingsService.respondToBooking(
      resolveActor(req.user),
      params.id,
      'accept',
    );
    return { data: this.mapBooking(booking) };
  }

  @ApiParam({ name: 'id', description: 'Booking id' })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiConflictResponse({ type: ErrorResponseDto })
  @Put(':id/reject')
  async reject(
    @Req() req: AuthedRequest,
    @Param(new ZodValidationPipe(bookingIdParamSchema, 'params'))
    params: BookingIdParam,
  ): Promise<{ data: BookingResponse }> {
    const booking = await this.bookingsService.respondToBooking(
      resolveActor(req.user),
      params.id,
      'reject',
    );
    return { data: this.mapBooking(booking) };
  }

  @ApiParam({ name: 'id', description: 'Booking id' })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiConflictResponse({ type: ErrorResponseDto })
  @Put(':id/start')
  async start(
    @Req() req: AuthedRequest,
    @Param(new ZodValidationPipe(bookingIdParamSchema, 'params'))
    params: BookingIdParam,
  ): Promise<{ data: BookingResponse }> {
    const booking = await this.bookingsService.startService(
      resolveActor(req.user),
      params.id,
    );
    return { data: this.mapBooking(booking) };
  }

  @ApiParam({ name: 'id', description: 'Booking id' })
  @ApiBody({ type: CompleteBookingRequestDto })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiConflictResponse({ type: ErrorResponseDto })
  @Put(':id/complete')
  async complete(
    @Req() req: AuthedRequest,
    @Param(new ZodValidationPipe(bookingIdParamSchema, 'params'))
    params: BookingIdParam,
    @Body(new ZodValidationPipe(completeBookingSchema, 'body'))
    body: CompleteBookingInput,
  ): Promise<{ data: BookingResponse }> {
    const booking = await this.bookingsService.completeService(
      resolveActor(req.user),
      params.id,
      body.finalAmount,
    );
    return { data: this.mapBooking(booking) };
  }

  @ApiParam({ name: 'id', description: 'Booking id' })
  @ApiBody({ type: CancelBookingRequestDto })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiConflictResponse({ type: ErrorResponseDto })
  @Put(':id/cancel')
  async cancel(
    @Req() req: AuthedRequest,
    @Param(new ZodValidationPipe(bookingIdParamSchema, 'params'))
    params: BookingIdParam,
    @Body(new ZodValidationPipe(cancelBookingSchema, 'body'))
    body: CancelBookingInput,
  ): Promise<{ data: BookingResponse }> {
    const booking = await this.bookingsService.cancelBooking(
      resolveActor(req.user),
      params.id,
      body.reason,
    );
    return { data: this.mapBooking(booking) };
  }

  @ApiParam({ name: 'id', description: 'Booking id' })
  @ApiBody({ type: ReviewBookingRequestDto })
  @ApiOkResponse({ type: BookingResponseDto })
  @ApiBadRequestResponse({ type: ValidationErrorResponseDto })
  @ApiNotFoundResponse({ type: ErrorResponseDto })
  @ApiUnprocessableEntityResponse({ type: ErrorResponseDto })
  @Put(':id/review')
  async review(
    @Req() req: AuthedRequest,
    @Param(new ZodValidationPipe(bookingIdParamSchema, 'params'))
    params: BookingIdParam,
    @Body(new ZodValidationPipe(reviewBookingSchema, 'body'))
    body: ReviewBookingInput,
  ): Promise<{ data: BookingResponse }> {
    const booking = await this.bookingsService.attachReview(
      resolveActor(req.user),
      params.id,
      body.rating,
      body.review,
    );
    return { data: this.mapBooking(booking) };
  }

  private mapPage(page: Page<Booking>): PageEnvelope {
    return {
      data: page.items.map((booking) => this.mapBooking(booking)),
      page: page.page,
      size: page.size,
      totalElements: page.totalElements,
      totalPages: page.totalPages,
    };
  }

  private mapBooking(
    booking: Booking,
    options?: { includeIdempotencyKey?: boolean },
  ): BookingResponse {
    const response: BookingResponse = {
      id: booking.id,
      customerUserId: booking.customerUserId,
      providerUserId: booking.providerUserId,
      scheduledAt: booking.scheduledAt.toISOString(),
      durationMinutes: booking.durationMinutes,
      endsAt: booking.endsAt.toISOString(),
      status: booking.status,
      address: booking.address,
      notes: booking.notes,
      quotedAmount: booking.quotedAmount,
      finalAmount: booking.finalAmount,
      respondedAt: booking.respondedAt?.toISOString() ?? null,
      completedAt: booking.completedAt?.toISOString() ?? null,
      rating: booking.rating,
      review: booking.review,
      cancellationReason: booking.cancellationReason,
      createdAt: booking.createdAt.toISOString(),
      updatedAt: booking.updatedAt.toISOString(),
    };

    if (options?.includeIdempotencyKey) {
      response.idempotencyKey = booking.idempotencyKey ?? null;
    }

    return response;
  }
}
