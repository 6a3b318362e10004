import { ApiProperty } from '@nestjs/swagger';
import { BOOKING_STATUSES, type BookingStatus } from './bookings.types';

export class BookingDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  customerUserId!: string;

  @ApiProperty()
  providerUserId!: string;

  @ApiProperty({ example: '2030-01-01T10:00:00.000Z' })
  scheduledAt!: string;

  @ApiProperty({ example: 60 })
  durationMinutes!: number;

  @ApiProperty({ example: '2030-01-01T11:00:00.000Z' })
  endsAt!: string;

  @ApiProperty({ enum: BOOKING_STATUSES })
  status!: BookingStatus;

  @ApiProperty()
  address!: string;

  @ApiProperty({ type: 'string', nullable: true })
  notes!: string | null;

  @ApiProperty({ type: 'string', nullable: true, example: '45.00' })
  quotedAmount!: string | null;

  @ApiProperty({ type: 'string', nullable: true, example: '500.00' })
  finalAmount!: string | null;

  @ApiProperty({ type: 'string', nullable: true })
  respondedAt!: string | null;

  @ApiProperty({ type: 'string', nullable: true })
  completedAt!: string | null;

  @ApiProperty({ type: 'integer', nullable: true, minimum: 1, maximum: 5 })
  rating!: number | null;

  @ApiProperty({ type: 'string', nullable: true })
  review!: string | null;

  @ApiProperty({ type: 'string', nullable: true })
  cancellationReason!: string | null;

  @ApiProperty({ example: '2030-01-01T09:00:00.000Z' })
  createdAt!: string;

  @ApiProperty({ example: '2030-01-01T09:00:00.000Z' })
  updatedAt!: string;

  @ApiProperty({ type: 'string', required: false, nullable: true })
  idempotencyKey?: string | null;
}

export class CreateBookingRequestDto {
  @ApiProperty()
  providerUserId!: string;

  @ApiProperty({ example: '2030-01-01T10:00:00.000Z' })
  scheduledAt!: string;

  @ApiProperty({ required: false, default: 60, minimum: 1, maximum: 480 })
  durationMinutes?: number;

  @ApiProperty()
  address!: string;

  @ApiProperty({ required: false })
  notes?: string;

  @ApiProperty({ required: false, maxLength: 255 })
  idempotencyKey?: string;
}

export class CompleteBookingRequestDto {
  @ApiProperty({ example: '500.00' })
  finalAmount!: string;
}

export class CancelBookingRequestDto {
  @ApiProperty({ example: 'Schedule changed' })
  reason!: string;
}

export class ReviewBookingRequestDto {
  @ApiProperty({ minimum: 1, maximum: 5 })
  rating!: number;

  @ApiProperty({ required: false })
  review?: string;
}

export class BookingResponseDto {
  @ApiProperty({ type: BookingDto })
  data!: BookingDto;
}

export class BookingListResponseDto {
  @ApiProperty({ type: [BookingDto] })
  data!: BookingDto[];
}

export class BookingPageResponseDto {
  @ApiProperty({ type: [BookingDto] })
  data!: BookingDto[];

  @ApiProperty()
  page!: number;

  @ApiProperty()
  size!: number;

  @ApiProperty()
  totalElements!: number;

  @ApiProperty()
  totalPages!: number;
}
