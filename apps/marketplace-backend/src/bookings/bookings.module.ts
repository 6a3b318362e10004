import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CLOCK, systemClock } from '../common/clock/clock';
import { DbModule } from '../db/db.module';
import { ProvidersModule } from '../providers/providers.module';
import { BookingsController } from './bookings.controller';
import {
  BookingsRepository,
  DrizzleBookingsRepository,
} from './bookings.repository';
import { BookingsService } from './bookings.service';

@Module({
  imports: [DbModule, AuthModule, ProvidersModule],
  controllers: [BookingsController],
  providers: [
    BookingsService,
    { provide: BookingsRepository, useClass: DrizzleBookingsRepository },
    { provide: CLOCK, useValue: systemClock },
  ],
})
export class BookingsModule {}
