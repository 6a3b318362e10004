import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CLOCK, systemClock } from '../common/clock/clock';
import { DbModule } from '../db/db.module';
import { CategoriesController } from './categories.controller';
import { ProvidersController } from './providers.controller';
import {
  DrizzleProvidersRepository,
  ProvidersRepository,
} from './providers.repository';
import { ProvidersService } from './providers.service';

@Module({
  imports: [DbModule, AuthModule],
  controllers: [ProvidersController, CategoriesController],
  providers: [
    ProvidersService,
    { provide: ProvidersRepository, useClass: DrizzleProvidersRepository },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [ProvidersService],
})
export class ProvidersModule {}
