import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock, SystemClock } from '../../common/clock.js';
import {
  SCHEDULING_POLICY,
  type SchedulingPolicy,
} from '../../config/scheduling.config.js';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import { AppointmentRepository } from './repositories/appointment.repository.js';
import { DrizzleAppointmentRepository } from './repositories/drizzle-appointment.repository.js';
import { InMemoryAppointmentRepository } from './repositories/in-memory-appointment.repository.js';
import { SchedulerService } from './scheduler.service.js';
import { ConflictDetectorService } from './services/conflict-detector.service.js';
import { PhysicianLockService } from './services/physician-lock.service.js';
import { BOOKING_STRATEGY } from './strategies/booking-strategy.js';
import { FirstAvailableBookingStrategy } from './strategies/first-available.strategy.js';

@Module({
  providers: [
    {
      provide: SCHEDULING_POLICY,
      useFactory: (config: ConfigService): SchedulingPolicy =>
        config.getOrThrow<SchedulingPolicy>('scheduling'),
      inject: [ConfigService],
    },
    {
      provide: AppointmentRepository,
      useFactory: (db: DatabaseConnection | null): AppointmentRepository =>
        db
          ? new DrizzleAppointmentRepository(db)
          : new InMemoryAppointmentRepository(),
      inject: [DATABASE_CONNECTION],
    },
    { provide: Clock, useClass: SystemClock },
    { provide: BOOKING_STRATEGY, useClass: FirstAvailableBookingStrategy },
    ConflictDetectorService,
    PhysicianLockService,
    SchedulerService,
  ],
  exports: [SchedulerService, SCHEDULING_POLICY, Clock],
})
export class SchedulingModule {}
