import { Module } from '@nestjs/common';
import { SchedulingModule } from '../scheduling/scheduling.module.js';
import {
  AppointmentController,
  PhysicianScheduleController,
} from './appointment.controller.js';

@Module({
  imports: [SchedulingModule],
  controllers: [AppointmentController, PhysicianScheduleController],
})
export class AppointmentModule {}
