import { Module } from '@nestjs/common';
import { PhysicianModule } from '../physician/physician.module.js';
import { SchedulingModule } from '../scheduling/scheduling.module.js';
import { AvailabilityController } from './availability.controller.js';
import { AvailabilityService } from './availability.service.js';

@Module({
  imports: [SchedulingModule, PhysicianModule],
  controllers: [AvailabilityController],
  providers: [AvailabilityService],
})
export class AvailabilityModule {}
