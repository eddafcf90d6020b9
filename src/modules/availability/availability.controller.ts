import { Controller, Get, Query, BadRequestException } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiQuery } from '@nestjs/swagger';
import { presentSlot } from '../scheduling/scheduling.presenter.js';
import { AvailabilityService } from './availability.service.js';
import { AvailabilityQuerySchema } from './dto/availability-query.dto.js';

@ApiTags('Availability')
@Controller('availability')
export class AvailabilityController {
  constructor(
    private readonly availabilityService: AvailabilityService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Find physicians available in a time window' })
  @ApiQuery({ name: 'start', type: String, required: false, description: 'ISO8601 datetime' })
  @ApiQuery({ name: 'end', type: String, required: false, description: 'ISO8601 datetime' })
  @ApiQuery({ name: 'date', type: String, required: false, description: 'YYYY-MM-DD, searches that business day' })
  @ApiQuery({ name: 'duration_minutes', type: Number, required: false, description: 'Required with date' })
  @ApiQuery({ name: 'specialization', type: String, required: false })
  async findAvailablePhysicians(@Query() query: Record<string, unknown>) {
    const parsed = AvailabilityQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }

    const results = await this.availabilityService.findAvailablePhysicians(
      parsed.data,
    );

    return {
      physicians: results.map((r) => ({
        physician_id: r.physician.id,
        physician_name: r.physician.name,
        specializations: r.physician.specializations,
        matches_time_slot: r.matchesTimeSlot,
        next_available_slot: presentSlot(r.nextAvailableSlot),
      })),
    };
  }
}
