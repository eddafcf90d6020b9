import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { Clock } from '../../common/clock.js';
import {
  atMinuteOfDay,
  minutesBetween,
} from '../../common/utils/clinic-time.js';
import {
  SCHEDULING_POLICY,
  type SchedulingPolicy,
} from '../../config/scheduling.config.js';
import {
  PhysicianDirectory,
  type Physician,
} from '../physician/physician-directory.js';
import type { AppointmentSlot } from '../scheduling/domain/schedule-conflict.js';
import { SchedulerService } from '../scheduling/scheduler.service.js';

export type AvailabilityQuery =
  | { start: Date; end: Date; specialization?: string }
  | { date: Date; durationMinutes: number; specialization?: string };

export interface PhysicianAvailability {
  physician: Physician;
  nextAvailableSlot: AppointmentSlot;
  /** The slot lies entirely inside the requested window. */
  matchesTimeSlot: boolean;
}

interface SearchWindow {
  start: Date;
  end: Date;
  durationMinutes: number;
}

@Injectable()
export class AvailabilityService {
  constructor(
    private readonly scheduler: SchedulerService,
    private readonly directory: PhysicianDirectory,
    private readonly clock: Clock,
    @Inject(SCHEDULING_POLICY) private readonly policy: SchedulingPolicy,
  ) {}

  async findAvailablePhysicians(
    query: AvailabilityQuery,
  ): Promise<PhysicianAvailability[]> {
    const window = this.resolveWindow(query);
    const physicians = await this.directory.listPhysicians(query.specialization);

    const candidates = await Promise.all(
      physicians.map(async (physician) => {
        const slot = await this.scheduler.findNextAvailableSlot(
          physician.id,
          window.durationMinutes,
          window.start,
        );
        if (!slot || slot.end.getTime() > window.end.getTime()) return null;

        return {
          physician,
          nextAvailableSlot: slot,
          matchesTimeSlot:
            slot.start.getTime() >= window.start.getTime() &&
            slot.end.getTime() <= window.end.getTime(),
        };
      }),
    );

    return candidates
      .filter((c): c is PhysicianAvailability => c !== null)
      .sort(
        (a, b) =>
          Number(b.matchesTimeSlot) - Number(a.matchesTimeSlot) ||
          a.nextAvailableSlot.start.getTime() -
            b.nextAvailableSlot.start.getTime() ||
          a.physician.name.localeCompare(b.physician.name),
      );
  }

  private resolveWindow(query: AvailabilityQuery): SearchWindow {
    const window: SearchWindow =
      'date' in query
        ? {
            start: atMinuteOfDay(query.date, this.policy.businessDayStartMinutes),
            end: atMinuteOfDay(query.date, this.policy.businessDayEndMinutes),
            durationMinutes: query.durationMinutes,
          }
        : {
            start: query.start,
            end: query.end,
            durationMinutes: minutesBetween(query.start, query.end),
          };

    if (
      Number.isNaN(window.start.getTime()) ||
      Number.isNaN(window.end.getTime())
    ) {
      throw new BadRequestException('Search window must use valid dates');
    }
    if (window.start.getTime() >= window.end.getTime()) {
      throw new BadRequestException('Search window must start before it ends');
    }

    const { minMinutes, maxMinutes } = this.policy.search;
    if (
      !Number.isInteger(window.durationMinutes) ||
      window.durationMinutes < minMinutes ||
      window.durationMinutes > maxMinutes
    ) {
      throw new BadRequestException(
        `Duration must be a whole number of minutes between ${minMinutes} and ${maxMinutes}`,
      );
    }
    if (window.durationMinutes > minutesBetween(window.start, window.end)) {
      throw new BadRequestException('Duration does not fit in the search window');
    }
    if (window.end.getTime() <= this.clock.now().getTime()) {
      throw new BadRequestException('Search window is in the past');
    }

    return window;
  }
}
