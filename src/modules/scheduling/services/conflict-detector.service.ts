import { Inject, Injectable } from '@nestjs/common';
import {
  SCHEDULING_POLICY,
  type DurationPolicy,
  type SchedulingPolicy,
} from '../../../config/scheduling.config.js';
import {
  atMinuteOfDay,
  formatUtcTime,
  minutesBetween,
} from '../../../common/utils/clinic-time.js';
import type { ProposedInterval } from '../domain/appointment-interval.js';
import type { PhysicianSchedule } from '../domain/physician-schedule.js';
import {
  ConflictType,
  type ConflictResult,
  type ScheduleConflict,
} from '../domain/schedule-conflict.js';

export interface ConflictCheckOptions {
  now: Date;
  /** Appointment to leave out of overlap checks, e.g. the one being moved. */
  excludeId?: string;
  durationPolicy?: DurationPolicy;
  allowPastStart?: boolean;
}

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

@Injectable()
export class ConflictDetectorService {
  constructor(
    @Inject(SCHEDULING_POLICY) private readonly policy: SchedulingPolicy,
  ) {}

  check(
    proposed: ProposedInterval,
    schedule: PhysicianSchedule,
    options: ConflictCheckOptions,
  ): ConflictResult {
    const conflicts: ScheduleConflict[] = [
      ...this.findDoubleBookings(proposed, schedule, options.excludeId ?? proposed.id),
      ...this.checkBusinessHours(proposed),
      ...this.checkDuration(proposed, options.durationPolicy ?? 'booking'),
      ...this.checkPastTime(proposed, options),
    ];

    return {
      proposed,
      hasConflicts: conflicts.length > 0,
      conflicts,
      validationErrors: conflicts.map((c) => c.description),
      alternativeSuggestions: [],
    };
  }

  findDoubleBookings(
    proposed: ProposedInterval,
    schedule: PhysicianSchedule,
    excludeId?: string,
  ): ScheduleConflict[] {
    if (schedule.physicianId !== proposed.physicianId) return [];

    return schedule
      .findOverlapping(proposed.start, proposed.end, excludeId)
      .map((existing) => ({
        type: ConflictType.DoubleBooking,
        conflictingInterval: existing,
        description: `Conflicts with existing appointment from ${formatUtcTime(existing.start)} to ${formatUtcTime(existing.end)}`,
      }));
  }

  checkBusinessHours(proposed: ProposedInterval): ScheduleConflict[] {
    const { start, end } = proposed;
    const dayOfWeek = start.getUTCDay();
    const opens = atMinuteOfDay(start, this.policy.businessDayStartMinutes);
    const closes = atMinuteOfDay(start, this.policy.businessDayEndMinutes);

    const reasons: string[] = [];
    if (!this.policy.businessDays.includes(dayOfWeek)) {
      reasons.push(`the clinic is closed on ${DAY_NAMES[dayOfWeek]}`);
    }
    if (start.getTime() < opens.getTime()) {
      reasons.push(`it starts before ${formatUtcTime(opens)}`);
    }
    // A window that runs past midnight necessarily ends after closing.
    if (end.getTime() > closes.getTime()) {
      reasons.push(`it ends after ${formatUtcTime(closes)}`);
    }

    if (reasons.length === 0) return [];

    return [
      {
        type: ConflictType.BusinessHoursViolation,
        conflictingInterval: null,
        description: `Appointments must be scheduled during business hours (${this.describeBusinessHours()}): ${reasons.join(', ')}`,
      },
    ];
  }

  checkDuration(
    proposed: ProposedInterval,
    durationPolicy: DurationPolicy,
  ): ScheduleConflict[] {
    const bounds = this.policy[durationPolicy];
    const minutes = minutesBetween(proposed.start, proposed.end);

    if (minutes < bounds.minMinutes) {
      return [
        {
          type: ConflictType.DurationViolation,
          conflictingInterval: null,
          description: `Appointment must be at least ${bounds.minMinutes} minutes`,
        },
      ];
    }
    if (minutes > bounds.maxMinutes) {
      return [
        {
          type: ConflictType.DurationViolation,
          conflictingInterval: null,
          description: `Appointment cannot exceed ${bounds.maxMinutes} minutes`,
        },
      ];
    }
    return [];
  }

  checkPastTime(
    proposed: ProposedInterval,
    options: Pick<ConflictCheckOptions, 'now' | 'allowPastStart'>,
  ): ScheduleConflict[] {
    if (options.allowPastStart) return [];
    if (proposed.start.getTime() >= options.now.getTime()) return [];

    return [
      {
        type: ConflictType.PastTime,
        conflictingInterval: null,
        description: 'Cannot schedule appointments in the past',
      },
    ];
  }

  private describeBusinessHours(): string {
    const days = this.policy.businessDays.map((d) => DAY_NAMES[d].slice(0, 3));
    const contiguous = this.policy.businessDays.every(
      (d, i, all) => i === 0 || d === all[i - 1] + 1,
    );
    const dayRange =
      contiguous && days.length > 2
        ? `${days[0]}-${days[days.length - 1]}`
        : days.join(', ');
    const opens = atMinuteOfDay(new Date(0), this.policy.businessDayStartMinutes);
    const closes = atMinuteOfDay(new Date(0), this.policy.businessDayEndMinutes);
    return `${dayRange} ${formatUtcTime(opens)}-${formatUtcTime(closes)}`;
  }
}

