import { Inject, Injectable } from '@nestjs/common';
import { addMinutes } from 'date-fns';
import {
  SCHEDULING_POLICY,
  type SchedulingPolicy,
} from '../../../config/scheduling.config.js';
import {
  MINUTES_PER_DAY,
  atMinuteOfDay,
  laterOf,
  nextUtcDay,
  roundUpToIncrement,
} from '../../../common/utils/clinic-time.js';
import type {
  BusyInterval,
  PhysicianSchedule,
} from '../domain/physician-schedule.js';
import type { AppointmentSlot } from '../domain/schedule-conflict.js';
import type { BookingStrategy, SlotSearch } from './booking-strategy.js';

/**
 * Walks business-day windows in slot increments from the search start and
 * returns the earliest free windows. Found slots never overlap each other.
 */
@Injectable()
export class FirstAvailableBookingStrategy implements BookingStrategy {
  constructor(
    @Inject(SCHEDULING_POLICY) private readonly policy: SchedulingPolicy,
  ) {}

  findAvailableSlots(
    schedule: PhysicianSchedule,
    search: SlotSearch,
    maxSlots: number,
  ): AppointmentSlot[] {
    const { durationMinutes } = search;
    if (maxSlots <= 0 || !this.isSearchableDuration(durationMinutes)) {
      return [];
    }

    const increment = this.policy.slotIncrementMinutes;
    const busy = schedule.busyIntervals(search.excludeId);
    const slots: AppointmentSlot[] = [];

    let cursor = roundUpToIncrement(
      laterOf(search.searchStart, search.now),
      increment,
    );
    const horizon = addMinutes(
      cursor,
      this.policy.searchHorizonDays * MINUTES_PER_DAY,
    );

    while (slots.length < maxSlots && cursor.getTime() < horizon.getTime()) {
      const opens = atMinuteOfDay(cursor, this.policy.businessDayStartMinutes);
      const closes = atMinuteOfDay(cursor, this.policy.businessDayEndMinutes);

      if (
        !this.policy.businessDays.includes(cursor.getUTCDay()) ||
        cursor.getTime() >= closes.getTime()
      ) {
        cursor = this.nextOpening(cursor);
        continue;
      }
      if (cursor.getTime() < opens.getTime()) {
        cursor = opens;
      }

      const slotEnd = addMinutes(cursor, durationMinutes);
      if (slotEnd.getTime() > closes.getTime()) {
        cursor = this.nextOpening(cursor);
        continue;
      }

      const overlap = this.findOverlappingInterval(busy, cursor, slotEnd);
      if (overlap) {
        // Skip ahead to the end of the busy interval
        cursor = roundUpToIncrement(overlap.end, increment);
        continue;
      }

      slots.push({
        start: cursor,
        end: slotEnd,
        physicianId: schedule.physicianId,
        reason: slots.length === 0 ? 'First available' : 'Next available',
        isOptimal: this.isOptimal(busy, cursor, slotEnd, opens, closes),
      });
      cursor = roundUpToIncrement(slotEnd, increment);
    }

    return slots;
  }

  findNextAvailableSlot(
    schedule: PhysicianSchedule,
    search: SlotSearch,
  ): AppointmentSlot | null {
    return this.findAvailableSlots(schedule, search, 1)[0] ?? null;
  }

  private isSearchableDuration(minutes: number): boolean {
    const { minMinutes, maxMinutes } = this.policy.search;
    const dayLength =
      this.policy.businessDayEndMinutes - this.policy.businessDayStartMinutes;
    return (
      Number.isInteger(minutes) &&
      minutes >= minMinutes &&
      minutes <= maxMinutes &&
      minutes <= dayLength
    );
  }

  private nextOpening(date: Date): Date {
    return atMinuteOfDay(nextUtcDay(date), this.policy.businessDayStartMinutes);
  }

  /**
   * A slot is optimal when it sits flush against a booking or a day
   * boundary, so taking it leaves the remaining free time in one piece.
   */
  private isOptimal(
    busy: BusyInterval[],
    start: Date,
    end: Date,
    opens: Date,
    closes: Date,
  ): boolean {
    const startMs = start.getTime();
    const endMs = end.getTime();
    return (
      startMs === opens.getTime() ||
      endMs === closes.getTime() ||
      busy.some(
        (b) => b.end.getTime() === startMs || b.start.getTime() === endMs,
      )
    );
  }

  private findOverlappingInterval(
    intervals: BusyInterval[],
    start: Date,
    end: Date,
  ): BusyInterval | null {
    let left = 0;
    let right = intervals.length - 1;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      const interval = intervals[mid];

      if (interval.end.getTime() <= start.getTime()) {
        left = mid + 1;
      } else if (interval.start.getTime() >= end.getTime()) {
        right = mid - 1;
      } else {
        return interval;
      }
    }

    return null;
  }
}
