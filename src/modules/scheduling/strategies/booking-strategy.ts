import type { PhysicianSchedule } from '../domain/physician-schedule.js';
import type { AppointmentSlot } from '../domain/schedule-conflict.js';

export const BOOKING_STRATEGY = 'BOOKING_STRATEGY';

export interface SlotSearch {
  durationMinutes: number;
  searchStart: Date;
  now: Date;
  /** Leave this appointment's own time out of the busy set. */
  excludeId?: string;
}

export interface BookingStrategy {
  /** Ordered, non-overlapping free windows; at most `maxSlots`. */
  findAvailableSlots(
    schedule: PhysicianSchedule,
    search: SlotSearch,
    maxSlots: number,
  ): AppointmentSlot[];

  findNextAvailableSlot(
    schedule: PhysicianSchedule,
    search: SlotSearch,
  ): AppointmentSlot | null;
}
