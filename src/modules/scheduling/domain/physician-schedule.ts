import {
  isSameUtcDay,
  overlaps,
} from '../../../common/utils/clinic-time.js';
import {
  type AppointmentInterval,
  cloneAppointment,
  isActive,
} from './appointment-interval.js';

export interface BusyInterval {
  start: Date;
  end: Date;
}

const byStart = (a: AppointmentInterval, b: AppointmentInterval) =>
  a.start.getTime() - b.start.getTime() || a.id.localeCompare(b.id);

/**
 * All appointments of one physician, cancelled ones included. Mutation is
 * reserved for the store that owns the schedule; everyone else works on a
 * `snapshot()`.
 */
export class PhysicianSchedule {
  private readonly byId = new Map<string, AppointmentInterval>();
  private sorted: AppointmentInterval[] | null = null;

  constructor(
    readonly physicianId: string,
    appointments: Iterable<AppointmentInterval> = [],
  ) {
    for (const appointment of appointments) {
      this.byId.set(appointment.id, appointment);
    }
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: string): AppointmentInterval | null {
    return this.byId.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Every appointment ordered by start. */
  all(): AppointmentInterval[] {
    if (!this.sorted) {
      this.sorted = [...this.byId.values()].sort(byStart);
    }
    return [...this.sorted];
  }

  active(excludeId?: string): AppointmentInterval[] {
    return this.all().filter((a) => isActive(a) && a.id !== excludeId);
  }

  forDate(date: Date): AppointmentInterval[] {
    return this.all().filter((a) => isSameUtcDay(a.start, date));
  }

  /** Appointments that lie entirely inside `[start, end]`. */
  inRange(start: Date, end: Date): AppointmentInterval[] {
    return this.all().filter(
      (a) =>
        a.start.getTime() >= start.getTime() && a.end.getTime() <= end.getTime(),
    );
  }

  findOverlapping(
    start: Date,
    end: Date,
    excludeId?: string,
  ): AppointmentInterval[] {
    return this.active(excludeId).filter((a) =>
      overlaps(a.start, a.end, start, end),
    );
  }

  /**
   * Active appointments collapsed into disjoint, start-ordered intervals,
   * so a binary search over them is safe.
   */
  busyIntervals(excludeId?: string): BusyInterval[] {
    const merged: BusyInterval[] = [];
    for (const appointment of this.active(excludeId)) {
      const last = merged[merged.length - 1];
      if (last && appointment.start.getTime() <= last.end.getTime()) {
        if (appointment.end.getTime() > last.end.getTime()) {
          last.end = appointment.end;
        }
        continue;
      }
      merged.push({ start: appointment.start, end: appointment.end });
    }
    return merged;
  }

  put(appointment: AppointmentInterval): void {
    this.byId.set(appointment.id, appointment);
    this.sorted = null;
  }

  remove(id: string): boolean {
    const removed = this.byId.delete(id);
    if (removed) this.sorted = null;
    return removed;
  }

  snapshot(): PhysicianSchedule {
    return new PhysicianSchedule(
      this.physicianId,
      [...this.byId.values()].map(cloneAppointment),
    );
  }
}
