import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { addMinutes } from 'date-fns';
import { Clock } from '../../common/clock.js';
import {
  atMinuteOfDay,
  formatUtcDate,
  formatUtcTime,
  minutesBetween,
  nextUtcDay,
  startOfUtcDay,
} from '../../common/utils/clinic-time.js';
import {
  SCHEDULING_POLICY,
  type SchedulingPolicy,
} from '../../config/scheduling.config.js';
import {
  AppointmentStatus,
  type AppointmentInterval,
  type ProposedInterval,
  durationMinutes,
  isActive,
  isMutable,
} from './domain/appointment-interval.js';
import type { PhysicianSchedule } from './domain/physician-schedule.js';
import {
  type AppointmentChanges,
  type BookAppointmentRequest,
  validateBookingRequest,
  validateChanges,
  validateTimeWindow,
} from './domain/request-validation.js';
import {
  ConflictType,
  type AppointmentSlot,
  type ConflictResult,
  type ScheduleOperationResult,
  failed,
  succeeded,
} from './domain/schedule-conflict.js';
import {
  AppointmentRepository,
  type AuditAction,
  type AuditEntry,
  ScheduleWriteConflictError,
} from './repositories/appointment.repository.js';
import { ConflictDetectorService } from './services/conflict-detector.service.js';
import { PhysicianLockService } from './services/physician-lock.service.js';
import {
  BOOKING_STRATEGY,
  type BookingStrategy,
} from './strategies/booking-strategy.js';

export type TerminalStatus =
  | typeof AppointmentStatus.Completed
  | typeof AppointmentStatus.NoShow;

export interface ScheduleStatistics {
  physicianId: string;
  start: Date;
  end: Date;
  totalAppointments: number;
  scheduled: number;
  completed: number;
  cancelled: number;
  noShow: number;
  bookedMinutes: number;
  averageDurationMinutes: number;
  completionRate: number;
  cancellationRate: number;
  noShowRate: number;
  /** Booked minutes over business minutes in the range. */
  utilizationRate: number;
}

/**
 * Entry point for every scheduling workflow. Mutations for one physician
 * are serialised through {@link PhysicianLockService}; checks and the
 * commit happen inside the same critical section.
 */
@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);

  constructor(
    private readonly repository: AppointmentRepository,
    private readonly conflictDetector: ConflictDetectorService,
    @Inject(BOOKING_STRATEGY) private readonly bookingStrategy: BookingStrategy,
    private readonly locks: PhysicianLockService,
    private readonly clock: Clock,
    @Inject(SCHEDULING_POLICY) private readonly policy: SchedulingPolicy,
  ) {}

  async scheduleAppointment(
    request: BookAppointmentRequest,
  ): Promise<ScheduleOperationResult> {
    const invalid = validateBookingRequest(request);
    if (invalid) return failed('validation', invalid);

    return this.guard('schedule appointment', () =>
      this.locks.runExclusive(request.physicianId, async () => {
        const now = this.clock.now();
        const proposed: AppointmentInterval = {
          id: randomUUID(),
          physicianId: request.physicianId,
          patientId: request.patientId,
          start: request.start,
          end: request.end,
          status: AppointmentStatus.Scheduled,
          reasonForVisit: request.reasonForVisit ?? null,
          notes: request.notes ?? null,
          cancellationReason: null,
          clinicalDocumentId: request.clinicalDocumentId ?? null,
          roomNumber: request.roomNumber ?? null,
          createdAt: now,
          modifiedAt: now,
        };

        const schedule = await this.repository.getPhysicianSchedule(
          request.physicianId,
        );
        const check = this.conflictDetector.check(proposed, schedule, { now });
        if (check.hasConflicts) {
          return this.rejected('Cannot schedule appointment', check, schedule, now);
        }

        try {
          await this.repository.insert(
            proposed,
            this.audit(proposed.id, 'created', {
              physician_id: proposed.physicianId,
              patient_id: proposed.patientId,
              starts_at: proposed.start.toISOString(),
              ends_at: proposed.end.toISOString(),
            }),
          );
        } catch (error: unknown) {
          return this.afterWriteConflict(error, 'Cannot schedule appointment', proposed, now);
        }

        this.logger.log(
          `Booked ${proposed.id} for physician ${proposed.physicianId} at ${proposed.start.toISOString()}`,
        );
        return succeeded(proposed, 'Appointment scheduled successfully');
      }),
    );
  }

  async updateAppointment(
    id: string,
    changes: AppointmentChanges,
  ): Promise<ScheduleOperationResult> {
    const invalid = validateChanges(changes);
    if (invalid) return failed('validation', invalid);

    return this.guard('update appointment', async () => {
      const existing = await this.repository.findById(id);
      if (!existing) return this.notFound(id);

      return this.locks.runExclusive(existing.physicianId, async () => {
        const schedule = await this.repository.getPhysicianSchedule(
          existing.physicianId,
        );
        const current = schedule.get(id);
        if (!current) return this.notFound(id);
        if (!isMutable(current)) return this.immutable(current, 'update');

        const now = this.clock.now();
        const start = changes.newStart ?? current.start;
        const end =
          changes.durationMinutes !== undefined
            ? addMinutes(start, changes.durationMinutes)
            : new Date(
                start.getTime() + (current.end.getTime() - current.start.getTime()),
              );

        const proposed: AppointmentInterval = {
          ...current,
          start,
          end,
          reasonForVisit:
            changes.reasonForVisit !== undefined
              ? changes.reasonForVisit
              : current.reasonForVisit,
          notes: changes.notes !== undefined ? changes.notes : current.notes,
          roomNumber:
            changes.roomNumber !== undefined
              ? changes.roomNumber
              : current.roomNumber,
          modifiedAt: now,
        };

        const startMoved = start.getTime() !== current.start.getTime();
        const timeChanged = startMoved || end.getTime() !== current.end.getTime();
        if (timeChanged) {
          const check = this.conflictDetector.check(proposed, schedule, {
            now,
            excludeId: id,
            allowPastStart: !startMoved,
          });
          if (check.hasConflicts) {
            return this.rejected('Cannot update appointment time', check, schedule, now);
          }
        }

        try {
          await this.repository.update(
            proposed,
            this.audit(id, 'updated', describeChanges(changes)),
          );
        } catch (error: unknown) {
          return this.afterWriteConflict(error, 'Cannot update appointment time', proposed, now);
        }

        return succeeded(proposed, 'Appointment updated successfully');
      });
    });
  }

  async rescheduleAppointment(
    physicianId: string,
    id: string,
    newStart: Date,
    newEnd: Date,
  ): Promise<ScheduleOperationResult> {
    const invalid = validateTimeWindow(newStart, newEnd);
    if (invalid) return failed('validation', invalid);

    return this.guard('reschedule appointment', () =>
      this.locks.runExclusive(physicianId, async () => {
        const schedule = await this.repository.getPhysicianSchedule(physicianId);
        const current = schedule.get(id);
        if (!current) return this.notFound(id, physicianId);
        if (!isMutable(current)) return this.immutable(current, 'reschedule');

        const now = this.clock.now();
        const proposed: AppointmentInterval = {
          ...current,
          start: newStart,
          end: newEnd,
          modifiedAt: now,
        };

        const check = this.conflictDetector.check(proposed, schedule, {
          now,
          excludeId: id,
        });
        if (check.hasConflicts) {
          return this.rejected('Cannot reschedule appointment', check, schedule, now);
        }

        try {
          await this.repository.update(
            proposed,
            this.audit(id, 'rescheduled', {
              from: { starts_at: current.start.toISOString(), ends_at: current.end.toISOString() },
              to: { starts_at: newStart.toISOString(), ends_at: newEnd.toISOString() },
            }),
          );
        } catch (error: unknown) {
          return this.afterWriteConflict(error, 'Cannot reschedule appointment', proposed, now);
        }

        this.logger.log(`Rescheduled ${id} to ${newStart.toISOString()}`);
        return succeeded(proposed, 'Appointment rescheduled successfully');
      }),
    );
  }

  /** Keeps the record with status cancelled; its window is free again. */
  async cancelAppointment(
    physicianId: string,
    id: string,
    reason: string,
  ): Promise<boolean> {
    try {
      return await this.locks.runExclusive(physicianId, async () => {
        const schedule = await this.repository.getPhysicianSchedule(physicianId);
        const current = schedule.get(id);
        if (!current) {
          this.logger.warn(`Cancel requested for unknown appointment ${id}`);
          return false;
        }
        if (!isMutable(current)) {
          this.logger.warn(`Cannot cancel a ${current.status} appointment (${id})`);
          return false;
        }

        const cancellationReason = reason.trim() || null;
        await this.repository.update(
          {
            ...current,
            status: AppointmentStatus.Cancelled,
            cancellationReason,
            modifiedAt: this.clock.now(),
          },
          this.audit(id, 'cancelled', { reason: cancellationReason }),
        );
        this.logger.log(`Cancelled ${id} for physician ${physicianId}`);
        return true;
      });
    } catch (error: unknown) {
      this.logFailure('cancel appointment', error);
      return false;
    }
  }

  async deleteAppointment(physicianId: string, id: string): Promise<boolean> {
    try {
      return await this.locks.runExclusive(physicianId, async () => {
        const schedule = await this.repository.getPhysicianSchedule(physicianId);
        if (!schedule.has(id)) return false;

        const deleted = await this.repository.delete(
          id,
          this.audit(id, 'deleted', null),
        );
        if (deleted) this.logger.log(`Deleted ${id} for physician ${physicianId}`);
        return deleted;
      });
    } catch (error: unknown) {
      this.logFailure('delete appointment', error);
      return false;
    }
  }

  async updateAppointmentStatus(
    id: string,
    status: TerminalStatus,
  ): Promise<ScheduleOperationResult> {
    return this.guard('update appointment status', async () => {
      const existing = await this.repository.findById(id);
      if (!existing) return this.notFound(id);

      return this.locks.runExclusive(existing.physicianId, async () => {
        const current = (
          await this.repository.getPhysicianSchedule(existing.physicianId)
        ).get(id);
        if (!current) return this.notFound(id);
        if (!isMutable(current)) return this.immutable(current, `mark as ${status}`);

        const updated: AppointmentInterval = {
          ...current,
          status,
          modifiedAt: this.clock.now(),
        };
        await this.repository.update(
          updated,
          this.audit(id, 'status_changed', { from: current.status, to: status }),
        );
        return succeeded(updated, `Appointment marked as ${status}`);
      });
    });
  }

  async linkClinicalDocument(
    id: string,
    documentId: string | null,
  ): Promise<ScheduleOperationResult> {
    return this.guard('link clinical document', async () => {
      const existing = await this.repository.findById(id);
      if (!existing) return this.notFound(id);

      return this.locks.runExclusive(existing.physicianId, async () => {
        const current = (
          await this.repository.getPhysicianSchedule(existing.physicianId)
        ).get(id);
        if (!current) return this.notFound(id);
        if (!isActive(current)) {
          return this.immutable(current, 'link a document to');
        }

        const updated: AppointmentInterval = {
          ...current,
          clinicalDocumentId: documentId,
          modifiedAt: this.clock.now(),
        };
        await this.repository.update(
          updated,
          this.audit(id, 'document_linked', { clinical_document_id: documentId }),
        );
        return succeeded(
          updated,
          documentId ? 'Clinical document linked' : 'Clinical document unlinked',
        );
      });
    });
  }

  async findAppointmentById(id: string): Promise<AppointmentInterval | null> {
    return this.repository.findById(id);
  }

  async getDailySchedule(
    physicianId: string,
    date: Date,
  ): Promise<AppointmentInterval[]> {
    return (await this.repository.getPhysicianSchedule(physicianId)).forDate(date);
  }

  async getScheduleInRange(
    physicianId: string,
    start: Date,
    end: Date,
  ): Promise<AppointmentInterval[]> {
    return (await this.repository.getPhysicianSchedule(physicianId)).inRange(
      start,
      end,
    );
  }

  async getPatientAppointments(patientId: string): Promise<AppointmentInterval[]> {
    return this.repository.findByPatient(patientId);
  }

  async getAllAppointments(): Promise<AppointmentInterval[]> {
    return this.repository.findAll();
  }

  async getAuditTrail(id: string): Promise<AuditEntry[]> {
    return this.repository.getAuditTrail(id);
  }

  async findNextAvailableSlot(
    physicianId: string,
    durationMinutes: number,
    searchStart?: Date,
  ): Promise<AppointmentSlot | null> {
    const now = this.clock.now();
    const schedule = await this.repository.getPhysicianSchedule(physicianId);
    return this.bookingStrategy.findNextAvailableSlot(schedule, {
      durationMinutes,
      searchStart: searchStart ?? now,
      now,
    });
  }

  async findAvailableSlots(
    physicianId: string,
    durationMinutes: number,
    maxSlots: number,
    searchStart?: Date,
  ): Promise<AppointmentSlot[]> {
    const now = this.clock.now();
    const schedule = await this.repository.getPhysicianSchedule(physicianId);
    return this.bookingStrategy.findAvailableSlots(
      schedule,
      { durationMinutes, searchStart: searchStart ?? now, now },
      maxSlots,
    );
  }

  /** Dry run of the booking checks; nothing is written. */
  async checkForConflicts(
    proposed: ProposedInterval,
    excludeId?: string,
    includeSuggestions = true,
  ): Promise<ConflictResult> {
    const now = this.clock.now();
    const schedule = await this.repository.getPhysicianSchedule(
      proposed.physicianId,
    );
    const check = this.conflictDetector.check(proposed, schedule, {
      now,
      excludeId: excludeId ?? proposed.id,
    });
    if (!check.hasConflicts || !includeSuggestions) return check;

    const alternativeSuggestions = this.suggestAlternatives(
      check,
      schedule,
      now,
      excludeId ?? proposed.id,
    );
    const [first] = alternativeSuggestions;
    return {
      ...check,
      alternativeSuggestions,
      validationErrors: first
        ? [...check.validationErrors, `Suggested alternative: ${describeSlot(first)}`]
        : check.validationErrors,
    };
  }

  async getPhysicianStatistics(
    physicianId: string,
    start: Date,
    end: Date,
  ): Promise<ScheduleStatistics> {
    const inRange = await this.getScheduleInRange(physicianId, start, end);
    const count = (status: AppointmentStatus) =>
      inRange.filter((a) => a.status === status).length;
    const booked = inRange.filter(isActive);
    const bookedMinutes = booked.reduce((sum, a) => sum + durationMinutes(a), 0);
    const total = inRange.length;
    const rate = (n: number) => (total === 0 ? 0 : n / total);
    const businessMinutes = this.businessMinutesBetween(start, end);

    const completed = count(AppointmentStatus.Completed);
    const cancelled = count(AppointmentStatus.Cancelled);
    const noShow = count(AppointmentStatus.NoShow);

    return {
      physicianId,
      start,
      end,
      totalAppointments: total,
      scheduled: count(AppointmentStatus.Scheduled),
      completed,
      cancelled,
      noShow,
      bookedMinutes,
      averageDurationMinutes: booked.length === 0 ? 0 : bookedMinutes / booked.length,
      completionRate: rate(completed),
      cancellationRate: rate(cancelled),
      noShowRate: rate(noShow),
      utilizationRate: businessMinutes === 0 ? 0 : bookedMinutes / businessMinutes,
    };
  }

  private rejected(
    prefix: string,
    check: ConflictResult,
    schedule: PhysicianSchedule,
    now: Date,
  ): ScheduleOperationResult {
    const alternativeSuggestions = this.suggestAlternatives(
      check,
      schedule,
      now,
      check.proposed.id,
    );
    return failed('conflict', `${prefix}: ${check.validationErrors.join('; ')}`, {
      conflicts: check.conflicts,
      alternativeSuggestions,
    });
  }

  /** Slots of the same length at or after the requested start. */
  private suggestAlternatives(
    check: ConflictResult,
    schedule: PhysicianSchedule,
    now: Date,
    excludeId?: string,
  ): AppointmentSlot[] {
    if (check.conflicts.some((c) => c.type === ConflictType.DurationViolation)) {
      return [];
    }
    return this.bookingStrategy.findAvailableSlots(
      schedule,
      {
        durationMinutes: minutesBetween(check.proposed.start, check.proposed.end),
        searchStart: check.proposed.start,
        now,
        excludeId,
      },
      this.policy.maxAlternativeSuggestions,
    );
  }

  /**
   * The store refused an overlapping write the in-process check did not
   * see, e.g. a booking made by another process. Report it as a conflict.
   */
  private async afterWriteConflict(
    error: unknown,
    prefix: string,
    proposed: AppointmentInterval,
    now: Date,
  ): Promise<ScheduleOperationResult> {
    if (!(error instanceof ScheduleWriteConflictError)) throw error;

    const fresh = await this.repository.getPhysicianSchedule(proposed.physicianId);
    const check = this.conflictDetector.check(proposed, fresh, {
      now,
      excludeId: proposed.id,
      allowPastStart: true,
    });
    if (check.hasConflicts) {
      return this.rejected(prefix, check, fresh, now);
    }
    return failed('conflict', `${prefix}: ${error.message}`, {
      conflicts: [
        {
          type: ConflictType.DoubleBooking,
          conflictingInterval: null,
          description: error.message,
        },
      ],
    });
  }

  private notFound(id: string, physicianId?: string): ScheduleOperationResult {
    return failed(
      'not_found',
      physicianId
        ? `Appointment ${id} not found for physician ${physicianId}`
        : `Appointment ${id} not found`,
    );
  }

  private immutable(
    appointment: AppointmentInterval,
    action: string,
  ): ScheduleOperationResult {
    const message = `Cannot ${action} a ${appointment.status} appointment`;
    this.logger.warn(`${message} (${appointment.id})`);
    return failed('invariant_violation', message, { appointment });
  }

  private audit(
    appointmentId: string,
    action: AuditAction,
    changes: Record<string, unknown> | null,
  ): AuditEntry {
    return { appointmentId, action, changes, performedAt: this.clock.now() };
  }

  private async guard(
    operation: string,
    work: () => Promise<ScheduleOperationResult>,
  ): Promise<ScheduleOperationResult> {
    try {
      return await work();
    } catch (error: unknown) {
      this.logFailure(operation, error);
      const detail = error instanceof Error ? error.message : String(error);
      return failed('internal', `Failed to ${operation}: ${detail}`);
    }
  }

  private logFailure(operation: string, error: unknown): void {
    this.logger.error(
      `Failed to ${operation}`,
      error instanceof Error ? error.stack : String(error),
    );
  }

  private businessMinutesBetween(start: Date, end: Date): number {
    let total = 0;
    for (
      let day = startOfUtcDay(start);
      day.getTime() < end.getTime();
      day = nextUtcDay(day)
    ) {
      if (!this.policy.businessDays.includes(day.getUTCDay())) continue;
      const opens = atMinuteOfDay(day, this.policy.businessDayStartMinutes);
      const closes = atMinuteOfDay(day, this.policy.businessDayEndMinutes);
      const from = Math.max(opens.getTime(), start.getTime());
      const to = Math.min(closes.getTime(), end.getTime());
      if (to > from) total += (to - from) / 60_000;
    }
    return total;
  }
}

function describeSlot(slot: AppointmentSlot): string {
  return `${formatUtcDate(slot.start)} ${formatUtcTime(slot.start)}-${formatUtcTime(slot.end)}`;
}

function describeChanges(changes: AppointmentChanges): Record<string, unknown> {
  const described: Record<string, unknown> = {};
  if (changes.reasonForVisit !== undefined) described.reason_for_visit = changes.reasonForVisit;
  if (changes.notes !== undefined) described.notes = changes.notes;
  if (changes.durationMinutes !== undefined) described.duration_minutes = changes.durationMinutes;
  if (changes.newStart !== undefined) described.starts_at = changes.newStart.toISOString();
  if (changes.roomNumber !== undefined) described.room_number = changes.roomNumber;
  return described;
}
