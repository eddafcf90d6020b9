import type { AppointmentInterval } from '../domain/appointment-interval.js';
import type { PhysicianSchedule } from '../domain/physician-schedule.js';

export const AUDIT_ACTIONS = [
  'created',
  'updated',
  'rescheduled',
  'cancelled',
  'status_changed',
  'document_linked',
  'deleted',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export interface AuditEntry {
  appointmentId: string;
  action: AuditAction;
  changes: Record<string, unknown> | null;
  performedAt: Date;
}

/**
 * Raised by a store when it refuses a write because the physician already
 * has an active appointment in that window.
 */
export class ScheduleWriteConflictError extends Error {
  constructor(readonly physicianId: string) {
    super(`Overlapping appointment rejected for physician ${physicianId}`);
    this.name = 'ScheduleWriteConflictError';
  }
}

/**
 * Storage seam for appointments. Writes are only issued while the
 * physician's lock is held; each write either lands completely or not at
 * all. Reads return snapshots the caller may keep.
 */
export abstract class AppointmentRepository {
  abstract getPhysicianSchedule(physicianId: string): Promise<PhysicianSchedule>;
  abstract findById(id: string): Promise<AppointmentInterval | null>;
  abstract findByPatient(patientId: string): Promise<AppointmentInterval[]>;
  abstract findAll(): Promise<AppointmentInterval[]>;
  abstract insert(appointment: AppointmentInterval, audit: AuditEntry): Promise<void>;
  abstract update(appointment: AppointmentInterval, audit: AuditEntry): Promise<void>;
  abstract delete(id: string, audit: AuditEntry): Promise<boolean>;
  abstract getAuditTrail(appointmentId: string): Promise<AuditEntry[]>;
}
