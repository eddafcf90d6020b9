import { Inject, Injectable } from '@nestjs/common';
import { asc, eq } from 'drizzle-orm';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../../database/database.module.js';
import {
  appointments,
  appointmentAuditLog,
  type AppointmentRow,
  type NewAppointmentRow,
} from '../../../database/schema/index.js';
import {
  APPOINTMENT_STATUSES,
  type AppointmentInterval,
  type AppointmentStatus,
} from '../domain/appointment-interval.js';
import { PhysicianSchedule } from '../domain/physician-schedule.js';
import {
  AUDIT_ACTIONS,
  AppointmentRepository,
  type AuditAction,
  type AuditEntry,
  ScheduleWriteConflictError,
} from './appointment.repository.js';

// Postgres exclusion_violation, raised by the no_physician_overlap constraint.
const EXCLUSION_VIOLATION = '23P01';

@Injectable()
export class DrizzleAppointmentRepository extends AppointmentRepository {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {
    super();
  }

  async getPhysicianSchedule(physicianId: string): Promise<PhysicianSchedule> {
    const rows = await this.db
      .select()
      .from(appointments)
      .where(eq(appointments.physicianId, physicianId))
      .orderBy(asc(appointments.startsAt));

    return new PhysicianSchedule(physicianId, rows.map(toInterval));
  }

  async findById(id: string): Promise<AppointmentInterval | null> {
    const [row] = await this.db
      .select()
      .from(appointments)
      .where(eq(appointments.id, id));

    return row ? toInterval(row) : null;
  }

  async findByPatient(patientId: string): Promise<AppointmentInterval[]> {
    const rows = await this.db
      .select()
      .from(appointments)
      .where(eq(appointments.patientId, patientId))
      .orderBy(asc(appointments.startsAt));

    return rows.map(toInterval);
  }

  async findAll(): Promise<AppointmentInterval[]> {
    const rows = await this.db
      .select()
      .from(appointments)
      .orderBy(asc(appointments.startsAt));

    return rows.map(toInterval);
  }

  async insert(appointment: AppointmentInterval, audit: AuditEntry): Promise<void> {
    try {
      await this.db.batch([
        this.db.insert(appointments).values(toRow(appointment)),
        this.db.insert(appointmentAuditLog).values(toAuditRow(audit)),
      ]);
    } catch (error: unknown) {
      throw this.translateWriteError(error, appointment.physicianId);
    }
  }

  async update(appointment: AppointmentInterval, audit: AuditEntry): Promise<void> {
    const { id, ...changes } = toRow(appointment);
    try {
      await this.db.batch([
        this.db.update(appointments).set(changes).where(eq(appointments.id, id)),
        this.db.insert(appointmentAuditLog).values(toAuditRow(audit)),
      ]);
    } catch (error: unknown) {
      throw this.translateWriteError(error, appointment.physicianId);
    }
  }

  async delete(id: string, audit: AuditEntry): Promise<boolean> {
    const [deleted] = await this.db.batch([
      this.db
        .delete(appointments)
        .where(eq(appointments.id, id))
        .returning({ id: appointments.id }),
      this.db.insert(appointmentAuditLog).values(toAuditRow(audit)),
    ]);
    return deleted.length > 0;
  }

  async getAuditTrail(appointmentId: string): Promise<AuditEntry[]> {
    const rows = await this.db
      .select()
      .from(appointmentAuditLog)
      .where(eq(appointmentAuditLog.appointmentId, appointmentId))
      .orderBy(asc(appointmentAuditLog.performedAt));

    return rows.map((row) => ({
      appointmentId: row.appointmentId,
      action: parseAuditAction(row.action),
      changes: row.changes,
      performedAt: row.performedAt,
    }));
  }

  private translateWriteError(error: unknown, physicianId: string): unknown {
    if (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === EXCLUSION_VIOLATION
    ) {
      return new ScheduleWriteConflictError(physicianId);
    }
    return error;
  }
}

function toInterval(row: AppointmentRow): AppointmentInterval {
  return {
    id: row.id,
    physicianId: row.physicianId,
    patientId: row.patientId,
    start: row.startsAt,
    end: row.endsAt,
    status: parseStatus(row.status),
    reasonForVisit: row.reasonForVisit,
    notes: row.notes,
    cancellationReason: row.cancellationReason,
    clinicalDocumentId: row.clinicalDocumentId,
    roomNumber: row.roomNumber,
    createdAt: row.createdAt,
    modifiedAt: row.updatedAt,
  };
}

function toRow(appointment: AppointmentInterval): NewAppointmentRow {
  return {
    id: appointment.id,
    physicianId: appointment.physicianId,
    patientId: appointment.patientId,
    startsAt: appointment.start,
    endsAt: appointment.end,
    status: appointment.status,
    reasonForVisit: appointment.reasonForVisit,
    notes: appointment.notes,
    cancellationReason: appointment.cancellationReason,
    clinicalDocumentId: appointment.clinicalDocumentId,
    roomNumber: appointment.roomNumber,
    createdAt: appointment.createdAt,
    updatedAt: appointment.modifiedAt,
  };
}

function toAuditRow(entry: AuditEntry) {
  return {
    appointmentId: entry.appointmentId,
    action: entry.action,
    changes: entry.changes,
    performedAt: entry.performedAt,
  };
}

function parseStatus(value: string): AppointmentStatus {
  const status = APPOINTMENT_STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`Unknown appointment status "${value}"`);
  }
  return status;
}

function parseAuditAction(value: string): AuditAction {
  const action = AUDIT_ACTIONS.find((a) => a === value);
  if (!action) {
    throw new Error(`Unknown audit action "${value}"`);
  }
  return action;
}
