import { Injectable } from '@nestjs/common';
import {
  type AppointmentInterval,
  cloneAppointment,
  isActive,
} from '../domain/appointment-interval.js';
import { PhysicianSchedule } from '../domain/physician-schedule.js';
import {
  AppointmentRepository,
  type AuditEntry,
  ScheduleWriteConflictError,
} from './appointment.repository.js';

const byStart = (a: AppointmentInterval, b: AppointmentInterval) =>
  a.start.getTime() - b.start.getTime();

/**
 * Process-local store. Every write is a single synchronous step after its
 * checks, so a reader never sees half of one.
 */
@Injectable()
export class InMemoryAppointmentRepository extends AppointmentRepository {
  private readonly schedules = new Map<string, PhysicianSchedule>();
  private readonly physicianByAppointment = new Map<string, string>();
  private readonly auditLog = new Map<string, AuditEntry[]>();

  async getPhysicianSchedule(physicianId: string): Promise<PhysicianSchedule> {
    return (
      this.schedules.get(physicianId)?.snapshot() ??
      new PhysicianSchedule(physicianId)
    );
  }

  async findById(id: string): Promise<AppointmentInterval | null> {
    const found = this.locate(id);
    return found ? cloneAppointment(found) : null;
  }

  async findByPatient(patientId: string): Promise<AppointmentInterval[]> {
    return this.everything()
      .filter((a) => a.patientId === patientId)
      .sort(byStart)
      .map(cloneAppointment);
  }

  async findAll(): Promise<AppointmentInterval[]> {
    return this.everything().sort(byStart).map(cloneAppointment);
  }

  async insert(appointment: AppointmentInterval, audit: AuditEntry): Promise<void> {
    if (this.physicianByAppointment.has(appointment.id)) {
      throw new Error(`Appointment ${appointment.id} already exists`);
    }
    const schedule = this.scheduleFor(appointment.physicianId);
    this.assertNoOverlap(schedule, appointment);

    schedule.put(cloneAppointment(appointment));
    this.physicianByAppointment.set(appointment.id, appointment.physicianId);
    this.record(audit);
  }

  async update(appointment: AppointmentInterval, audit: AuditEntry): Promise<void> {
    const owner = this.physicianByAppointment.get(appointment.id);
    if (owner === undefined) {
      throw new Error(`Appointment ${appointment.id} does not exist`);
    }
    if (owner !== appointment.physicianId) {
      throw new Error(`Appointment ${appointment.id} cannot change physician`);
    }
    const schedule = this.scheduleFor(owner);
    this.assertNoOverlap(schedule, appointment);

    schedule.put(cloneAppointment(appointment));
    this.record(audit);
  }

  async delete(id: string, audit: AuditEntry): Promise<boolean> {
    const owner = this.physicianByAppointment.get(id);
    if (owner === undefined) return false;

    this.scheduleFor(owner).remove(id);
    this.physicianByAppointment.delete(id);
    this.record(audit);
    return true;
  }

  async getAuditTrail(appointmentId: string): Promise<AuditEntry[]> {
    return (this.auditLog.get(appointmentId) ?? []).map((entry) => ({
      ...entry,
    }));
  }

  private locate(id: string): AppointmentInterval | null {
    const owner = this.physicianByAppointment.get(id);
    if (owner === undefined) return null;
    return this.schedules.get(owner)?.get(id) ?? null;
  }

  private everything(): AppointmentInterval[] {
    return [...this.schedules.values()].flatMap((s) => s.all());
  }

  private scheduleFor(physicianId: string): PhysicianSchedule {
    let schedule = this.schedules.get(physicianId);
    if (!schedule) {
      schedule = new PhysicianSchedule(physicianId);
      this.schedules.set(physicianId, schedule);
    }
    return schedule;
  }

  private assertNoOverlap(
    schedule: PhysicianSchedule,
    appointment: AppointmentInterval,
  ): void {
    if (!isActive(appointment)) return;
    const clash = schedule.findOverlapping(
      appointment.start,
      appointment.end,
      appointment.id,
    );
    if (clash.length > 0) {
      throw new ScheduleWriteConflictError(appointment.physicianId);
    }
  }

  private record(entry: AuditEntry): void {
    const trail = this.auditLog.get(entry.appointmentId) ?? [];
    trail.push({ ...entry });
    this.auditLog.set(entry.appointmentId, trail);
  }
}
