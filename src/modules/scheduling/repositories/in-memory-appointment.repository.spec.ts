import { InMemoryAppointmentRepository } from './in-memory-appointment.repository';
import { type AuditEntry, ScheduleWriteConflictError } from './appointment.repository';
import { AppointmentStatus } from '../domain/appointment-interval';
import {
  MONDAY,
  NOW,
  PATIENT_1,
  PATIENT_2,
  PHYSICIAN_A,
  PHYSICIAN_B,
  at,
  makeAppointment,
} from '../../../../test/fixtures/appointments';

describe('InMemoryAppointmentRepository', () => {
  let repository: InMemoryAppointmentRepository;

  const audit = (appointmentId: string, action: AuditEntry['action']): AuditEntry => ({
    appointmentId,
    action,
    changes: null,
    performedAt: NOW,
  });

  beforeEach(() => {
    repository = new InMemoryAppointmentRepository();
  });

  it('should store and read back an appointment', async () => {
    const appointment = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') });

    await repository.insert(appointment, audit(appointment.id, 'created'));

    await expect(repository.findById(appointment.id)).resolves.toEqual(appointment);
    expect((await repository.getPhysicianSchedule(PHYSICIAN_A)).size).toBe(1);
  });

  it('should return null and an empty schedule for unknown ids', async () => {
    await expect(repository.findById('missing')).resolves.toBeNull();
    const schedule = await repository.getPhysicianSchedule(PHYSICIAN_B);
    expect(schedule.physicianId).toBe(PHYSICIAN_B);
    expect(schedule.size).toBe(0);
  });

  it('should hand out copies that do not leak back into the store', async () => {
    const appointment = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') });
    await repository.insert(appointment, audit(appointment.id, 'created'));

    const schedule = await repository.getPhysicianSchedule(PHYSICIAN_A);
    schedule.remove(appointment.id);
    const copy = await repository.findById(appointment.id);
    copy?.start.setUTCHours(15);

    const stored = await repository.findById(appointment.id);
    expect(stored?.start).toEqual(at(MONDAY, '09:00'));
    expect((await repository.getPhysicianSchedule(PHYSICIAN_A)).size).toBe(1);
  });

  it('should refuse an overlapping active appointment', async () => {
    const first = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '10:00') });
    const second = makeAppointment({ start: at(MONDAY, '09:30'), end: at(MONDAY, '10:30') });
    await repository.insert(first, audit(first.id, 'created'));

    await expect(repository.insert(second, audit(second.id, 'created'))).rejects.toBeInstanceOf(
      ScheduleWriteConflictError,
    );
    await expect(repository.findById(second.id)).resolves.toBeNull();
    await expect(repository.getAuditTrail(second.id)).resolves.toEqual([]);
  });

  it('should allow overlaps with cancelled appointments and other physicians', async () => {
    const cancelled = makeAppointment({
      start: at(MONDAY, '09:00'),
      end: at(MONDAY, '10:00'),
      status: AppointmentStatus.Cancelled,
    });
    const active = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '10:00') });
    const otherPhysician = makeAppointment({
      physicianId: PHYSICIAN_B,
      start: at(MONDAY, '09:00'),
      end: at(MONDAY, '10:00'),
    });

    await repository.insert(cancelled, audit(cancelled.id, 'created'));
    await repository.insert(active, audit(active.id, 'created'));
    await repository.insert(otherPhysician, audit(otherPhysician.id, 'created'));

    expect(await repository.findAll()).toHaveLength(3);
  });

  it('should reject a duplicate id', async () => {
    const appointment = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') });
    await repository.insert(appointment, audit(appointment.id, 'created'));

    await expect(
      repository.insert(appointment, audit(appointment.id, 'created')),
    ).rejects.toThrow(`Appointment ${appointment.id} already exists`);
  });

  it('should update in place without clashing with itself', async () => {
    const appointment = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') });
    await repository.insert(appointment, audit(appointment.id, 'created'));

    const moved = { ...appointment, start: at(MONDAY, '09:15'), end: at(MONDAY, '09:45') };
    await repository.update(moved, audit(appointment.id, 'rescheduled'));

    await expect(repository.findById(appointment.id)).resolves.toEqual(moved);
  });

  it('should refuse updates for unknown ids or a changed physician', async () => {
    const appointment = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') });

    await expect(
      repository.update(appointment, audit(appointment.id, 'updated')),
    ).rejects.toThrow(`Appointment ${appointment.id} does not exist`);

    await repository.insert(appointment, audit(appointment.id, 'created'));
    await expect(
      repository.update(
        { ...appointment, physicianId: PHYSICIAN_B },
        audit(appointment.id, 'updated'),
      ),
    ).rejects.toThrow(`Appointment ${appointment.id} cannot change physician`);
  });

  it('should delete an appointment and keep its audit trail', async () => {
    const appointment = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') });
    await repository.insert(appointment, audit(appointment.id, 'created'));

    await expect(repository.delete(appointment.id, audit(appointment.id, 'deleted'))).resolves.toBe(
      true,
    );
    await expect(repository.delete(appointment.id, audit(appointment.id, 'deleted'))).resolves.toBe(
      false,
    );

    await expect(repository.findById(appointment.id)).resolves.toBeNull();
    expect((await repository.getAuditTrail(appointment.id)).map((e) => e.action)).toEqual([
      'created',
      'deleted',
    ]);
  });

  it('should list the appointments of a patient by start', async () => {
    const later = makeAppointment({ start: at(MONDAY, '11:00'), end: at(MONDAY, '11:30') });
    const earlier = makeAppointment({
      physicianId: PHYSICIAN_B,
      start: at(MONDAY, '08:00'),
      end: at(MONDAY, '08:30'),
    });
    const otherPatient = makeAppointment({
      patientId: PATIENT_2,
      start: at(MONDAY, '09:00'),
      end: at(MONDAY, '09:30'),
    });
    for (const a of [later, earlier, otherPatient]) {
      await repository.insert(a, audit(a.id, 'created'));
    }

    const found = await repository.findByPatient(PATIENT_1);

    expect(found.map((a) => a.id)).toEqual([earlier.id, later.id]);
  });
});
