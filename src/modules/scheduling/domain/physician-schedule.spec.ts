import { PhysicianSchedule } from './physician-schedule';
import { AppointmentStatus } from './appointment-interval';
import {
  MONDAY,
  PHYSICIAN_A,
  TUESDAY,
  at,
  makeAppointment,
} from '../../../../test/fixtures/appointments';

describe('PhysicianSchedule', () => {
  const morning = makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') });
  const early = makeAppointment({ start: at(MONDAY, '08:00'), end: at(MONDAY, '08:30') });
  const cancelled = makeAppointment({
    start: at(MONDAY, '10:00'),
    end: at(MONDAY, '10:30'),
    status: AppointmentStatus.Cancelled,
  });
  const tuesday = makeAppointment({ start: at(TUESDAY, '08:00'), end: at(TUESDAY, '09:00') });

  const build = () => new PhysicianSchedule(PHYSICIAN_A, [morning, early, cancelled, tuesday]);

  it('should order appointments by start', () => {
    expect(build().all().map((a) => a.id)).toEqual([
      early.id,
      morning.id,
      cancelled.id,
      tuesday.id,
    ]);
  });

  it('should leave cancelled appointments out of the active set', () => {
    expect(build().active().map((a) => a.id)).toEqual([early.id, morning.id, tuesday.id]);
    expect(build().active(early.id).map((a) => a.id)).toEqual([morning.id, tuesday.id]);
  });

  it('should list one day including cancelled appointments', () => {
    expect(build().forDate(at(MONDAY, '00:00')).map((a) => a.id)).toEqual([
      early.id,
      morning.id,
      cancelled.id,
    ]);
  });

  it('should only return appointments contained in a range', () => {
    const schedule = build();

    expect(schedule.inRange(at(MONDAY, '08:00'), at(MONDAY, '09:30')).map((a) => a.id)).toEqual([
      early.id,
      morning.id,
    ]);
    expect(schedule.inRange(at(MONDAY, '08:15'), at(MONDAY, '09:30')).map((a) => a.id)).toEqual([
      morning.id,
    ]);
  });

  it('should find active overlaps with half-open bounds', () => {
    const schedule = build();

    expect(schedule.findOverlapping(at(MONDAY, '08:30'), at(MONDAY, '09:00'))).toEqual([]);
    expect(schedule.findOverlapping(at(MONDAY, '08:15'), at(MONDAY, '09:15')).map((a) => a.id)).toEqual([
      early.id,
      morning.id,
    ]);
    expect(schedule.findOverlapping(at(MONDAY, '10:00'), at(MONDAY, '10:30'))).toEqual([]);
  });

  it('should merge touching and overlapping busy time', () => {
    const schedule = new PhysicianSchedule(PHYSICIAN_A, [
      makeAppointment({ start: at(MONDAY, '08:00'), end: at(MONDAY, '09:00') }),
      makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '09:30') }),
      makeAppointment({ start: at(MONDAY, '09:15'), end: at(MONDAY, '09:20') }),
      makeAppointment({ start: at(MONDAY, '11:00'), end: at(MONDAY, '11:30') }),
    ]);

    expect(schedule.busyIntervals()).toEqual([
      { start: at(MONDAY, '08:00'), end: at(MONDAY, '09:30') },
      { start: at(MONDAY, '11:00'), end: at(MONDAY, '11:30') },
    ]);
  });

  it('should keep mutations of a snapshot away from the original', () => {
    const schedule = build();
    const copy = schedule.snapshot();

    copy.remove(early.id);
    copy.put(makeAppointment({ start: at(MONDAY, '12:00'), end: at(MONDAY, '12:30') }));

    expect(schedule.size).toBe(4);
    expect(schedule.has(early.id)).toBe(true);
    expect(copy.size).toBe(4);
    expect(copy.has(early.id)).toBe(false);
  });

  it('should refresh its ordering after put and remove', () => {
    const schedule = build();
    const first = makeAppointment({ start: at(MONDAY, '07:00'), end: at(MONDAY, '07:30') });

    schedule.all();
    schedule.put(first);
    expect(schedule.all()[0].id).toBe(first.id);

    expect(schedule.remove(first.id)).toBe(true);
    expect(schedule.remove(first.id)).toBe(false);
    expect(schedule.all()[0].id).toBe(early.id);
  });
});
