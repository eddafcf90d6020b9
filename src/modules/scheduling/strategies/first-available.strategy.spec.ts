import { FirstAvailableBookingStrategy } from './first-available.strategy';
import { DEFAULT_SCHEDULING_POLICY } from '../../../config/scheduling.config';
import { AppointmentStatus } from '../domain/appointment-interval';
import { PhysicianSchedule } from '../domain/physician-schedule';
import {
  FRIDAY,
  MONDAY,
  NOW,
  PHYSICIAN_A,
  SATURDAY,
  at,
  makeAppointment,
} from '../../../../test/fixtures/appointments';

describe('FirstAvailableBookingStrategy', () => {
  const strategy = new FirstAvailableBookingStrategy(DEFAULT_SCHEDULING_POLICY);

  const search = (searchStart: Date, durationMinutes = 30) => ({
    durationMinutes,
    searchStart,
    now: NOW,
  });

  const times = (slots: { start: Date; end: Date }[]) =>
    slots.map((s) => [s.start.toISOString(), s.end.toISOString()]);

  it('should offer the opening of the day on an empty schedule', () => {
    const slot = strategy.findNextAvailableSlot(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(MONDAY, '08:00')),
    );

    expect(slot).toEqual({
      start: at(MONDAY, '08:00'),
      end: at(MONDAY, '08:30'),
      physicianId: PHYSICIAN_A,
      reason: 'First available',
      isOptimal: true,
    });
  });

  it('should skip past an existing booking', () => {
    const schedule = new PhysicianSchedule(PHYSICIAN_A, [
      makeAppointment({ start: at(MONDAY, '08:00'), end: at(MONDAY, '09:00') }),
    ]);

    const slot = strategy.findNextAvailableSlot(schedule, search(at(MONDAY, '08:00')));

    expect(slot?.start).toEqual(at(MONDAY, '09:00'));
    expect(slot?.end).toEqual(at(MONDAY, '09:30'));
    expect(slot?.isOptimal).toBe(true);
  });

  it('should round the search start up to the slot increment', () => {
    const slot = strategy.findNextAvailableSlot(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(MONDAY, '09:07')),
    );

    expect(slot?.start).toEqual(at(MONDAY, '09:15'));
    expect(slot?.isOptimal).toBe(false);
  });

  it('should roll over the weekend when the day has no room left', () => {
    const slot = strategy.findNextAvailableSlot(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(FRIDAY, '16:45')),
    );

    expect(slot?.start).toEqual(at(MONDAY, '08:00'));
  });

  it('should never search before now', () => {
    const slot = strategy.findNextAvailableSlot(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(FRIDAY, '09:00')),
    );

    expect(slot?.start).toEqual(at(FRIDAY, '12:00'));
    expect(slot?.end).toEqual(at(FRIDAY, '12:30'));
  });

  it('should return several non-overlapping slots in order', () => {
    const schedule = new PhysicianSchedule(PHYSICIAN_A, [
      makeAppointment({ start: at(MONDAY, '09:00'), end: at(MONDAY, '10:00') }),
    ]);

    const slots = strategy.findAvailableSlots(schedule, search(at(MONDAY, '08:00'), 60), 3);

    expect(times(slots)).toEqual([
      ['2026-02-09T08:00:00.000Z', '2026-02-09T09:00:00.000Z'],
      ['2026-02-09T10:00:00.000Z', '2026-02-09T11:00:00.000Z'],
      ['2026-02-09T11:00:00.000Z', '2026-02-09T12:00:00.000Z'],
    ]);
    expect(slots.map((s) => s.reason)).toEqual([
      'First available',
      'Next available',
      'Next available',
    ]);
    expect(slots.map((s) => s.isOptimal)).toEqual([true, true, false]);
  });

  it('should treat merged neighbouring bookings as one busy block', () => {
    const schedule = new PhysicianSchedule(PHYSICIAN_A, [
      makeAppointment({ start: at(MONDAY, '08:00'), end: at(MONDAY, '08:45') }),
      makeAppointment({ start: at(MONDAY, '08:45'), end: at(MONDAY, '09:30') }),
      makeAppointment({ start: at(MONDAY, '09:15'), end: at(MONDAY, '10:10') }),
    ]);

    const slot = strategy.findNextAvailableSlot(schedule, search(at(MONDAY, '08:00')));

    expect(slot?.start).toEqual(at(MONDAY, '10:15'));
  });

  it('should ignore cancelled and excluded appointments', () => {
    const cancelled = makeAppointment({
      start: at(MONDAY, '08:00'),
      end: at(MONDAY, '08:30'),
      status: AppointmentStatus.Cancelled,
    });
    const moving = makeAppointment({
      start: at(MONDAY, '08:30'),
      end: at(MONDAY, '09:00'),
    });
    const schedule = new PhysicianSchedule(PHYSICIAN_A, [cancelled, moving]);

    const slots = strategy.findAvailableSlots(
      schedule,
      { ...search(at(MONDAY, '08:00')), excludeId: moving.id },
      2,
    );

    expect(times(slots)).toEqual([
      ['2026-02-09T08:00:00.000Z', '2026-02-09T08:30:00.000Z'],
      ['2026-02-09T08:30:00.000Z', '2026-02-09T09:00:00.000Z'],
    ]);
  });

  it('should fit a full search-length window inside one day', () => {
    const slot = strategy.findNextAvailableSlot(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(MONDAY, '08:00'), 480),
    );

    expect(slot?.start).toEqual(at(MONDAY, '08:00'));
    expect(slot?.end).toEqual(at(MONDAY, '16:00'));
  });

  it.each([10, 20.5, 481])('should find nothing for a %p minute duration', (minutes) => {
    const slots = strategy.findAvailableSlots(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(MONDAY, '08:00'), minutes),
      3,
    );

    expect(slots).toEqual([]);
  });

  it('should find nothing when no slots are requested', () => {
    const slots = strategy.findAvailableSlots(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(MONDAY, '08:00')),
      0,
    );

    expect(slots).toEqual([]);
  });

  it('should stop at the search horizon', () => {
    const shortHorizon = new FirstAvailableBookingStrategy({
      ...DEFAULT_SCHEDULING_POLICY,
      searchHorizonDays: 1,
    });

    const slot = shortHorizon.findNextAvailableSlot(
      new PhysicianSchedule(PHYSICIAN_A),
      search(at(SATURDAY, '08:00')),
    );

    expect(slot).toBeNull();
  });
});
