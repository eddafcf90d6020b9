import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { AvailabilityService, type AvailabilityQuery } from './availability.service';
import { Clock } from '../../common/clock';
import { FixedClock } from '../../../test/utils/fixed-clock';
import {
  DEFAULT_SCHEDULING_POLICY,
  SCHEDULING_POLICY,
} from '../../config/scheduling.config';
import {
  InMemoryPhysicianDirectory,
  PhysicianDirectory,
} from '../physician/physician-directory';
import type { AppointmentSlot } from '../scheduling/domain/schedule-conflict';
import { SchedulerService } from '../scheduling/scheduler.service';
import { MONDAY, NOW, at } from '../../../test/fixtures/appointments';

describe('AvailabilityService', () => {
  let service: AvailabilityService;
  let scheduler: { findNextAvailableSlot: jest.Mock };

  const ADA = '6f1c2a40-0b1e-4c8e-9a51-3d2f7e8b1a01';
  const BEN = '6f1c2a40-0b1e-4c8e-9a51-3d2f7e8b1a02';
  const CLEO = '6f1c2a40-0b1e-4c8e-9a51-3d2f7e8b1a03';

  const directory = new InMemoryPhysicianDirectory([
    { id: CLEO, name: 'Dr. Cleo Marsh', specializations: ['Cardiology'] },
    { id: ADA, name: 'Dr. Ada Byrne', specializations: ['Cardiology', 'Internal Medicine'] },
    { id: BEN, name: 'Dr. Ben Okafor', specializations: ['Dermatology'] },
  ]);

  const slot = (physicianId: string, from: string, to: string): AppointmentSlot => ({
    physicianId,
    start: at(MONDAY, from),
    end: at(MONDAY, to),
    reason: 'First available',
    isOptimal: false,
  });

  const slotsBy = (slots: Record<string, AppointmentSlot | null>) =>
    scheduler.findNextAvailableSlot.mockImplementation(async (physicianId: string) =>
      slots[physicianId] ?? null,
    );

  beforeEach(async () => {
    scheduler = { findNextAvailableSlot: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AvailabilityService,
        { provide: SchedulerService, useValue: scheduler },
        { provide: PhysicianDirectory, useValue: directory },
        { provide: Clock, useValue: new FixedClock(NOW) },
        { provide: SCHEDULING_POLICY, useValue: DEFAULT_SCHEDULING_POLICY },
      ],
    }).compile();

    service = module.get<AvailabilityService>(AvailabilityService);
  });

  describe('time window queries', () => {
    it('should drop physicians whose next opening runs past the window', async () => {
      slotsBy({
        [CLEO]: slot(CLEO, '09:00', '09:30'),
        [ADA]: slot(ADA, '09:15', '09:45'),
      });

      const result = await service.findAvailablePhysicians({
        start: at(MONDAY, '09:00'),
        end: at(MONDAY, '09:30'),
        specialization: 'cardiology',
      });

      expect(result.map((r) => [r.physician.name, r.matchesTimeSlot])).toEqual([
        ['Dr. Cleo Marsh', true],
      ]);
      expect(scheduler.findNextAvailableSlot).toHaveBeenCalledWith(CLEO, 30, at(MONDAY, '09:00'));
      expect(scheduler.findNextAvailableSlot).toHaveBeenCalledWith(ADA, 30, at(MONDAY, '09:00'));
      expect(scheduler.findNextAvailableSlot).not.toHaveBeenCalledWith(
        BEN,
        expect.anything(),
        expect.anything(),
      );
    });

    it('should drop physicians with nothing before the window closes', async () => {
      slotsBy({
        [ADA]: slot(ADA, '09:30', '10:00'),
        [BEN]: null,
        [CLEO]: slot(CLEO, '09:00', '09:30'),
      });

      const result = await service.findAvailablePhysicians({
        start: at(MONDAY, '09:00'),
        end: at(MONDAY, '09:30'),
      });

      expect(result.map((r) => r.physician.id)).toEqual([CLEO]);
    });
  });

  describe('whole day queries', () => {
    it('should search business hours with the requested duration', async () => {
      slotsBy({ [BEN]: slot(BEN, '13:00', '13:45') });

      const result = await service.findAvailablePhysicians({
        date: at(MONDAY, '00:00'),
        durationMinutes: 45,
        specialization: 'Dermatology',
      });

      expect(scheduler.findNextAvailableSlot).toHaveBeenCalledWith(BEN, 45, at(MONDAY, '08:00'));
      expect(result).toHaveLength(1);
      expect(result[0].matchesTimeSlot).toBe(true);
      expect(result[0].nextAvailableSlot.start).toEqual(at(MONDAY, '13:00'));
    });

    it('should keep a slot ending at closing time and drop one running past it', async () => {
      slotsBy({
        [ADA]: slot(ADA, '16:15', '17:00'),
        [CLEO]: slot(CLEO, '16:30', '17:15'),
      });

      const result = await service.findAvailablePhysicians({
        date: at(MONDAY, '00:00'),
        durationMinutes: 45,
        specialization: 'Cardiology',
      });

      expect(result.map((r) => r.physician.id)).toEqual([ADA]);
    });

    it('should order by start time, then by name', async () => {
      slotsBy({
        [CLEO]: slot(CLEO, '09:15', '09:45'),
        [ADA]: slot(ADA, '09:15', '09:45'),
        [BEN]: slot(BEN, '09:10', '09:40'),
      });

      const result = await service.findAvailablePhysicians({
        date: at(MONDAY, '00:00'),
        durationMinutes: 30,
      });

      expect(result.map((r) => r.physician.name)).toEqual([
        'Dr. Ben Okafor',
        'Dr. Ada Byrne',
        'Dr. Cleo Marsh',
      ]);
    });
  });

  describe('invalid windows', () => {
    const invalid: [string, AvailabilityQuery][] = [
      ['an inverted window', { start: at(MONDAY, '10:00'), end: at(MONDAY, '09:00') }],
      ['a window shorter than the minimum', { start: at(MONDAY, '10:00'), end: at(MONDAY, '10:10') }],
      ['a window in the past', { start: at('2026-02-06', '09:00'), end: at('2026-02-06', '10:00') }],
      ['a duration over the search maximum', { date: at(MONDAY, '00:00'), durationMinutes: 481 }],
    ];

    it.each(invalid)('should reject %s', async (_label, query) => {
      await expect(service.findAvailablePhysicians(query)).rejects.toBeInstanceOf(
        BadRequestException,
      );
      expect(scheduler.findNextAvailableSlot).not.toHaveBeenCalled();
    });
  });
});
