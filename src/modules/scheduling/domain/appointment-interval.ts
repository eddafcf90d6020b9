import { minutesBetween } from '../../../common/utils/clinic-time.js';

export const AppointmentStatus = {
  Scheduled: 'scheduled',
  Completed: 'completed',
  Cancelled: 'cancelled',
  NoShow: 'no_show',
} as const;

export type AppointmentStatus =
  (typeof AppointmentStatus)[keyof typeof AppointmentStatus];

export const APPOINTMENT_STATUSES: readonly AppointmentStatus[] =
  Object.values(AppointmentStatus);

export interface AppointmentInterval {
  readonly id: string;
  readonly physicianId: string;
  readonly patientId: string;
  readonly start: Date;
  readonly end: Date;
  readonly status: AppointmentStatus;
  readonly reasonForVisit: string | null;
  readonly notes: string | null;
  readonly cancellationReason: string | null;
  readonly clinicalDocumentId: string | null;
  readonly roomNumber: number | null;
  readonly createdAt: Date;
  readonly modifiedAt: Date;
}

/** The fields a conflict check needs; `id` is absent for a new booking. */
export interface ProposedInterval {
  id?: string;
  physicianId: string;
  start: Date;
  end: Date;
}

export const MIN_ROOM_NUMBER = 1;
export const MAX_ROOM_NUMBER = 999;

/** Cancelled appointments keep their record but stop occupying time. */
export function isActive(appointment: Pick<AppointmentInterval, 'status'>) {
  return appointment.status !== AppointmentStatus.Cancelled;
}

export function isMutable(appointment: Pick<AppointmentInterval, 'status'>) {
  return appointment.status === AppointmentStatus.Scheduled;
}

export function durationMinutes(
  interval: Pick<AppointmentInterval, 'start' | 'end'>,
): number {
  return minutesBetween(interval.start, interval.end);
}

export function appointmentType(
  interval: Pick<AppointmentInterval, 'start' | 'end'>,
): string {
  const minutes = durationMinutes(interval);
  if (minutes <= 15) return 'Quick Checkup';
  if (minutes <= 30) return 'Standard Visit';
  if (minutes <= 45) return 'Extended Consultation';
  if (minutes <= 60) return 'Comprehensive Exam';
  return 'Extended Procedure';
}

export function cloneAppointment(
  appointment: AppointmentInterval,
): AppointmentInterval {
  return {
    ...appointment,
    start: new Date(appointment.start.getTime()),
    end: new Date(appointment.end.getTime()),
    createdAt: new Date(appointment.createdAt.getTime()),
    modifiedAt: new Date(appointment.modifiedAt.getTime()),
  };
}
