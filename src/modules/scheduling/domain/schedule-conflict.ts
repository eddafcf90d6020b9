import type {
  AppointmentInterval,
  ProposedInterval,
} from './appointment-interval.js';

export const ConflictType = {
  DoubleBooking: 'double_booking',
  BusinessHoursViolation: 'business_hours_violation',
  DurationViolation: 'duration_violation',
  PastTime: 'past_time',
} as const;

export type ConflictType = (typeof ConflictType)[keyof typeof ConflictType];

export interface ScheduleConflict {
  type: ConflictType;
  /** Set for double bookings only. */
  conflictingInterval: AppointmentInterval | null;
  description: string;
}

/** A free window. Not a reservation: booking it can still lose a race. */
export interface AppointmentSlot {
  start: Date;
  end: Date;
  physicianId: string;
  reason: string | null;
  isOptimal: boolean;
}

export interface ConflictResult {
  proposed: ProposedInterval;
  hasConflicts: boolean;
  conflicts: ScheduleConflict[];
  validationErrors: string[];
  alternativeSuggestions: AppointmentSlot[];
}

export type ScheduleFailure =
  | 'validation'
  | 'not_found'
  | 'conflict'
  | 'invariant_violation'
  | 'internal';

export interface ScheduleOperationResult {
  success: boolean;
  message: string;
  failure: ScheduleFailure | null;
  conflicts: ScheduleConflict[];
  alternativeSuggestions: AppointmentSlot[];
  appointment: AppointmentInterval | null;
}

export function succeeded(
  appointment: AppointmentInterval,
  message: string,
): ScheduleOperationResult {
  return {
    success: true,
    message,
    failure: null,
    conflicts: [],
    alternativeSuggestions: [],
    appointment,
  };
}

export function failed(
  failure: ScheduleFailure,
  message: string,
  details: Partial<
    Pick<
      ScheduleOperationResult,
      'conflicts' | 'alternativeSuggestions' | 'appointment'
    >
  > = {},
): ScheduleOperationResult {
  return {
    success: false,
    message,
    failure,
    conflicts: details.conflicts ?? [],
    alternativeSuggestions: details.alternativeSuggestions ?? [],
    appointment: details.appointment ?? null,
  };
}
