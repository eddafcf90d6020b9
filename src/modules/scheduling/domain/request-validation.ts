import { MAX_ROOM_NUMBER, MIN_ROOM_NUMBER } from './appointment-interval.js';

// Each check returns an error message, or null when the input is acceptable.

export interface BookAppointmentRequest {
  physicianId: string;
  patientId: string;
  start: Date;
  end: Date;
  reasonForVisit?: string | null;
  notes?: string | null;
  roomNumber?: number | null;
  clinicalDocumentId?: string | null;
}

export interface AppointmentChanges {
  reasonForVisit?: string | null;
  notes?: string | null;
  durationMinutes?: number;
  newStart?: Date;
  roomNumber?: number | null;
}

export function validateTimeWindow(start: Date, end: Date): string | null {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    return 'Start and end must be valid instants';
  }
  if (start.getTime() >= end.getTime()) {
    return 'Start time must be before end time';
  }
  return null;
}

export function validateRoomNumber(room: number | null | undefined): string | null {
  if (room === null || room === undefined) return null;
  if (!Number.isInteger(room) || room < MIN_ROOM_NUMBER || room > MAX_ROOM_NUMBER) {
    return `Room number must be between ${MIN_ROOM_NUMBER} and ${MAX_ROOM_NUMBER}`;
  }
  return null;
}

export function validateBookingRequest(request: BookAppointmentRequest): string | null {
  if (!request.physicianId.trim()) return 'Physician id is required';
  if (!request.patientId.trim()) return 'Patient id is required';
  return (
    validateTimeWindow(request.start, request.end) ??
    validateRoomNumber(request.roomNumber)
  );
}

export function validateChanges(changes: AppointmentChanges): string | null {
  const { durationMinutes, newStart } = changes;
  if (
    durationMinutes !== undefined &&
    (!Number.isInteger(durationMinutes) || durationMinutes <= 0)
  ) {
    return 'Duration must be a positive whole number of minutes';
  }
  if (newStart !== undefined && Number.isNaN(newStart.getTime())) {
    return 'New start must be a valid instant';
  }
  return validateRoomNumber(changes.roomNumber);
}
