import { appointmentType, durationMinutes, type AppointmentInterval } from './domain/appointment-interval.js';
import type {
  AppointmentSlot,
  ConflictResult,
  ScheduleConflict,
} from './domain/schedule-conflict.js';
import type { AuditEntry } from './repositories/appointment.repository.js';
import type { ScheduleStatistics } from './scheduler.service.js';

// JSON shapes returned by the HTTP layer.

export function presentAppointment(appointment: AppointmentInterval) {
  return {
    id: appointment.id,
    physician_id: appointment.physicianId,
    patient_id: appointment.patientId,
    starts_at: appointment.start.toISOString(),
    ends_at: appointment.end.toISOString(),
    duration_minutes: durationMinutes(appointment),
    appointment_type: appointmentType(appointment),
    status: appointment.status,
    reason_for_visit: appointment.reasonForVisit,
    notes: appointment.notes,
    cancellation_reason: appointment.cancellationReason,
    clinical_document_id: appointment.clinicalDocumentId,
    room_number: appointment.roomNumber,
    created_at: appointment.createdAt.toISOString(),
    modified_at: appointment.modifiedAt.toISOString(),
  };
}

export function presentSlot(slot: AppointmentSlot) {
  return {
    physician_id: slot.physicianId,
    start: slot.start.toISOString(),
    end: slot.end.toISOString(),
    reason: slot.reason,
    is_optimal: slot.isOptimal,
  };
}

export function presentConflict(conflict: ScheduleConflict) {
  return {
    type: conflict.type,
    description: conflict.description,
    conflicting_appointment_id: conflict.conflictingInterval?.id ?? null,
    conflicting_range: conflict.conflictingInterval
      ? {
          start: conflict.conflictingInterval.start.toISOString(),
          end: conflict.conflictingInterval.end.toISOString(),
        }
      : null,
  };
}

export function presentConflictResult(result: ConflictResult) {
  return {
    has_conflicts: result.hasConflicts,
    conflicts: result.conflicts.map(presentConflict),
    validation_errors: result.validationErrors,
    alternatives: result.alternativeSuggestions.map(presentSlot),
  };
}

export function presentAuditEntry(entry: AuditEntry) {
  return {
    appointment_id: entry.appointmentId,
    action: entry.action,
    changes: entry.changes,
    performed_at: entry.performedAt.toISOString(),
  };
}

export function presentStatistics(stats: ScheduleStatistics) {
  return {
    physician_id: stats.physicianId,
    from: stats.start.toISOString(),
    to: stats.end.toISOString(),
    total_appointments: stats.totalAppointments,
    scheduled: stats.scheduled,
    completed: stats.completed,
    cancelled: stats.cancelled,
    no_show: stats.noShow,
    booked_minutes: stats.bookedMinutes,
    average_duration_minutes: stats.averageDurationMinutes,
    completion_rate: stats.completionRate,
    cancellation_rate: stats.cancellationRate,
    no_show_rate: stats.noShowRate,
    utilization_rate: stats.utilizationRate,
  };
}
