import {
  pgTable,
  uuid,
  varchar,
  text,
  integer,
  timestamp,
  index,
  jsonb,
  bigserial,
} from 'drizzle-orm/pg-core';

export const appointments = pgTable(
  'appointments',
  {
    id: uuid().primaryKey(),
    physicianId: uuid('physician_id').notNull(),
    patientId: uuid('patient_id').notNull(),
    startsAt: timestamp('starts_at', { withTimezone: true }).notNull(),
    endsAt: timestamp('ends_at', { withTimezone: true }).notNull(),
    status: varchar({ length: 20 }).notNull().default('scheduled'),
    reasonForVisit: text('reason_for_visit'),
    notes: text(),
    cancellationReason: text('cancellation_reason'),
    clinicalDocumentId: uuid('clinical_document_id'),
    roomNumber: integer('room_number'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_appt_physician_time').on(table.physicianId, table.startsAt),
    index('idx_appt_patient').on(table.patientId),
  ],
);

export const appointmentAuditLog = pgTable(
  'appointment_audit_log',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    appointmentId: uuid('appointment_id').notNull(),
    action: varchar({ length: 20 }).notNull(),
    changes: jsonb().$type<Record<string, unknown>>(),
    performedAt: timestamp('performed_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_audit_appointment').on(table.appointmentId, table.performedAt),
  ],
);

export type AppointmentRow = typeof appointments.$inferSelect;
export type NewAppointmentRow = typeof appointments.$inferInsert;
