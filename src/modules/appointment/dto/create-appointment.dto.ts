import { z } from 'zod';
import { TimeWindowShape, endOrDuration } from './time-window.js';

export const CreateAppointmentSchema = z
  .object({
    physician_id: z.string().uuid(),
    patient_id: z.string().uuid(),
    ...TimeWindowShape,
    reason_for_visit: z.string().max(500).optional(),
    notes: z.string().max(1000).optional(),
    room_number: z.number().int().min(1).max(999).nullable().optional(),
    clinical_document_id: z.string().uuid().nullable().optional(),
  })
  .refine(endOrDuration.check, { message: endOrDuration.message });

export type CreateAppointmentDto = z.infer<typeof CreateAppointmentSchema>;
