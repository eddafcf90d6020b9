import { z } from 'zod';
import { IsoDateTime } from './time-window.js';

export const UpdateAppointmentSchema = z.object({
  reason_for_visit: z.string().max(500).nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
  duration_minutes: z.number().int().positive().optional(),
  starts_at: IsoDateTime.optional(),
  room_number: z.number().int().min(1).max(999).nullable().optional(),
});

export type UpdateAppointmentDto = z.infer<typeof UpdateAppointmentSchema>;
