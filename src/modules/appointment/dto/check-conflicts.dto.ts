import { z } from 'zod';
import { TimeWindowShape, endOrDuration } from './time-window.js';

export const CheckConflictsSchema = z
  .object({
    physician_id: z.string().uuid(),
    ...TimeWindowShape,
    exclude_appointment_id: z.string().uuid().optional(),
    include_suggestions: z.boolean().optional().default(true),
  })
  .refine(endOrDuration.check, { message: endOrDuration.message });

export type CheckConflictsDto = z.infer<typeof CheckConflictsSchema>;
