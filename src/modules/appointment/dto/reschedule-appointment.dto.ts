import { z } from 'zod';
import { TimeWindowShape, endOrDuration } from './time-window.js';

export const RescheduleAppointmentSchema = z
  .object(TimeWindowShape)
  .refine(endOrDuration.check, { message: endOrDuration.message });

export type RescheduleAppointmentDto = z.infer<
  typeof RescheduleAppointmentSchema
>;
