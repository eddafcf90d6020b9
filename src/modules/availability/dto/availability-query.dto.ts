import { z } from 'zod';
import type { AvailabilityQuery } from '../availability.service.js';

export const AvailabilityQuerySchema = z
  .object({
    start: z.string().datetime({ offset: true }).optional(),
    end: z.string().datetime({ offset: true }).optional(),
    date: z.string().date().optional(),
    duration_minutes: z.coerce.number().int().positive().optional(),
    specialization: z.string().min(1).max(100).optional(),
  })
  .transform((query, ctx): AvailabilityQuery => {
    const { specialization } = query;
    if (query.start && query.end) {
      return {
        start: new Date(query.start),
        end: new Date(query.end),
        specialization,
      };
    }
    if (query.date && query.duration_minutes) {
      return {
        date: new Date(`${query.date}T00:00:00.000Z`),
        durationMinutes: query.duration_minutes,
        specialization,
      };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Provide either start and end, or date and duration_minutes',
    });
    return z.NEVER;
  });
