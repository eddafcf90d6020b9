import { z } from 'zod';
import { IsoDateTime } from './time-window.js';

export type ScheduleQuery =
  | { kind: 'day'; date: Date }
  | { kind: 'range'; from: Date; to: Date };

export const ScheduleQuerySchema = z
  .object({
    date: z.string().date().optional(),
    from: IsoDateTime.optional(),
    to: IsoDateTime.optional(),
  })
  .transform((query, ctx): ScheduleQuery => {
    if (query.date !== undefined) {
      return { kind: 'day', date: new Date(`${query.date}T00:00:00.000Z`) };
    }
    if (query.from !== undefined && query.to !== undefined) {
      return { kind: 'range', from: new Date(query.from), to: new Date(query.to) };
    }
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Provide date, or from and to',
    });
    return z.NEVER;
  });

export const SlotQuerySchema = z.object({
  duration_minutes: z.coerce.number().int().positive(),
  from: IsoDateTime.optional(),
  limit: z.coerce.number().int().min(1).max(20).default(3),
});

export const StatisticsQuerySchema = z
  .object({ from: IsoDateTime, to: IsoDateTime })
  .refine((q) => new Date(q.from).getTime() < new Date(q.to).getTime(), {
    message: 'from must be before to',
  });
