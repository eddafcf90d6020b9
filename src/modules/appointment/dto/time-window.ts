import { addMinutes } from 'date-fns';
import { z } from 'zod';

export const IsoDateTime = z.string().datetime({ offset: true });

/** `starts_at` plus either `ends_at` or `duration_minutes`. */
export const TimeWindowShape = {
  starts_at: IsoDateTime,
  ends_at: IsoDateTime.optional(),
  duration_minutes: z.number().int().positive().optional(),
};

export const endOrDuration = {
  check: (value: { ends_at?: string; duration_minutes?: number }) =>
    (value.ends_at === undefined) !== (value.duration_minutes === undefined),
  message: 'Provide exactly one of ends_at or duration_minutes',
};

export function toTimeWindow(value: {
  starts_at: string;
  ends_at?: string;
  duration_minutes?: number;
}): { start: Date; end: Date } {
  const start = new Date(value.starts_at);
  const end =
    value.ends_at !== undefined
      ? new Date(value.ends_at)
      : addMinutes(start, value.duration_minutes ?? 0);
  return { start, end };
}
