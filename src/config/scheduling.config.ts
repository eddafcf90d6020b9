import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const SCHEDULING_POLICY = 'SCHEDULING_POLICY';

export interface DurationBounds {
  minMinutes: number;
  maxMinutes: number;
}

/**
 * Which duration bounds a check runs under: direct bookings are held to
 * the tighter `booking` range, availability searches to `search`.
 */
export type DurationPolicy = 'booking' | 'search';

export interface SchedulingPolicy {
  /** Minutes after UTC midnight. */
  businessDayStartMinutes: number;
  businessDayEndMinutes: number;
  /** `Date#getUTCDay()` values; 0 is Sunday. */
  businessDays: readonly number[];
  booking: DurationBounds;
  search: DurationBounds;
  slotIncrementMinutes: number;
  searchHorizonDays: number;
  maxAlternativeSuggestions: number;
}

const TimeOfDay = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm')
  .transform((value) => {
    const [hours, minutes] = value.split(':').map(Number);
    return hours * 60 + minutes;
  });

const Minutes = z.coerce.number().int().positive();

export const SchedulingEnvSchema = z
  .object({
    SCHEDULING_BUSINESS_DAY_START: TimeOfDay.default('08:00'),
    SCHEDULING_BUSINESS_DAY_END: TimeOfDay.default('17:00'),
    SCHEDULING_BOOKING_MIN_MINUTES: Minutes.default(15),
    SCHEDULING_BOOKING_MAX_MINUTES: Minutes.default(180),
    SCHEDULING_SEARCH_MIN_MINUTES: Minutes.default(15),
    SCHEDULING_SEARCH_MAX_MINUTES: Minutes.default(480),
    SCHEDULING_SLOT_INCREMENT_MINUTES: Minutes.default(15),
    SCHEDULING_SEARCH_HORIZON_DAYS: Minutes.default(30),
    SCHEDULING_MAX_ALTERNATIVES: z.coerce.number().int().min(0).default(3),
  })
  .refine(
    (env) => env.SCHEDULING_BUSINESS_DAY_START < env.SCHEDULING_BUSINESS_DAY_END,
    { message: 'Business day must start before it ends' },
  )
  .refine(
    (env) =>
      env.SCHEDULING_BOOKING_MIN_MINUTES <= env.SCHEDULING_BOOKING_MAX_MINUTES &&
      env.SCHEDULING_SEARCH_MIN_MINUTES <= env.SCHEDULING_SEARCH_MAX_MINUTES,
    { message: 'Duration minimums must not exceed maximums' },
  );

export const DEFAULT_SCHEDULING_POLICY: SchedulingPolicy = {
  businessDayStartMinutes: 8 * 60,
  businessDayEndMinutes: 17 * 60,
  businessDays: [1, 2, 3, 4, 5],
  booking: { minMinutes: 15, maxMinutes: 180 },
  search: { minMinutes: 15, maxMinutes: 480 },
  slotIncrementMinutes: 15,
  searchHorizonDays: 30,
  maxAlternativeSuggestions: 3,
};

export function parseSchedulingPolicy(
  env: Record<string, string | undefined>,
): SchedulingPolicy {
  const parsed = SchedulingEnvSchema.parse(env);
  return {
    businessDayStartMinutes: parsed.SCHEDULING_BUSINESS_DAY_START,
    businessDayEndMinutes: parsed.SCHEDULING_BUSINESS_DAY_END,
    businessDays: DEFAULT_SCHEDULING_POLICY.businessDays,
    booking: {
      minMinutes: parsed.SCHEDULING_BOOKING_MIN_MINUTES,
      maxMinutes: parsed.SCHEDULING_BOOKING_MAX_MINUTES,
    },
    search: {
      minMinutes: parsed.SCHEDULING_SEARCH_MIN_MINUTES,
      maxMinutes: parsed.SCHEDULING_SEARCH_MAX_MINUTES,
    },
    slotIncrementMinutes: parsed.SCHEDULING_SLOT_INCREMENT_MINUTES,
    searchHorizonDays: parsed.SCHEDULING_SEARCH_HORIZON_DAYS,
    maxAlternativeSuggestions: parsed.SCHEDULING_MAX_ALTERNATIVES,
  };
}

export default registerAs('scheduling', () => parseSchedulingPolicy(process.env));
