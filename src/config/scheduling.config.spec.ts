import { DEFAULT_SCHEDULING_POLICY, parseSchedulingPolicy } from './scheduling.config';

describe('parseSchedulingPolicy', () => {
  it('should fall back to the clinic defaults', () => {
    expect(parseSchedulingPolicy({})).toEqual(DEFAULT_SCHEDULING_POLICY);
  });

  it('should read overrides from the environment', () => {
    const policy = parseSchedulingPolicy({
      SCHEDULING_BUSINESS_DAY_START: '09:30',
      SCHEDULING_BUSINESS_DAY_END: '18:00',
      SCHEDULING_BOOKING_MAX_MINUTES: '120',
      SCHEDULING_MAX_ALTERNATIVES: '0',
    });

    expect(policy.businessDayStartMinutes).toBe(570);
    expect(policy.businessDayEndMinutes).toBe(1080);
    expect(policy.booking).toEqual({ minMinutes: 15, maxMinutes: 120 });
    expect(policy.maxAlternativeSuggestions).toBe(0);
  });

  it('should reject malformed times of day', () => {
    expect(() => parseSchedulingPolicy({ SCHEDULING_BUSINESS_DAY_START: '8am' })).toThrow(
      'Expected HH:mm',
    );
  });

  it('should reject a business day that ends before it starts', () => {
    expect(() =>
      parseSchedulingPolicy({
        SCHEDULING_BUSINESS_DAY_START: '17:00',
        SCHEDULING_BUSINESS_DAY_END: '08:00',
      }),
    ).toThrow('Business day must start before it ends');
  });

  it('should reject minimums above maximums', () => {
    expect(() =>
      parseSchedulingPolicy({
        SCHEDULING_SEARCH_MIN_MINUTES: '60',
        SCHEDULING_SEARCH_MAX_MINUTES: '30',
      }),
    ).toThrow('Duration minimums must not exceed maximums');
  });
});
