/**
 * Injected time source. Services never call `new Date()` directly so that
 * timestamps and week indexes are reproducible in tests.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export const MS_PER_WEEK = 7 * 24 * 60 * 60 * 1000;
