import type { ClockPort } from '@/ports/ClockPort';

/** Wall-clock milliseconds; media timestamps are compared against it. */
export const systemClock: ClockPort = {
  now: () => Date.now(),
};
