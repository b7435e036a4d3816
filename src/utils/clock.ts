export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock pinned to one instant, for tests and replays.
 */
export const fixedClock = (instant: Date): Clock => ({
  now: () => new Date(instant.getTime()),
});
