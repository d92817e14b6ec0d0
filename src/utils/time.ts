export const isoNow = (): string => new Date().toISOString();

/** Source of engine time, in whole unix seconds. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * Clock that only moves when told to. Used by tests and by hosts that
 * replay calls against recorded timestamps.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
