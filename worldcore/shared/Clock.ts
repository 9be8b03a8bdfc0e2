// worldcore/shared/Clock.ts

/**
 * Millisecond time source. Services take one so tests can drive TTLs and
 * rate windows by hand instead of sleeping.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** TEST helper: a clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
