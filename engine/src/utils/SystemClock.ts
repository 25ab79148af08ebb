/**
 * Time source for the resolver, circuit breakers and generators
 */
export interface SystemClock {
  /** Milliseconds since the epoch */
  now(): number;
}

export const systemClock: SystemClock = {
  now: () => Date.now(),
};

/**
 * Manually advanced clock for tests and simulations
 */
export class ManualClock implements SystemClock {
  constructor(private current: number = 0) {}

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
