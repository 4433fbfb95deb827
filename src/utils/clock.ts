/**
 * Wall-clock source for lease timestamps
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that only moves when told to; used to drive lease expiry in tests and scripts
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date = new Date('2024-01-01T00:00:00.000Z')) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(date: Date): void {
    this.current = date.getTime();
  }
}
