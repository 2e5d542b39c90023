/**
 * Source of operation timestamps (unix seconds)
 */
export interface Clock {
  nowSeconds(): number;
}

export const systemClock: Clock = {
  nowSeconds: () => Math.floor(Date.now() / 1000),
};

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(startSeconds: number) {
    this.current = startSeconds;
  }

  nowSeconds(): number {
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }

  advanceDays(days: number): number {
    return this.advance(days * 86_400);
  }
}
