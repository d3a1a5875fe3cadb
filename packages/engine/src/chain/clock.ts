export interface Clock {
  /** Current block timestamp in seconds. */
  now(): bigint;
}

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

export class ManualClock implements Clock {
  private current: bigint;

  constructor(start: bigint = 1_700_000_000n) {
    this.current = start;
  }

  now(): bigint {
    return this.current;
  }

  advance(seconds: bigint | number): bigint {
    const delta = BigInt(seconds);
    if (delta < 0n) {
      throw new RangeError("clock cannot move backwards");
    }
    this.current += delta;
    return this.current;
  }

  set(timestamp: bigint): void {
    if (timestamp < this.current) {
      throw new RangeError("clock cannot move backwards");
    }
    this.current = timestamp;
  }
}
