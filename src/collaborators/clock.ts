import { IClock } from './interfaces';

/**
 * Wall-clock time in whole seconds. One block per second, counted from the
 * Unix epoch, so block numbers stay monotonic across restarts.
 */
export class SystemClock implements IClock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }

  blockNumber(): number {
    return this.now();
  }
}

/**
 * Hand-driven clock for tests and replays.
 */
export class ManualClock implements IClock {
  private timestamp: number;
  private block: number;

  constructor(timestamp: number, block = 1) {
    this.timestamp = timestamp;
    this.block = block;
  }

  now(): number {
    return this.timestamp;
  }

  blockNumber(): number {
    return this.block;
  }

  /** Move forward `seconds`, mining `blocks` blocks on the way */
  advance(seconds: number, blocks = 1): void {
    if (seconds < 0 || blocks < 0) {
      throw new Error(`Clock cannot move backwards: ${seconds}s, ${blocks} blocks`);
    }
    this.timestamp += seconds;
    this.block += blocks;
  }

  /** Jump to an absolute timestamp (must not be in the past) */
  setTime(timestamp: number, blocks = 1): void {
    this.advance(timestamp - this.timestamp, blocks);
  }
}
