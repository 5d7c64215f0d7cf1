import { EventEmitter } from 'eventemitter3';

/** Longest delay setTimeout honours; longer waits are re-armed in steps. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface RotationSchedulerOptions {
  /** Runs one tick and returns the time (ms) the next tick is due */
  tick: () => number;
  /** Upper bound for the retry delay after a failed tick */
  maxBackoffMs: number;
  clock?: () => number;
}

export interface RotationSchedulerEvents {
  'tick:scheduled': (dueAt: number) => void;
  'tick:failed': (info: { error: string; failureCount: number; retryAt: number }) => void;
}

/**
 * Single re-armed timer that drives epoch rotation. Each tick reports when the
 * next one is due, so a manual rotation only needs a `rearm()` to move the
 * schedule's phase.
 */
export class RotationScheduler extends EventEmitter<RotationSchedulerEvents> {
  private timer?: ReturnType<typeof setTimeout>;
  private nextRunAt?: number;
  private failureCount = 0;
  private tickFn: () => number;
  private maxBackoffMs: number;
  private clock: () => number;

  constructor(opts: RotationSchedulerOptions) {
    super();
    this.tickFn = opts.tick;
    this.maxBackoffMs = opts.maxBackoffMs;
    this.clock = opts.clock ?? (() => Date.now());
  }

  start(firstDueAt: number): void {
    this.rearm(firstDueAt);
  }

  rearm(dueAt: number): void {
    if (this.timer) clearTimeout(this.timer);

    const delay = Math.min(MAX_TIMER_DELAY_MS, Math.max(0, dueAt - this.clock()));
    this.nextRunAt = dueAt;
    this.timer = setTimeout(() => this.fire(), delay);
    // Don't keep the process alive just for rotation
    if (this.timer.unref) this.timer.unref();
    this.emit('tick:scheduled', dueAt);
  }

  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.nextRunAt = undefined;
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  getNextRunAt(): number | undefined {
    return this.nextRunAt;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  private fire(): void {
    this.timer = undefined;
    let dueAt: number;
    try {
      dueAt = this.tickFn();
      this.failureCount = 0;
    } catch (err) {
      this.failureCount++;
      const backoff = Math.min(this.maxBackoffMs, Math.pow(2, this.failureCount) * 1000);
      dueAt = this.clock() + backoff;
      this.emit('tick:failed', {
        error: err instanceof Error ? err.message : String(err),
        failureCount: this.failureCount,
        retryAt: dueAt,
      });
    }
    // stop() may have been called from inside the tick
    if (this.nextRunAt === undefined) return;
    this.rearm(dueAt);
  }
}
