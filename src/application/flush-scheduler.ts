import type { Logger } from 'pino';
import { normalizeFlushInterval } from './dispatcher-config.js';

/**
 * Periodic flush timer.
 *
 * All arming and disarming goes through `start()`/`stop()`, and `start()` on
 * an armed scheduler is a no-op, so redundant or out-of-order foreground and
 * background notifications never leave two timers running.
 */
export class FlushScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private intervalSeconds: number;
  private readonly onTick: () => void;
  private readonly log: Logger;

  constructor(intervalSeconds: number | undefined, onTick: () => void, log: Logger) {
    this.intervalSeconds = normalizeFlushInterval(intervalSeconds);
    this.onTick = onTick;
    this.log = log;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get interval(): number {
    return this.intervalSeconds;
  }

  /** Arms the timer. Does nothing when already armed or when the interval is 0. */
  start(): void {
    if (this.timer !== null || this.intervalSeconds <= 0) return;

    this.timer = setInterval(() => this.onTick(), this.intervalSeconds * 1000);
    // The timer alone must not keep the host process alive.
    this.timer.unref();
    this.log.debug({ intervalSeconds: this.intervalSeconds }, 'Flush timer started');
  }

  stop(): void {
    if (this.timer === null) return;

    clearInterval(this.timer);
    this.timer = null;
    this.log.debug('Flush timer stopped');
  }

  /**
   * Changes the interval, re-arming the timer if it was running. The value
   * is normalized the same way as configuration.
   */
  reschedule(seconds: number): void {
    const wasRunning = this.running;
    this.stop();
    this.intervalSeconds = normalizeFlushInterval(seconds);
    if (wasRunning) this.start();
  }
}
