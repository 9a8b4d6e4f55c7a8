/**
 * Single-writer async lock.
 *
 * Critical sections run strictly one after another in call order. Node runs
 * each section's synchronous parts atomically anyway; the lock matters across
 * the `await` points inside a section (a snapshot write, for instance).
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    this.waiting++;
    const run = this.tail.then(section);
    this.tail = run.then(
      () => { this.waiting--; },
      () => { this.waiting--; },
    );
    return run;
  }

  /** True while a section is running or queued. */
  get busy(): boolean {
    return this.waiting > 0;
  }

  /** Resolves once every section queued so far has finished. */
  idle(): Promise<void> {
    return this.tail;
  }
}
