/**
 * Promise based mutual exclusion
 * One instance guards one resource (config store, backups, maintenance state).
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  /**
   * Whether a critical section is currently running
   */
  public isLocked(): boolean {
    return this.held;
  }

  /**
   * Run `task` once every previously queued task has settled
   */
  public runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      this.held = true;
      try {
        return await task();
      } finally {
        this.held = false;
      }
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
