/**
 * Single-slot, coalescing notification.
 *
 * Raising while a signal is already pending is a no-op, so however many
 * updates land between two wake-ups the waiter runs once and only sees the
 * latest state.
 */
export class ReloadSignal {
  private isPending = false;
  private waiters: Array<() => void> = [];

  /** Whether a signal is waiting to be taken */
  get pending(): boolean {
    return this.isPending;
  }

  /** Flag pending work. Never blocks. */
  raise(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter();
      return;
    }
    this.isPending = true;
  }

  /**
   * Wait for a signal and consume it.
   * Resolves `true` when a signal was taken, `false` if `signal` aborted first.
   */
  wait(signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return Promise.resolve(false);
    if (this.isPending) {
      this.isPending = false;
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== wake);
        resolve(false);
      };
      const wake = () => {
        signal.removeEventListener("abort", onAbort);
        resolve(true);
      };
      this.waiters.push(wake);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }
}
