/**
 * Unbuffered hand-off channel between the run loop and the engine.
 *
 * A send only completes once a receiver has actually taken the value, so
 * the engine consumes target sets at its own pace. An aborted send is
 * withdrawn before anyone can receive it.
 */

interface PendingSend<T> {
  value: T;
  settle: (delivered: boolean) => void;
}

type Receive<T> = (result: IteratorResult<T, undefined>) => void;

export class TargetSetChannel<T> implements AsyncIterable<T> {
  private senders: PendingSend<T>[] = [];
  private receivers: Receive<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Offer a value to the receiving side.
   * Resolves `true` once received, `false` if aborted or closed first.
   */
  send(value: T, signal: AbortSignal): Promise<boolean> {
    if (this.closed || signal.aborted) return Promise.resolve(false);

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const pending: PendingSend<T> = {
        value,
        settle: (delivered) => {
          signal.removeEventListener("abort", onAbort);
          resolve(delivered);
        },
      };
      const onAbort = () => {
        this.senders = this.senders.filter((s) => s !== pending);
        resolve(false);
      };
      this.senders.push(pending);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Take the next value, waiting for a sender if none is queued */
  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.settle(true);
      return Promise.resolve({ value: sender.value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /** End iteration for receivers and fail every pending send */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers) {
      receiver({ value: undefined, done: true });
    }
    this.receivers = [];

    for (const sender of this.senders) {
      sender.settle(false);
    }
    this.senders = [];
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }
}
