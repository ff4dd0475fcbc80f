import { ReplyTimeoutError } from "./errors.js";

/** setTimeout fires after 1ms for any delay above this. */
const MAX_TIMER_MS = 2 ** 31 - 1;

type Outcome =
  | { ok: true; reply: Uint8Array }
  | { ok: false; error: Error };

/**
 * Single-assignment result slot for one outstanding request.
 *
 * Exactly one writer settles it (the matching reply or a disconnect
 * broadcast); later writes are refused. The waiter observes it through
 * `result()`, which is bounded by its own deadline.
 */
export class ReplyFuture {
  private outcome: Outcome | undefined;
  private notify: (() => void) | undefined;

  constructor(
    readonly correlationId: string,
    private readonly release: (future: ReplyFuture) => void = () => {},
  ) {}

  get settled(): boolean {
    return this.outcome !== undefined;
  }

  resolve(reply: Uint8Array): boolean {
    return this.settle({ ok: true, reply });
  }

  fail(error: Error): boolean {
    return this.settle({ ok: false, error });
  }

  /**
   * Wait up to `timeoutMs` for the slot to be settled. The slot is
   * released from its table as soon as this call finishes either way.
   */
  async result(timeoutMs: number): Promise<Uint8Array> {
    try {
      const outcome = this.outcome ?? (await this.waitFor(timeoutMs));
      if (!outcome.ok) throw outcome.error;
      return outcome.reply;
    } finally {
      this.release(this);
    }
  }

  private settle(outcome: Outcome): boolean {
    if (this.outcome) return false;
    this.outcome = outcome;
    this.notify?.();
    return true;
  }

  private waitFor(timeoutMs: number): Promise<Outcome> {
    return new Promise<Outcome>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.notify = undefined;
        reject(new ReplyTimeoutError(this.correlationId, timeoutMs));
      }, Math.min(timeoutMs, MAX_TIMER_MS));

      this.notify = () => {
        clearTimeout(timer);
        this.notify = undefined;
        if (this.outcome) resolve(this.outcome);
      };
    });
  }
}

/**
 * Correlation id → outstanding reply slot. Every mutation below runs to
 * completion on the event loop, so the table is never observed half-way
 * through an insert or removal, and nothing is held while a caller waits.
 */
export class PendingRequests {
  private readonly slots = new Map<string, ReplyFuture>();

  get size(): number {
    return this.slots.size;
  }

  has(correlationId: string): boolean {
    return this.slots.has(correlationId);
  }

  create(correlationId: string): ReplyFuture {
    if (this.slots.has(correlationId)) {
      throw new Error(`Correlation id already outstanding: ${correlationId}`);
    }
    const future = new ReplyFuture(correlationId, (f) => this.remove(f));
    this.slots.set(correlationId, future);
    return future;
  }

  /**
   * Deliver a reply to its waiter. Returns false for an id that is not
   * outstanding (never issued, already answered, or abandoned).
   */
  fulfill(correlationId: string, reply: Uint8Array): boolean {
    const future = this.slots.get(correlationId);
    if (!future) return false;
    this.slots.delete(correlationId);
    return future.resolve(reply);
  }

  /** Fail one outstanding slot, e.g. when its frame could not be written. */
  fail(correlationId: string, error: Error): boolean {
    const future = this.slots.get(correlationId);
    if (!future) return false;
    this.slots.delete(correlationId);
    return future.fail(error);
  }

  /** Fail every outstanding slot; returns how many were failed. */
  failAll(error: Error): number {
    const futures = [...this.slots.values()];
    this.slots.clear();
    let failed = 0;
    for (const future of futures) {
      if (future.fail(error)) failed++;
    }
    return failed;
  }

  private remove(future: ReplyFuture): void {
    if (this.slots.get(future.correlationId) === future) {
      this.slots.delete(future.correlationId);
    }
  }
}
