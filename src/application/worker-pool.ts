/** One unit of the pool's concurrency budget, held by a single request. */
export interface WorkerSlot {
  readonly id: number;
  readonly released: boolean;
  /** Returns the slot to the pool. Calling it again is a no-op. */
  release(): void;
}

/**
 * Fixed-size set of worker slots.
 *
 * A slot stays taken for the whole request pipeline, including time spent
 * blocked on a full downstream queue, so queue saturation shows up here as
 * slot saturation.
 */
export class WorkerPool {
  private readonly free: number[];
  private idleWaiters: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`WorkerPool size must be a positive integer, got ${size}`);
    }
    this.free = Array.from({ length: size }, (_, i) => size - 1 - i);
  }

  get available(): number {
    return this.free.length;
  }

  get busy(): number {
    return this.size - this.free.length;
  }

  /** Takes a free slot, or returns undefined when all are busy. Never waits. */
  tryAcquire(): WorkerSlot | undefined {
    const id = this.free.pop();
    if (id === undefined) return undefined;

    let released = false;
    return {
      id,
      get released() {
        return released;
      },
      release: () => {
        if (released) return;
        released = true;
        this.free.push(id);
        if (this.busy === 0) this.notifyIdle();
      },
    };
  }

  /** Resolves once no slot is taken. */
  whenIdle(): Promise<void> {
    if (this.busy === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
