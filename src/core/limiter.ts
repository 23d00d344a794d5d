interface Waiter {
  grant: () => void;
}

/**
 * Fixed-size slot pool gating the start of browser work.
 *
 * Slots are handed over in FIFO order. A waiter whose signal fires leaves
 * the queue and gets `false` instead of a slot.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${size}`);
    }
  }

  /**
   * Wait for a free slot.
   * @returns true once a slot is held, false if the signal fired first
   */
  acquire(signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    if (this.active < this.size) {
      this.active++;
      return Promise.resolve(true);
    }

    return new Promise<boolean>(resolve => {
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(true);
        }
      };

      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        resolve(false);
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter, active count unchanged
      next.grant();
      return;
    }

    if (this.active === 0) {
      throw new Error('release() called without a held slot');
    }
    this.active--;
  }

  get activeCount(): number {
    return this.active;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }
}
