/**
 * treesync Work — counting semaphore gating how many units run at once.
 * `Infinity` capacity never blocks.
 */

export type Release = () => void;

export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(readonly capacity: number) {
    if (Number.isNaN(capacity) || capacity <= 0) throw new Error('capacity must be > 0');
    this.available = capacity;
  }

  /** Number of callers waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) throw abortReason(signal);

    if (this.available > 0) {
      this.available -= 1;
      return this.releaser();
    }

    return await new Promise<Release>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(next);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(signal ? abortReason(signal) : new Error('aborted'));
      };
      const next = () => {
        signal?.removeEventListener('abort', onAbort);
        this.available -= 1;
        resolve(this.releaser());
      };
      this.waiters.push(next);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) next();
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('aborted');
}
