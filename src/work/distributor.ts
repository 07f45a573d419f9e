/**
 * treesync Work — Distributed execution of independent work units.
 *
 * Units run concurrently through a bounded pool. Results always come back in
 * submission order; a failing unit never cancels its siblings, and `run()`
 * only throws after every unit has settled.
 */

import { Semaphore } from './semaphore.js';

/** Large enough that ordinary workspaces run fully in parallel */
export const DEFAULT_MAX_CONCURRENCY = 16;

export interface WorkUnit<T> {
  /** Shown in failure messages */
  label?: string;
  execute(): Promise<T>;
}

export type WorkOutcome<T> =
  | { unit: WorkUnit<T>; ok: true; value: T }
  | { unit: WorkUnit<T>; ok: false; error: unknown };

export interface DistributedWorkOptions {
  /** Upper bound on units in flight; Infinity for one task per unit */
  maxConcurrency?: number;
  /**
   * Stops units that have not started yet. They settle as failures carrying
   * the abort reason; running units are never interrupted.
   */
  signal?: AbortSignal;
}

export class DistributedWork<T> {
  private readonly units: WorkUnit<T>[] = [];
  private readonly maxConcurrency: number;
  private readonly signal?: AbortSignal;
  private started = false;

  constructor(options: DistributedWorkOptions = {}) {
    const max = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
    if (Number.isNaN(max) || max < 1) {
      throw new RangeError(`maxConcurrency must be >= 1, got ${max}`);
    }
    this.maxConcurrency = max;
    this.signal = options.signal;
  }

  get size(): number {
    return this.units.length;
  }

  add(unit: WorkUnit<T>): this {
    if (this.started) throw new Error('Cannot add work after the run has started');
    this.units.push(unit);
    return this;
  }

  /**
   * Execute every unit and report each outcome, in submission order.
   * Never rejects because of a unit failure.
   */
  async settle(): Promise<WorkOutcome<T>[]> {
    if (this.started) throw new Error('DistributedWork can only be run once');
    this.started = true;

    const semaphore = new Semaphore(Math.min(this.maxConcurrency, Math.max(this.units.length, 1)));
    const outcomes = this.units.map(unit => this.runUnit(unit, semaphore));
    return Promise.all(outcomes);
  }

  /**
   * Execute every unit and return the values in submission order.
   * Waits for all units, then throws the first failure by submission order.
   */
  async run(): Promise<T[]> {
    const outcomes = await this.settle();
    const values: T[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) throw outcome.error;
      values.push(outcome.value);
    }
    return values;
  }

  private async runUnit(unit: WorkUnit<T>, semaphore: Semaphore): Promise<WorkOutcome<T>> {
    let release: (() => void) | undefined;
    try {
      release = await semaphore.acquire(this.signal);
      const value = await unit.execute();
      return { unit, ok: true, value };
    } catch (error) {
      return { unit, ok: false, error };
    } finally {
      release?.();
    }
  }
}

/** Convenience: run `fn` over `items` with the distributor, keeping order */
export async function distribute<I, T>(
  items: readonly I[],
  fn: (item: I) => Promise<T>,
  options: DistributedWorkOptions = {},
): Promise<T[]> {
  const work = new DistributedWork<T>(options);
  for (const item of items) {
    work.add({ execute: () => fn(item) });
  }
  return work.run();
}
