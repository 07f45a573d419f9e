import { describe, it, expect } from 'vitest';
import { DistributedWork, distribute } from '../src/work/distributor.js';
import { Semaphore } from '../src/work/semaphore.js';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

// ─── DistributedWork ─────────────────────────────────────────────────

describe('DistributedWork', () => {
  it('returns results in submission order regardless of completion order', async () => {
    const work = new DistributedWork<string>();
    work.add({ execute: async () => { await delay(30); return 'slow'; } });
    work.add({ execute: async () => 'fast' });
    work.add({ execute: async () => { await delay(10); return 'medium'; } });
    expect(await work.run()).toEqual(['slow', 'fast', 'medium']);
  });

  it('resolves to an empty list without units', async () => {
    expect(await new DistributedWork<number>().run()).toEqual([]);
  });

  it('never runs more units at once than maxConcurrency', async () => {
    let inFlight = 0;
    let peak = 0;
    const work = new DistributedWork<number>({ maxConcurrency: 2 });
    for (let i = 0; i < 5; i++) {
      work.add({
        execute: async () => {
          inFlight++;
          peak = Math.max(peak, inFlight);
          await delay(5);
          inFlight--;
          return i;
        },
      });
    }
    expect(await work.run()).toEqual([0, 1, 2, 3, 4]);
    expect(peak).toBe(2);
  });

  it('waits for every unit, then throws the first failure by submission order', async () => {
    let lastFinished = false;
    const work = new DistributedWork<number>();
    work.add({ execute: async () => 1 });
    work.add({ execute: async () => { await delay(20); throw new Error('first'); } });
    work.add({ execute: async () => { throw new Error('second'); } });
    work.add({ execute: async () => { await delay(30); lastFinished = true; return 4; } });

    await expect(work.run()).rejects.toThrow('first');
    expect(lastFinished).toBe(true);
  });

  it('settle reports every outcome without throwing', async () => {
    const work = new DistributedWork<string>();
    work.add({ label: 'a', execute: async () => 'ok' });
    work.add({ label: 'b', execute: async () => { throw new Error('bad'); } });

    const outcomes = await work.settle();
    expect(outcomes.map(o => o.ok)).toEqual([true, false]);
    const failed = outcomes[1];
    expect(failed.unit.label).toBe('b');
    expect(failed.ok ? null : failed.error).toBeInstanceOf(Error);
  });

  it('stops units that have not started when the signal aborts', async () => {
    const controller = new AbortController();
    let secondStarted = false;
    const work = new DistributedWork<number>({ maxConcurrency: 1, signal: controller.signal });
    work.add({ execute: async () => { controller.abort(new Error('stop')); return 1; } });
    work.add({ execute: async () => { secondStarted = true; return 2; } });

    const [first, second] = await work.settle();
    expect(first.ok).toBe(true);
    expect(second.ok).toBe(false);
    expect(second.ok ? null : second.error).toEqual(new Error('stop'));
    expect(secondStarted).toBe(false);
  });

  it('can only run once', async () => {
    const work = new DistributedWork<number>();
    work.add({ execute: async () => 1 });
    await work.run();
    await expect(work.run()).rejects.toThrow('DistributedWork can only be run once');
    expect(() => work.add({ execute: async () => 2 })).toThrow('Cannot add work after the run has started');
  });

  it('rejects a concurrency below one', () => {
    expect(() => new DistributedWork({ maxConcurrency: 0 })).toThrow(RangeError);
    expect(() => new DistributedWork({ maxConcurrency: Number.NaN })).toThrow(RangeError);
  });

  it('accepts Infinity as "one task per unit"', async () => {
    const work = new DistributedWork<number>({ maxConcurrency: Infinity });
    work.add({ execute: async () => 7 });
    expect(work.size).toBe(1);
    expect(await work.run()).toEqual([7]);
  });
});

describe('distribute', () => {
  it('maps items through the distributor in order', async () => {
    const doubled = await distribute([3, 1, 2], async n => { await delay(n * 5); return n * 2; });
    expect(doubled).toEqual([6, 2, 4]);
  });
});

// ─── Semaphore ───────────────────────────────────────────────────────

describe('Semaphore', () => {
  it('queues acquirers beyond capacity until a slot is released', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    let acquired = false;
    const waiting = semaphore.acquire().then(r => { acquired = true; return r; });

    await delay(1);
    expect(acquired).toBe(false);
    expect(semaphore.pending).toBe(1);

    release();
    (await waiting)();
    expect(acquired).toBe(true);
    expect(semaphore.pending).toBe(0);
  });

  it('ignores a second call to the same release', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    release();
    release();
    await semaphore.acquire();
    let acquired = false;
    void semaphore.acquire().then(() => { acquired = true; });
    await delay(1);
    expect(acquired).toBe(false);
  });

  it('rejects a waiter whose signal aborts', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const controller = new AbortController();
    const waiting = semaphore.acquire(controller.signal);
    controller.abort(new Error('cancelled'));
    await expect(waiting).rejects.toThrow('cancelled');
    expect(semaphore.pending).toBe(0);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new Semaphore(2).acquire(controller.signal)).rejects.toThrow();
  });
});
