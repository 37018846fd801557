import { describe, it, expect } from 'vitest';
import { TaskPool } from '../src/pipeline';
import { flush } from './helpers';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('TaskPool', () => {
  it('runs up to the concurrency limit and queues the rest', async () => {
    const pool = new TaskPool(2, 10);
    const gates = [deferred(), deferred(), deferred()];
    const started: number[] = [];

    gates.forEach((gate, i) => {
      pool.submit(async () => {
        started.push(i);
        await gate.promise;
      });
    });

    expect(started).toEqual([0, 1]);
    expect(pool.running).toBe(2);
    expect(pool.queued).toBe(1);

    gates[0].resolve();
    await flush();
    expect(started).toEqual([0, 1, 2]);
    expect(pool.queued).toBe(0);
  });

  it('refuses work when the queue is full', () => {
    const pool = new TaskPool(1, 1);
    const gate = deferred();
    expect(pool.submit(() => gate.promise)).toBe(true);
    expect(pool.submit(() => gate.promise)).toBe(true);
    expect(pool.submit(() => gate.promise)).toBe(false);
  });

  it('frees the slot of a rejected task', async () => {
    const pool = new TaskPool(1, 5);
    let ran = false;
    pool.submit(async () => {
      throw new Error('boom');
    });
    pool.submit(async () => {
      ran = true;
    });

    await flush();
    expect(ran).toBe(true);
    expect(pool.running).toBe(0);
  });

  it('waits for in-flight tasks on drain and discards the queue', async () => {
    const pool = new TaskPool(1, 5);
    const gate = deferred();
    let queuedRan = false;
    pool.submit(() => gate.promise);
    pool.submit(async () => {
      queuedRan = true;
    });

    const draining = pool.drain(1000);
    gate.resolve();

    expect(await draining).toBe(true);
    expect(queuedRan).toBe(false);
    expect(pool.submit(async () => {})).toBe(false);
  });

  it('gives up on in-flight tasks after the grace period', async () => {
    const pool = new TaskPool(1, 5);
    pool.submit(() => new Promise<void>(() => {}));
    expect(await pool.drain(20)).toBe(false);
  });

  it('drains immediately when idle', async () => {
    expect(await new TaskPool(3, 3).drain(1000)).toBe(true);
  });
});
