import { createLogger, errorMessage } from '../utils';

const log = createLogger('pool');

export type Task = () => Promise<void>;

/**
 * Concurrency gate for per-launch work. `submit` never waits: the task runs
 * now, is queued, or is dropped when the queue is full.
 */
export class TaskPool {
  private active = 0;
  private queue: Task[] = [];
  private inFlight = new Set<Promise<void>>();
  private closed = false;

  constructor(
    private readonly maxConcurrent: number,
    private readonly maxQueued: number
  ) {
    if (maxConcurrent < 1) throw new Error('maxConcurrent must be >= 1');
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.queue.length;
  }

  submit(task: Task): boolean {
    if (this.closed) return false;
    if (this.active < this.maxConcurrent) {
      this.run(task);
      return true;
    }
    if (this.queue.length >= this.maxQueued) return false;
    this.queue.push(task);
    return true;
  }

  /**
   * Close the pool, discard queued tasks and wait up to `graceMs` for the
   * running ones. Resolves true when everything finished in time.
   */
  async drain(graceMs: number): Promise<boolean> {
    this.closed = true;
    const discarded = this.queue.length;
    this.queue = [];
    if (discarded > 0) log.info('Discarded queued tasks', { discarded });

    if (this.inFlight.size === 0) return true;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const settled = Promise.allSettled([...this.inFlight]).then(() => true);
    const finished = await Promise.race([settled, expired]);
    clearTimeout(timer);

    if (!finished) {
      log.warn('Grace period expired, abandoning in-flight tasks', { abandoned: this.inFlight.size });
    }
    return finished;
  }

  private run(task: Task) {
    this.active++;
    const p: Promise<void> = task()
      .catch(err => {
        log.error('Task failed', { error: errorMessage(err) });
      })
      .finally(() => {
        this.active--;
        this.inFlight.delete(p);
        const next = this.queue.shift();
        if (next && !this.closed) this.run(next);
      });
    this.inFlight.add(p);
  }
}
