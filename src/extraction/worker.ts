import { createLogger } from '../utils/logger';

const logger = createLogger('extraction/worker');

type Task = () => Promise<void>;

/**
 * In-process job queue. Each lane (one per model profile) runs one task at a
 * time in submission order, and at most `maxConcurrent` tasks run across all
 * lanes.
 */
export class ExtractionWorker {
  private readonly queues = new Map<string, Task[]>();
  private readonly busyLanes = new Set<string>();
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    let total = 0;
    for (const queue of this.queues.values()) total += queue.length;
    return total;
  }

  enqueue<T>(lane: string, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const queue = this.queues.get(lane) ?? [];
      queue.push(async () => {
        try {
          resolve(await fn());
        } catch (error) {
          reject(error);
        }
      });
      this.queues.set(lane, queue);
      logger.debug({ lane, queued: queue.length }, 'Task enqueued');
      this.processQueues();
    });
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queuedCount === 0;
  }

  private processQueues(): void {
    for (const [lane, queue] of this.queues) {
      if (this.running >= this.maxConcurrent) return;
      if (this.busyLanes.has(lane)) continue;

      const next = queue.shift();
      if (queue.length === 0) this.queues.delete(lane);
      if (!next) continue;

      this.busyLanes.add(lane);
      this.running++;
      void next().finally(() => {
        this.busyLanes.delete(lane);
        this.running--;
        this.processQueues();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
