import { describe, it, expect } from '@jest/globals';
import { ExtractionWorker } from '../src/extraction/worker';
import { deferred } from './utils/stubRuntimes';

describe('ExtractionWorker', () => {
  it('rejects a non-positive concurrency cap', () => {
    expect(() => new ExtractionWorker(0)).toThrow(RangeError);
    expect(() => new ExtractionWorker(1.5)).toThrow(RangeError);
  });

  it('runs tasks of one lane one at a time in submission order', async () => {
    const worker = new ExtractionWorker(4);
    const events: string[] = [];
    const gate = deferred();

    const first = worker.enqueue('spacy_bio', async () => {
      events.push('start 1');
      await gate.promise;
      events.push('end 1');
      return 1;
    });
    const second = worker.enqueue('spacy_bio', async () => {
      events.push('start 2');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['start 1']);
    expect(worker.activeCount).toBe(1);
    expect(worker.queuedCount).toBe(1);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(events).toEqual(['start 1', 'end 1', 'start 2']);
  });

  it('runs different lanes in parallel up to the cap', async () => {
    const worker = new ExtractionWorker(2);
    const gate = deferred();
    let running = 0;
    let peak = 0;

    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await gate.promise;
      running--;
    };

    const all = Promise.all([
      worker.enqueue('a', task),
      worker.enqueue('b', task),
      worker.enqueue('c', task),
    ]);

    await Promise.resolve();
    expect(worker.activeCount).toBe(2);
    expect(worker.queuedCount).toBe(1);

    gate.resolve();
    await all;
    expect(peak).toBe(2);
  });

  it('propagates task failures to the caller and keeps the lane going', async () => {
    const worker = new ExtractionWorker(1);

    const failing = worker.enqueue('lane', async () => {
      throw new Error('task failed');
    });
    const next = worker.enqueue('lane', async () => 'ok');

    await expect(failing).rejects.toThrow('task failed');
    await expect(next).resolves.toBe('ok');
  });

  it('resolves onIdle once everything queued has run', async () => {
    const worker = new ExtractionWorker(1);
    const finished: number[] = [];

    await expect(worker.onIdle()).resolves.toBeUndefined();

    void worker.enqueue('a', async () => {
      finished.push(1);
    });
    void worker.enqueue('b', async () => {
      finished.push(2);
    });

    await worker.onIdle();
    expect(finished).toEqual([1, 2]);
    expect(worker.activeCount).toBe(0);
    expect(worker.queuedCount).toBe(0);
  });
});
