import type { JobPatch, JobStore } from '../db/client';
import { JobStateError } from './errors';
import type { ExtractionJob, JobResults, JobStatus } from './types';

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ['running', 'cancelled'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function assertTransition(job: Pick<ExtractionJob, 'id' | 'status'>, to: JobStatus): void {
  if (!canTransition(job.status, to)) {
    throw new JobStateError(job.id, `Job ${job.id} cannot move from ${job.status} to ${to}`);
  }
}

/**
 * Drives one job through `running` to a terminal state. Every write is
 * conditional on the status the run expects, so a job that was cancelled or
 * finished elsewhere is never overwritten.
 */
export class JobRun {
  private current: ExtractionJob;

  constructor(
    private readonly store: JobStore,
    job: ExtractionJob,
    private readonly now: () => Date = () => new Date()
  ) {
    this.current = job;
  }

  get job(): ExtractionJob {
    return this.current;
  }

  get id(): number {
    return this.current.id;
  }

  /** Returns false when the job has left `pending` (e.g. it was cancelled). */
  async start(): Promise<boolean> {
    assertTransition(this.current, 'running');
    const updated = await this.store.updateJob(
      this.id,
      { status: 'running', started_at: this.now().toISOString() },
      'pending'
    );
    if (!updated) return false;
    this.current = updated;
    return true;
  }

  async advance(to: number = this.current.progress + 1): Promise<void> {
    if (this.current.status !== 'running') {
      throw new JobStateError(this.id, `Job ${this.id} is ${this.current.status}, not running`);
    }
    const progress = Math.min(Math.max(to, this.current.progress), this.current.total);
    if (progress === this.current.progress) return;
    this.current = await this.apply({ progress });
  }

  async complete(results: JobResults): Promise<ExtractionJob> {
    assertTransition(this.current, 'completed');
    this.current = await this.apply({
      status: 'completed',
      progress: this.current.total,
      results,
      completed_at: this.now().toISOString(),
    });
    return this.current;
  }

  async fail(message: string): Promise<ExtractionJob> {
    assertTransition(this.current, 'failed');
    this.current = await this.apply({
      status: 'failed',
      error_message: message,
      completed_at: this.now().toISOString(),
    });
    return this.current;
  }

  private async apply(patch: JobPatch): Promise<ExtractionJob> {
    const updated = await this.store.updateJob(this.id, patch, 'running');
    if (!updated) {
      throw new JobStateError(this.id, `Job ${this.id} is no longer running`);
    }
    return updated;
  }
}
