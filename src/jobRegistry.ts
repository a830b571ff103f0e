import { v4 as uuidv4 } from 'uuid';
import { ExtractionResult, JobStage, JobState, JobStatus } from './models/types';
import { JobNotFoundError, JobStateError } from './utils/errors';

export const STAGE_PROGRESS: Record<JobStage, number> = {
  validating: 0.05,
  extracting: 0.2,
  classifying: 0.4,
  resolving_images: 0.6,
  reconciling: 0.8,
  aggregating: 0.9
};

const TERMINAL: ReadonlySet<JobStatus> = new Set<JobStatus>(['completed', 'failed']);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * Keyed store of job states (create, update by stage, terminal).
 * Each registry is independent; pass the instance to whoever needs it.
 */
export class JobRegistry {
  private jobs = new Map<string, JobState>();

  create(filename: string, jobId: string = uuidv4()): JobState {
    if (this.jobs.has(jobId)) {
      throw new JobStateError(`Job already exists: ${jobId}`);
    }
    const now = new Date().toISOString();
    const job: JobState = {
      jobId,
      filename,
      status: 'pending',
      progress: 0,
      message: 'Job queued',
      createdAt: now,
      updatedAt: now
    };
    this.jobs.set(jobId, job);
    return { ...job };
  }

  start(jobId: string): JobState {
    return this.update(jobId, { status: 'processing', message: 'Processing started' });
  }

  advance(jobId: string, stage: JobStage): JobState {
    return this.update(jobId, {
      status: 'processing',
      stage,
      progress: STAGE_PROGRESS[stage],
      message: `Stage: ${stage}`
    });
  }

  complete(jobId: string, result: ExtractionResult): JobState {
    return this.update(jobId, {
      status: 'completed',
      progress: 1,
      message: 'Extraction completed',
      result
    });
  }

  fail(jobId: string, message: string, result?: ExtractionResult): JobState {
    return this.update(jobId, { status: 'failed', progress: 1, message, result });
  }

  get(jobId: string): JobState | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  require(jobId: string): JobState {
    const job = this.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  list(): JobState[] {
    return Array.from(this.jobs.values(), job => ({ ...job }));
  }

  get size(): number {
    return this.jobs.size;
  }

  private update(jobId: string, changes: Partial<Omit<JobState, 'jobId' | 'createdAt'>>): JobState {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminal(current.status)) {
      throw new JobStateError(`Job ${jobId} is already ${current.status}`);
    }
    const next: JobState = { ...current, ...changes, updatedAt: new Date().toISOString() };
    this.jobs.set(jobId, next);
    return { ...next };
  }
}
