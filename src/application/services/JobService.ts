import { randomUUID } from 'crypto';
import { JobRecord, JobStatistics } from '../../core/entities/Job.js';
import { IJobStore } from '../../core/interfaces/IJobStore.js';
import { TaskScheduler } from '../../infrastructure/queue/TaskScheduler.js';
import { MeetingPipeline } from './MeetingPipeline.js';

/**
 * Service for submitting summarization jobs and reading their status
 */
export class JobService {
  constructor(
    private jobStore: IJobStore,
    private scheduler: TaskScheduler,
    private pipeline: MeetingPipeline,
    private generateId: () => string = randomUUID
  ) {}

  /**
   * Record a new job and hand the pipeline to the scheduler.
   * Returns without waiting for any agent call.
   */
  submitJob(transcript: string): string {
    const jobId = this.generateId();
    this.jobStore.create(jobId);
    this.scheduler.schedule(jobId, () => this.pipeline.run(jobId, transcript));
    return jobId;
  }

  getJobStatus(jobId: string): JobRecord | null {
    return this.jobStore.get(jobId);
  }

  getStatistics(): JobStatistics {
    return this.jobStore.getStatistics();
  }
}
