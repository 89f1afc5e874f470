import { JobRecord, JobStatistics } from '../entities/Job.js';

/**
 * Interface for job state tracking
 */
export interface IJobStore {
  create(jobId: string): void;

  get(jobId: string): JobRecord | null;

  /**
   * Returns false when the job is unknown or already terminal
   */
  setCompleted(jobId: string): boolean;

  setFailed(jobId: string, error: string): boolean;

  getStatistics(): JobStatistics;
}
