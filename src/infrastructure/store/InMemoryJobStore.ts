import { JobRecord, JobStatistics } from '../../core/entities/Job.js';
import { IJobStore } from '../../core/interfaces/IJobStore.js';

/**
 * Process-lifetime job store.
 *
 * Records are never evicted and are lost on restart. Each process owns its
 * own store, so this does not work behind a multi-process deployment.
 */
export class InMemoryJobStore implements IJobStore {
  private jobs: Map<string, JobRecord> = new Map();

  create(jobId: string): void {
    if (this.jobs.has(jobId)) {
      throw new Error(`Job ${jobId} already exists`);
    }
    this.jobs.set(jobId, { status: 'started' });
  }

  get(jobId: string): JobRecord | null {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : null;
  }

  setCompleted(jobId: string): boolean {
    if (!this.canFinish(jobId)) return false;
    this.jobs.set(jobId, { status: 'completed' });
    return true;
  }

  setFailed(jobId: string, error: string): boolean {
    if (!this.canFinish(jobId)) return false;
    this.jobs.set(jobId, { status: 'failed', error });
    return true;
  }

  getStatistics(): JobStatistics {
    const stats: JobStatistics = { total: 0, started: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      stats.total++;
      stats[job.status]++;
    }
    return stats;
  }

  /**
   * Terminal states are final
   */
  private canFinish(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) {
      console.error(`[JobStore] ✗ Cannot finish unknown job ${jobId}`);
      return false;
    }
    if (job.status !== 'started') {
      console.error(`[JobStore] ✗ Job ${jobId} is already ${job.status}`);
      return false;
    }
    return true;
  }
}
