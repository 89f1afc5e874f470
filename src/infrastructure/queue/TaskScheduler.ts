import { getErrorMessage } from '../../utils/errors.js';

export type BackgroundTask = () => Promise<void>;

export interface SchedulerStatistics {
  scheduled: number;
  inFlight: number;
  settled: number;
  rejected: number;
}

/**
 * Fire-and-forget scheduler for background work.
 *
 * `schedule` returns before the task starts; callers never await the task.
 * A task id may only be in flight once at a time.
 */
export class TaskScheduler {
  private inFlight: Map<string, Promise<void>> = new Map();
  private scheduled = 0;
  private settled = 0;
  private rejected = 0;

  constructor(private debug: boolean = false) {}

  /**
   * Submit a task to run on a later tick
   */
  schedule(taskId: string, task: BackgroundTask): void {
    if (this.inFlight.has(taskId)) {
      throw new Error(`Task ${taskId} is already in flight`);
    }

    const running = Promise.resolve()
      .then(() => {
        if (this.debug) {
          console.error(`[DEBUG] [TaskScheduler] Task ${taskId} started`);
        }
        return task();
      })
      .catch((error: unknown) => {
        this.rejected++;
        console.error(`[TaskScheduler] ✗ Task ${taskId} rejected: ${getErrorMessage(error)}`);
      })
      .finally(() => {
        this.settled++;
        this.inFlight.delete(taskId);
      });

    this.scheduled++;
    this.inFlight.set(taskId, running);
  }

  getInFlightCount(): number {
    return this.inFlight.size;
  }

  getStatistics(): SchedulerStatistics {
    return {
      scheduled: this.scheduled,
      inFlight: this.inFlight.size,
      settled: this.settled,
      rejected: this.rejected,
    };
  }

  /**
   * Resolve once every in-flight task (including ones scheduled meanwhile) has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight.values());
    }
  }
}
