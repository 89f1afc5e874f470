/**
 * Job domain entity
 *
 * A job is created as `started` and moves exactly once more, to either
 * `completed` or `failed`.
 */
export type JobRecord =
  | { status: 'started' }
  | { status: 'completed' }
  | { status: 'failed'; error: string };

export interface JobStatistics {
  total: number;
  started: number;
  completed: number;
  failed: number;
}

/**
 * Acknowledgement returned to the client on submission
 */
export interface JobSubmission {
  job_id: string;
  status: 'queued';
}
