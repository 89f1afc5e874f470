import { AgentRoster } from '../../core/agents/definitions.js';
import { IAgentRunner } from '../../core/interfaces/IAgentRunner.js';
import { IJobStore } from '../../core/interfaces/IJobStore.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * Context handed to the Summarizer run
 */
export type SummaryContext = {
  recipients: string[];
  subject: string;
};

export function summarySubject(jobId: string): string {
  return `Summary #${jobId}`;
}

/**
 * Transcriber → Clarifier → Summarizer, strictly in sequence.
 *
 * The first failing stage ends the job as `failed`; later stages never run
 * and nothing is retried.
 */
export class MeetingPipeline {
  constructor(
    private agentRunner: IAgentRunner,
    private jobStore: IJobStore,
    private agents: AgentRoster,
    private recipients: readonly string[],
    private debug: boolean = false
  ) {}

  /**
   * Run all stages for one job. Never rejects: the outcome lands on the job record.
   */
  async run(jobId: string, transcript: string): Promise<void> {
    try {
      const transcribed = await this.agentRunner.run(this.agents.transcriber, transcript);
      const cleanText = transcribed.finalOutput ?? '';
      this.debugLog(jobId, `${this.agents.transcriber.name} done (${cleanText.length} chars)`);

      const clarified = await this.agentRunner.run(this.agents.clarifier, cleanText);
      // null and "" both mean the clarifier had nothing to add
      const clarifiedText = clarified.finalOutput || cleanText;
      this.debugLog(jobId, `${this.agents.clarifier.name} done (${clarifiedText.length} chars)`);

      const context: SummaryContext = {
        recipients: [...this.recipients],
        subject: summarySubject(jobId),
      };
      await this.agentRunner.run(this.agents.summarizer, clarifiedText, context);
      this.debugLog(jobId, `${this.agents.summarizer.name} done`);

      this.jobStore.setCompleted(jobId);
      console.error(`[Pipeline] ✓ Job ${jobId} completed`);
    } catch (error) {
      const message = getErrorMessage(error);
      this.jobStore.setFailed(jobId, message);
      console.error(`[Pipeline] ✗ Job ${jobId} failed: ${message}`);
    }
  }

  private debugLog(jobId: string, message: string): void {
    if (this.debug) {
      console.error(`[DEBUG] [Pipeline] Job ${jobId}: ${message}`);
    }
  }
}
