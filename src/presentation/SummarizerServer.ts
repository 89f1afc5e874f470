import { Config } from '../config.js';
import { createAgentRoster } from '../core/agents/definitions.js';
import { IAgentRunner } from '../core/interfaces/IAgentRunner.js';
import { IJobStore } from '../core/interfaces/IJobStore.js';
import { InMemoryJobStore } from '../infrastructure/store/InMemoryJobStore.js';
import { OpenAIChatClient } from '../infrastructure/llm/ChatCompletionsClient.js';
import { OpenAIAgentRunner } from '../infrastructure/llm/OpenAIAgentRunner.js';
import { TaskScheduler } from '../infrastructure/queue/TaskScheduler.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { MeetingPipeline } from '../application/services/MeetingPipeline.js';
import { JobService } from '../application/services/JobService.js';

export interface ServerDependencies {
  jobStore?: IJobStore;
  agentRunner?: IAgentRunner;
}

/**
 * Wires the store, runner, pipeline and HTTP surface once per process
 */
export class SummarizerServer {
  private jobStore: IJobStore;
  private scheduler: TaskScheduler;
  private jobService: JobService;
  private webServer: WebServer;

  constructor(private config: Config, deps: ServerDependencies = {}) {
    const debug = config.server.debug;

    this.jobStore = deps.jobStore ?? new InMemoryJobStore();
    const agentRunner = deps.agentRunner ?? new OpenAIAgentRunner(
      new OpenAIChatClient(config.model.apiKey, config.model.baseUrl),
      config.model.maxTurns,
      debug
    );

    this.scheduler = new TaskScheduler(debug);
    const pipeline = new MeetingPipeline(
      agentRunner,
      this.jobStore,
      createAgentRoster(config.model.name),
      config.email.recipients,
      debug
    );
    this.jobService = new JobService(this.jobStore, this.scheduler, pipeline);
    this.webServer = new WebServer(this.jobService, config.server.port, { debug });
  }

  getWebServer(): WebServer {
    return this.webServer;
  }

  getScheduler(): TaskScheduler {
    return this.scheduler;
  }

  async start(): Promise<void> {
    await this.webServer.start();
    console.error(`[Server] ✓ ${this.config.server.name} ready`);
  }

  printStats(): void {
    const jobs = this.jobStore.getStatistics();
    const tasks = this.scheduler.getStatistics();
    console.error(
      `[Server] Jobs: ${jobs.total} total | ${jobs.started} started | ${jobs.completed} completed | ${jobs.failed} failed`
    );
    console.error(`[Server] Background tasks: ${tasks.scheduled} scheduled | ${tasks.inFlight} in flight`);
  }

  /**
   * Stop accepting requests. In-flight jobs are abandoned in `started`.
   */
  async shutdown(): Promise<void> {
    if (this.webServer.isRunning()) {
      await this.webServer.stop();
    }
    const abandoned = this.scheduler.getInFlightCount();
    if (abandoned > 0) {
      console.error(`[Server] ⚠️ Abandoning ${abandoned} in-flight job(s)`);
    }
    this.printStats();
  }
}
