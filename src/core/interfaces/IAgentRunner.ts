import { AgentDefinition, AgentRunResult, RunContext } from '../entities/Agent.js';

/**
 * Runs one agent to completion against a remote model.
 * Rejects when the run cannot produce a final output.
 */
export interface IAgentRunner {
  run(
    agent: AgentDefinition,
    input: string,
    context?: RunContext
  ): Promise<AgentRunResult>;
}
