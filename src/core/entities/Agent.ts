import { z } from 'zod';

/**
 * Side-channel values handed to a run alongside its input text.
 * Must be JSON-serialisable.
 */
export type RunContext = Record<string, unknown>;

/**
 * A callable the model may choose to invoke while an agent runs
 */
export interface AgentTool {
  readonly name: string;
  readonly description: string;
  readonly parameters: z.ZodTypeAny;
  /**
   * Validate raw arguments against `parameters`, then run the tool body
   */
  invoke(args: unknown, context?: RunContext): Promise<string>;
}

/**
 * Agent configuration consumed by an agent runner. Carries no behaviour.
 */
export interface AgentDefinition {
  readonly name: string;
  readonly instructions: string;
  readonly model: string;
  readonly tools: readonly AgentTool[];
}

export interface AgentRunResult {
  finalOutput: string | null;
  turns: number;
}
