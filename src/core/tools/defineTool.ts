import { z } from 'zod';
import { AgentTool, RunContext } from '../entities/Agent.js';

export interface ToolSpec<TSchema extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: TSchema;
  execute(args: z.infer<TSchema>, context?: RunContext): string | Promise<string>;
}

/**
 * Build an agent tool whose body only ever sees schema-checked arguments
 */
export function defineTool<TSchema extends z.ZodTypeAny>(spec: ToolSpec<TSchema>): AgentTool {
  return Object.freeze({
    name: spec.name,
    description: spec.description,
    parameters: spec.parameters,
    async invoke(args: unknown, context?: RunContext): Promise<string> {
      const parsed: z.infer<TSchema> = spec.parameters.parse(args);
      return spec.execute(parsed, context);
    },
  });
}
