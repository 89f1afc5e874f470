import { zodToJsonSchema } from 'zod-to-json-schema';
import type OpenAI from 'openai';
import { AgentDefinition, AgentRunResult, AgentTool, RunContext } from '../../core/entities/Agent.js';
import { IAgentRunner } from '../../core/interfaces/IAgentRunner.js';
import { AgentRunError, MaxTurnsExceededError, getErrorMessage } from '../../utils/errors.js';
import { ChatCompletionsClient } from './ChatCompletionsClient.js';

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatCompletionMessageToolCall = OpenAI.Chat.Completions.ChatCompletionMessageToolCall;
type ChatCompletionTool = OpenAI.Chat.Completions.ChatCompletionTool;

export const DEFAULT_MAX_TURNS = 10;

/**
 * Agent runner on top of the Chat Completions API.
 *
 * Each turn sends the conversation so far. Tool calls are executed locally
 * and their results appended; the first reply without tool calls is the
 * final output.
 */
export class OpenAIAgentRunner implements IAgentRunner {
  constructor(
    private client: ChatCompletionsClient,
    private maxTurns: number = DEFAULT_MAX_TURNS,
    private debug: boolean = false
  ) {}

  async run(agent: AgentDefinition, input: string, context?: RunContext): Promise<AgentRunResult> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: agent.instructions },
    ];
    if (context) {
      messages.push({ role: 'system', content: `Run context (JSON): ${JSON.stringify(context)}` });
    }
    messages.push({ role: 'user', content: input });

    const tools = agent.tools.map(toChatTool);

    for (let turn = 1; turn <= this.maxTurns; turn++) {
      const completion = await this.client.createCompletion({
        model: agent.model,
        messages,
        ...(tools.length > 0 ? { tools } : {}),
      });

      const message = completion.choices[0]?.message;
      if (!message) {
        throw new AgentRunError(agent.name, 'Model returned no choices');
      }

      const toolCalls = message.tool_calls ?? [];
      if (toolCalls.length === 0) {
        this.debugLog(`${agent.name} finished after ${turn} turn(s)`);
        return { finalOutput: message.content, turns: turn };
      }

      messages.push({ role: 'assistant', content: message.content, tool_calls: toolCalls });

      for (const call of toolCalls) {
        const output = await this.invokeTool(agent, call, context);
        messages.push({ role: 'tool', tool_call_id: call.id, content: output });
      }
    }

    throw new MaxTurnsExceededError(agent.name, this.maxTurns);
  }

  private async invokeTool(
    agent: AgentDefinition,
    call: ChatCompletionMessageToolCall,
    context?: RunContext
  ): Promise<string> {
    const { name, arguments: rawArgs } = call.function;
    const tool = agent.tools.find((t) => t.name === name);
    if (!tool) {
      throw new AgentRunError(agent.name, `Model called unknown tool "${name}"`);
    }

    let args: unknown;
    try {
      args = rawArgs ? JSON.parse(rawArgs) : {};
    } catch (error) {
      throw new AgentRunError(agent.name, `Invalid JSON arguments for tool "${name}"`, { cause: error });
    }

    this.debugLog(`${agent.name} calling tool ${name}`);
    try {
      return await tool.invoke(args, context);
    } catch (error) {
      throw new AgentRunError(agent.name, `Tool "${name}" failed: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  private debugLog(message: string): void {
    if (this.debug) {
      console.error(`[DEBUG] [AgentRunner] ${message}`);
    }
  }
}

/**
 * Advertise a tool as a Chat Completions function
 */
export function toChatTool(tool: AgentTool): ChatCompletionTool {
  const parameters: Record<string, unknown> = {
    ...zodToJsonSchema(tool.parameters, { target: 'openApi3' }),
  };
  // zodToJsonSchema wraps the schema with a $schema marker the API does not take
  delete parameters.$schema;

  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters,
    },
  };
}
