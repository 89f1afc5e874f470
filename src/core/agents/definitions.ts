import { AgentDefinition, AgentTool } from '../entities/Agent.js';
import { sendEmailTool } from '../tools/sendEmailTool.js';

export const TRANSCRIBER_INSTRUCTIONS =
  'You turn raw meeting transcripts into clean, speaker-labelled text. ' +
  'Keep every statement, fix obvious transcription noise and put each speaker turn on its own line.';

export const CLARIFIER_INSTRUCTIONS =
  'Read the transcript and flag any ambiguous points (unclear owners, dates or decisions). ' +
  'Resolve what the transcript itself answers and return the transcript with the remaining ' +
  'questions listed at the end, so the summarizer can address them.';

export const SUMMARIZER_INSTRUCTIONS =
  'Produce a concise one-page summary plus a Mermaid timeline of the meeting. ' +
  'Then call send_email to deliver it, using the recipients and subject from the run context.';

/**
 * The three pipeline agents, in execution order
 */
export interface AgentRoster {
  transcriber: AgentDefinition;
  clarifier: AgentDefinition;
  summarizer: AgentDefinition;
}

function defineAgent(
  name: string,
  instructions: string,
  model: string,
  tools: readonly AgentTool[] = []
): AgentDefinition {
  return Object.freeze({ name, instructions, model, tools: Object.freeze([...tools]) });
}

/**
 * Build the agent roster for a model. Called once at startup.
 */
export function createAgentRoster(model: string): AgentRoster {
  return Object.freeze({
    transcriber: defineAgent('Transcriber', TRANSCRIBER_INSTRUCTIONS, model),
    clarifier: defineAgent('Clarifier', CLARIFIER_INSTRUCTIONS, model),
    summarizer: defineAgent('Summarizer', SUMMARIZER_INSTRUCTIONS, model, [sendEmailTool]),
  });
}
