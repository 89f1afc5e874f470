/**
 * Raised when an agent run cannot reach a final output
 */
export class AgentRunError extends Error {
  constructor(
    public readonly agentName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${agentName}] ${message}`, options);
    this.name = 'AgentRunError';
  }
}

export class MaxTurnsExceededError extends AgentRunError {
  constructor(agentName: string, public readonly maxTurns: number) {
    super(agentName, `Max turns (${maxTurns}) exceeded`);
    this.name = 'MaxTurnsExceededError';
  }
}

/**
 * Text description of any thrown value. Never empty.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown error';
  }
  const text = String(error);
  return text.length > 0 ? text : 'Unknown error';
}
