import OpenAI from 'openai';

type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;
type ChatCompletionCreateParamsNonStreaming = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

/**
 * The one Chat Completions call the agent runner needs
 */
export interface ChatCompletionsClient {
  createCompletion(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
}

/**
 * OpenAI SDK client for any OpenAI-compatible endpoint.
 *
 * The SDK client is built on first use, so a missing API key fails the
 * first completion rather than startup.
 */
export class OpenAIChatClient implements ChatCompletionsClient {
  private client: OpenAI | null = null;

  constructor(
    private apiKey: string | undefined,
    private baseUrl: string
  ) {}

  async createCompletion(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
    return this.getClient().chat.completions.create(params);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.apiKey || undefined,
        baseURL: this.baseUrl,
        maxRetries: 0,
      });
    }
    return this.client;
  }
}
