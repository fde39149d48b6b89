import OpenAI from 'openai';

export type ChatMessage = {
  role: 'system' | 'user';
  content: string;
};

/**
 * The only surface the inference services need: one deterministic completion per call.
 */
export type ChatClient = {
  complete(messages: ChatMessage[]): Promise<string>;
};

export type OpenAIChatClientOptions = {
  apiKey: string;
  model: string;
  baseUrl?: string;
  /** Per-request timeout; <= 0 leaves the SDK default. */
  timeoutMs: number;
  maxRetries?: number;
};

export function createOpenAIChatClient(opts: OpenAIChatClientOptions): ChatClient {
  const client = new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseUrl,
    timeout: opts.timeoutMs > 0 ? opts.timeoutMs : undefined,
    maxRetries: opts.maxRetries ?? 2,
  });

  return {
    complete: async (messages) => {
      const response = await client.chat.completions.create({
        model: opts.model,
        messages,
        temperature: 0,
      });
      return response.choices[0]?.message?.content ?? '';
    },
  };
}
