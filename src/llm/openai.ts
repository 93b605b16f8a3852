import OpenAI from "openai";

/** One chat-completion request as the moderation client issues it. */
export interface CompletionRequest {
  model: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface CompletionResponse {
  /** Text of each returned choice, in order. */
  choices: string[];
}

/**
 * Transport used by ModerationClient. Implementations must reject when the
 * request fails and must stop the request when `signal` aborts.
 */
export type ChatCompletionFn = (request: CompletionRequest, signal?: AbortSignal) => Promise<CompletionResponse>;

export interface OpenAiTransportOptions {
  apiKey: string;
  baseURL: string;
  /** Per-request timeout of the SDK itself; the caller's signal still applies. */
  timeoutMs?: number;
}

/**
 * Chat-completion transport over any OpenAI-compatible API (Groq by default).
 * SDK retries are off: every check is a single attempt.
 */
export function createOpenAiCompletion(opts: OpenAiTransportOptions): ChatCompletionFn {
  const client = new OpenAI({
    apiKey: opts.apiKey,
    baseURL: opts.baseURL,
    maxRetries: 0,
    timeout: opts.timeoutMs,
  });

  return async (request, signal) => {
    const completion = await client.chat.completions.create(
      {
        model: request.model,
        messages: [{ role: "user", content: request.prompt }],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { signal },
    );

    return {
      choices: completion.choices.map((choice) => choice.message.content ?? ""),
    };
  };
}
