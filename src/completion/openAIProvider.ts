import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { CompletionConfig } from "../config";
import { AllocationRequest } from "../engine/requestBuilder";
import { CompletionCallOptions, CompletionProvider } from "./completionClient";
import { CompletionServiceError } from "./completionErrors";

/**
 * The slice of the chat-completions API the provider uses.
 * `new OpenAI(...).chat.completions` satisfies it; tests pass a fake.
 */
export interface ChatCompletionsApi {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options: { signal: AbortSignal; timeout: number; maxRetries: number }
  ): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
}

export type OpenAIProviderOptions = Pick<
  CompletionConfig,
  "apiKey" | "baseURL" | "model" | "temperature" | "maxTokens"
> & {
  completions?: ChatCompletionsApi;
};

const SYSTEM_PROMPT =
  "You are an investment allocation assistant. The user message is a JSON request. " +
  "Reply with a single JSON object that follows its outputSchema and hardRequirements.";

/**
 * Completion provider for any OpenAI-compatible chat-completions endpoint.
 * Retries are left to CompletionClient, so the SDK's own retries are disabled.
 */
export class OpenAICompletionProvider implements CompletionProvider {
  private completions: ChatCompletionsApi | null;

  constructor(private readonly options: OpenAIProviderOptions) {
    this.completions = options.completions ?? null;
  }

  async complete(request: AllocationRequest, { signal, timeoutMs }: CompletionCallOptions): Promise<string> {
    const response = await this.getCompletions(timeoutMs).create(
      {
        model: this.options.model,
        temperature: this.options.temperature,
        max_tokens: this.options.maxTokens,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: JSON.stringify(request) },
        ],
      },
      { signal, timeout: timeoutMs, maxRetries: 0 }
    );

    const content = response.choices[0]?.message.content?.trim();
    if (!content) {
      throw new CompletionServiceError("malformed-response", "Completion response has no content");
    }
    return content;
  }

  private getCompletions(timeoutMs: number): ChatCompletionsApi {
    if (this.completions) return this.completions;

    if (!this.options.apiKey) {
      throw new CompletionServiceError("auth-error", "No completion API key configured");
    }
    const client = new OpenAI({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseURL,
      maxRetries: 0,
      timeout: timeoutMs,
    });
    this.completions = client.chat.completions;
    return this.completions;
  }
}
