import OpenAI from "openai";
import type { GenerationConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { TwinError } from "../utils/errors.js";
import { buildPrompt, type PromptMessage } from "./prompt.js";
import { GenerationError, type GenerationRequest, type GenerationService } from "./types.js";

/** The slice of the SDK this generator calls; tests hand in a stub. */
export interface ChatCompletionsClient {
  create(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): Promise<{ choices: ReadonlyArray<{ message: { content: string | null } }> }>;
}

export interface OpenAICompatGeneratorOptions {
  config: GenerationConfig;
  logger: Logger;
  client?: ChatCompletionsClient;
}

/**
 * Generation against any OpenAI-compatible chat completions endpoint.
 * Makes exactly one request per call; retry and timeout belong to the caller.
 */
export class OpenAICompatGenerator implements GenerationService {
  private readonly config: GenerationConfig;
  private readonly logger: Logger;
  private readonly client: ChatCompletionsClient;

  constructor(options: OpenAICompatGeneratorOptions) {
    this.config = options.config;
    this.logger = options.logger.child({ component: "generation" });
    this.client = options.client ?? createClient(options.config);
  }

  async generate(request: GenerationRequest, signal: AbortSignal): Promise<string> {
    const prompt = buildPrompt(request.profile, request.context, request.mood);

    let response: Awaited<ReturnType<ChatCompletionsClient["create"]>>;
    try {
      response = await this.client.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          temperature: prompt.temperature,
          messages: prompt.messages.map(toChatMessage),
        },
        { signal },
      );
    } catch (err) {
      if (signal.aborted) throw signal.reason;
      throw toGenerationError(err);
    }

    const text = response.choices[0]?.message.content?.trim() ?? "";
    if (text.length === 0) {
      this.logger.warn({ model: this.config.model }, "Model returned an empty completion");
      throw new GenerationError("Model returned an empty completion", true);
    }
    return text;
  }
}

function toChatMessage(message: PromptMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

function createClient(config: GenerationConfig): ChatCompletionsClient {
  const apiKey = config.apiKey ?? process.env["OPENAI_API_KEY"];
  if (!apiKey && !config.baseUrl) {
    throw new TwinError(
      "generation_config",
      "Generation requires generation.apiKey, OPENAI_API_KEY, or a generation.baseUrl for a local endpoint",
    );
  }
  const client = new OpenAI({
    apiKey: apiKey ?? "unused",
    baseURL: config.baseUrl,
    maxRetries: 0,
  });
  return client.chat.completions;
}

export function toGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;
  if (err instanceof OpenAI.APIConnectionError) {
    return new GenerationError(`Generation endpoint unreachable: ${err.message}`, true, { cause: err });
  }
  if (err instanceof OpenAI.RateLimitError) {
    return new GenerationError(err.message || "rate limit exceeded", true, { cause: err });
  }
  if (err instanceof OpenAI.AuthenticationError) {
    return new GenerationError(err.message || "authentication failed", false, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    const retryable = err.status === undefined || err.status >= 500 || err.status === 408;
    return new GenerationError(err.message || "api error", retryable, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new GenerationError(message, false, { cause: err });
}
