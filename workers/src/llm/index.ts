/**
 * Unified interface for the model calls of both extraction stages.
 * Connects the candidate pass (`chat`) and the visual judgment (`vision`) to
 * the configured provider while managing the response cache transparently.
 */

import type {
  LLMProvider,
  ChatRequestOptions,
  ChatResponse,
  LLMConfig,
} from "./types.js";
import type { PageImage } from "../types.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { ConfigurationError, requireCredential } from "../errors.js";
import { AnthropicProvider } from "./providers/anthropic.js";
import { GenericProvider } from "./providers/generic.js";
import { OllamaProvider } from "./providers/ollama.js";
import { LLMCache } from "./cache.js";
import type { CacheRequest } from "./cache.js";

export const DEFAULT_OLLAMA_ENDPOINT =
  "http://localhost:11434/v1/chat/completions";

/**
 * Instantiates the configured provider, checking its credentials.
 */
export function createProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case "ollama":
      return new OllamaProvider(
        config.endpoint || DEFAULT_OLLAMA_ENDPOINT,
        config.textModel,
        config.numCtx,
      );
    case "openai-compatible":
      if (!config.endpoint) {
        throw new ConfigurationError(
          "LLM_ENDPOINT",
          "LLM_ENDPOINT is required for the openai-compatible provider",
        );
      }
      return new GenericProvider(
        config.endpoint,
        config.textModel,
        config.apiKey ?? "",
      );
    case "anthropic":
      return new AnthropicProvider(
        requireCredential(config.anthropicApiKey, "ANTHROPIC_API_KEY"),
        config.textModel,
      );
  }
}

export interface LLMClientOptions {
  /** Used instead of the configured provider */
  provider?: LLMProvider;
  logger?: Logger;
}

export class LLMClient {
  private provider: LLMProvider | null;
  private cache: LLMCache | null;
  private logger: Logger;

  constructor(
    private config: LLMConfig,
    options: LLMClientOptions = {},
  ) {
    this.provider = options.provider ?? null;
    this.logger = options.logger ?? createConsoleLogger("LLMClient");
    this.cache = config.cache.enabled
      ? new LLMCache(config.cache.dir, this.logger)
      : null;
  }

  get textModel(): string {
    return this.config.textModel;
  }

  get visionModel(): string {
    return this.config.visionModel;
  }

  /**
   * Created on first use, so a missing credential surfaces as a
   * ConfigurationError from the call that needs it.
   */
  private getProvider(): LLMProvider {
    if (!this.provider) {
      this.provider = createProvider(this.config);
    }
    return this.provider;
  }

  private async cached(
    request: CacheRequest,
    model: string,
    options: ChatRequestOptions | undefined,
    defaultPrefix: string,
    call: () => Promise<ChatResponse>,
  ): Promise<ChatResponse> {
    const prefix = options?.cachePrefix || defaultPrefix;
    const cache = options?.skipCache ? null : this.cache;

    if (cache) {
      const hit = await cache.get(request, model, prefix);
      if (hit) {
        this.logger.info(`Cache hit for model ${model} (${prefix})`);
        return hit;
      }
    }

    const response = await call();

    if (cache) {
      await cache.set(request, model, response, prefix);
    }

    return response;
  }

  /**
   * Executes a text-only request.
   */
  async chat(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.config.textModel;

    return this.cached(
      { systemPrompt, userPrompt },
      model,
      options,
      "chat",
      () =>
        this.getProvider().text(systemPrompt, userPrompt, {
          ...options,
          model,
        }),
    );
  }

  /**
   * Executes a request over text followed by page images.
   */
  async vision(
    systemPrompt: string,
    userPrompt: string,
    images: readonly PageImage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.config.visionModel;

    return this.cached(
      { systemPrompt, userPrompt, images },
      model,
      options,
      "vision",
      () =>
        this.getProvider().vision(systemPrompt, userPrompt, images, {
          ...options,
          model,
        }),
    );
  }
}

export type { ChatResponse, ChatRequestOptions, LLMConfig } from "./types.js";
