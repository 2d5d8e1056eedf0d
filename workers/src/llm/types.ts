/**
 * LLM Provider Types
 *
 * Abstractions over the model backends (Anthropic, OpenAI-compatible
 * endpoints, Ollama) used by the candidate and judge stages.
 */

import type { PageImage } from "../types.js";

/**
 * Message content for vision requests (OpenAI-compatible)
 */
export type VisionContent =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

/**
 * Chat message format (OpenAI-compatible)
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string | VisionContent[];
}

/**
 * Chat request options
 */
export interface ChatRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Skip cache lookup/write for this request */
  skipCache?: boolean;
  /** Cache folder prefix (e.g. "candidates", "judge") */
  cachePrefix?: string;
}

/**
 * Chat response
 */
export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  cached?: boolean;
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  name: string;

  /**
   * Sends the user text first, then every image in order, as one user turn.
   */
  vision(
    systemPrompt: string,
    userPrompt: string,
    images: readonly PageImage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;

  text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;
}

export const PROVIDER_NAMES = [
  "anthropic",
  "openai-compatible",
  "ollama",
] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

/**
 * LLM configuration, built by `loadConfig`
 */
export interface LLMConfig {
  provider: ProviderName;
  /** Chat completions URL; unused by the Anthropic provider */
  endpoint?: string;
  /** Used by the OpenAI-compatible provider */
  apiKey?: string;
  /** Used by the Anthropic provider */
  anthropicApiKey?: string;
  textModel: string;
  visionModel: string;
  /** Ollama context window */
  numCtx: number;
  cache: {
    enabled: boolean;
    dir: string;
  };
}
