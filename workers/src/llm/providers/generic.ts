/**
 * OpenAI-compatible Chat Completions Provider
 *
 * Works with any endpoint that accepts `messages` with `image_url` parts
 * (hosted inference endpoints, vLLM, LiteLLM proxies).
 */

import { z } from "zod";
import type {
  LLMProvider,
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
  VisionContent,
} from "../types.js";
import type { PageImage } from "../../types.js";

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      }),
    )
    .default([]),
  model: z.string().optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class GenericProvider implements LLMProvider {
  name = "openai-compatible";

  constructor(
    protected endpoint: string,
    protected defaultModel: string,
    protected apiKey: string,
  ) {}

  async vision(
    systemPrompt: string,
    userPrompt: string,
    images: readonly PageImage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const userContent: VisionContent[] = [
      { type: "text", text: userPrompt },
      ...images.map(
        (image): VisionContent => ({
          type: "image_url",
          image_url: { url: `data:${image.mediaType};base64,${image.base64}` },
        }),
      ),
    ];

    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: userContent },
    ];
    return this._chat(messages, options);
  }

  async text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: userPrompt },
    ];
    return this._chat(messages, options);
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const model = options?.model || this.defaultModel;

    return {
      model,
      messages,
      temperature: options?.temperature ?? 0,
      max_tokens: options?.maxTokens ?? 4096,
    };
  }

  protected _getRequestHeaders(): Record<string, string> {
    const requestHeaders: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.apiKey) {
      requestHeaders["Authorization"] = `Bearer ${this.apiKey}`;
    }

    return requestHeaders;
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this._doChat(messages, options);
  }

  protected async _doChat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.defaultModel;

    const requestBody = this._getRequestBody(messages, options);
    const requestHeaders = this._getRequestHeaders();

    const response = await fetch(this.endpoint, {
      method: "POST",
      headers: requestHeaders,
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} API error (${response.status}): ${error}`);
    }

    const data = completionSchema.parse(await response.json());

    return {
      content: data.choices[0]?.message?.content || "",
      model: data.model || model,
      usage: data.usage
        ? {
            promptTokens: data.usage.prompt_tokens,
            completionTokens: data.usage.completion_tokens,
            totalTokens: data.usage.total_tokens,
          }
        : undefined,
    };
  }
}
