/**
 * Anthropic Messages API Provider
 *
 * Default backend for both stages. Page images are sent as base64 image
 * blocks after the user text, in page order.
 */

import Anthropic from "@anthropic-ai/sdk";
import type {
  LLMProvider,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";
import type { PageImage } from "../../types.js";

const IMAGE_MEDIA_TYPES = [
  "image/jpeg",
  "image/png",
  "image/gif",
  "image/webp",
] as const;

type ImageMediaType = (typeof IMAGE_MEDIA_TYPES)[number];

function isImageMediaType(value: string): value is ImageMediaType {
  return IMAGE_MEDIA_TYPES.some((type) => type === value);
}

function imageBlock(image: PageImage): Anthropic.ContentBlockParam {
  if (!isImageMediaType(image.mediaType)) {
    throw new Error(
      `Unsupported image media type for page ${image.pageNumber}: ${image.mediaType}`,
    );
  }
  return {
    type: "image",
    source: { type: "base64", media_type: image.mediaType, data: image.base64 },
  };
}

export class AnthropicProvider implements LLMProvider {
  name = "anthropic";
  private client: Anthropic;

  constructor(
    apiKey: string,
    protected defaultModel: string,
  ) {
    this.client = new Anthropic({ apiKey });
  }

  async text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this._create(
      systemPrompt,
      [{ type: "text", text: userPrompt }],
      options,
    );
  }

  async vision(
    systemPrompt: string,
    userPrompt: string,
    images: readonly PageImage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const content: Anthropic.ContentBlockParam[] = [
      { type: "text", text: userPrompt },
      ...images.map(imageBlock),
    ];
    return this._create(systemPrompt, content, options);
  }

  protected async _create(
    systemPrompt: string,
    content: Anthropic.ContentBlockParam[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.defaultModel;

    const message = await this.client.messages.create({
      model,
      max_tokens: options?.maxTokens ?? 4096,
      temperature: options?.temperature ?? 0,
      system: systemPrompt,
      messages: [{ role: "user", content }],
    });

    const text = message.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    return {
      content: text,
      model: message.model || model,
      usage: {
        promptTokens: message.usage.input_tokens,
        completionTokens: message.usage.output_tokens,
        totalTokens: message.usage.input_tokens + message.usage.output_tokens,
      },
    };
  }
}
