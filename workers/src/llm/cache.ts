/**
 * Local filesystem cache for LLM request/response pairs.
 * Used primarily during development to avoid repeated API calls and costs
 * when the same submittal is processed again.
 * Cache key: <prefix>/<model id>/<prompt hash>/<content hash>.json
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { join, dirname } from "path";
import { z } from "zod";
import type { ChatResponse } from "./types.js";
import type { PageImage } from "../types.js";
import type { Logger } from "../logger.js";
import { createConsoleLogger } from "../logger.js";
import { hash, sanitizeForPath } from "../utils/hash.js";

export interface CacheRequest {
  systemPrompt: string;
  userPrompt: string;
  images?: readonly PageImage[];
}

const cachedResponseSchema = z.object({
  content: z.string(),
  model: z.string(),
  usage: z
    .object({
      promptTokens: z.number(),
      completionTokens: z.number(),
      totalTokens: z.number(),
    })
    .optional(),
});

/**
 * Derives a deterministic cache key from the model identifier, system prompt,
 * user prompt and any images, in order.
 */
function getCacheKey(
  request: CacheRequest,
  model: string,
): { modelId: string; promptHash: string; contentHash: string } {
  const promptHash = hash(request.systemPrompt);

  const content = [
    request.userPrompt,
    ...(request.images ?? []).map(
      (image) => `${image.mediaType};${image.base64}`,
    ),
  ].join("\n");
  const contentHash = hash(content);

  return { modelId: sanitizeForPath(model), promptHash, contentHash };
}

/**
 * Manages the persistence and retrieval of LLM responses on the local filesystem.
 */
export class LLMCache {
  constructor(
    private cacheDir: string,
    private logger: Logger = createConsoleLogger("LLMCache"),
  ) {}

  private getCachePath(
    request: CacheRequest,
    model: string,
    prefix: string,
  ): string {
    const { modelId, promptHash, contentHash } = getCacheKey(request, model);
    const parts = [
      this.cacheDir,
      prefix,
      modelId,
      promptHash,
      `${contentHash}.json`,
    ];
    return join(...parts.filter((path) => path));
  }

  /**
   * Retrieves a cached LLM response for an identical request, if any.
   */
  async get(
    request: CacheRequest,
    model: string,
    prefix: string = "default",
  ): Promise<ChatResponse | null> {
    const cachePath = this.getCachePath(request, model, prefix);

    try {
      const data = await readFile(cachePath, "utf-8");
      const cached = cachedResponseSchema.parse(JSON.parse(data));
      return { ...cached, cached: true };
    } catch {
      return null;
    }
  }

  /**
   * Serializes and writes an LLM response to the disk cache.
   */
  async set(
    request: CacheRequest,
    model: string,
    response: ChatResponse,
    prefix: string = "default",
  ): Promise<void> {
    const cachePath = this.getCachePath(request, model, prefix);

    await mkdir(dirname(cachePath), { recursive: true });
    await writeFile(cachePath, JSON.stringify(response, null, 2), "utf-8");

    this.logger.info(`Cached response to ${cachePath}`);
  }
}

export { getCacheKey };
