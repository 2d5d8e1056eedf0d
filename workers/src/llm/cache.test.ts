/**
 * Validation Suite: cache
 * Cache key derivation and read/write behavior of the LLM response cache.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { join } from "path";
import { hash } from "../utils/hash.js";
import { silentLogger } from "../logger.js";

// Mock fs/promises
const mockMkdir = vi.fn();
const mockReadFile = vi.fn();
const mockWriteFile = vi.fn();

vi.mock("fs/promises", () => ({
  mkdir: (...args: unknown[]) => mockMkdir(...args),
  readFile: (...args: unknown[]) => mockReadFile(...args),
  writeFile: (...args: unknown[]) => mockWriteFile(...args),
}));

// Import after mocking
const { LLMCache, getCacheKey } = await import("./cache.js");

const page = (pageNumber: number, base64: string) => ({
  pageNumber,
  mediaType: "image/png",
  base64,
});

describe("LLM cache", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("getCacheKey", () => {
    it("should hash the system prompt and the user prompt", () => {
      const key = getCacheKey(
        { systemPrompt: "system prompt", userPrompt: "user prompt" },
        "test-model",
      );

      expect(key).toEqual({
        modelId: "test-model",
        promptHash: hash("system prompt"),
        contentHash: hash("user prompt"),
      });
    });

    it("should include images in the content hash", () => {
      const key = getCacheKey(
        {
          systemPrompt: "judge",
          userPrompt: "candidates",
          images: [page(0, "AAA"), page(1, "BBB")],
        },
        "test-model",
      );

      expect(key.contentHash).toBe(
        hash("candidates\nimage/png;AAA\nimage/png;BBB"),
      );
    });

    it("should change when image order changes", () => {
      const base = { systemPrompt: "judge", userPrompt: "candidates" };

      const forward = getCacheKey(
        { ...base, images: [page(0, "AAA"), page(1, "BBB")] },
        "m",
      );
      const reversed = getCacheKey(
        { ...base, images: [page(1, "BBB"), page(0, "AAA")] },
        "m",
      );

      expect(forward.contentHash).not.toBe(reversed.contentHash);
    });

    it("should sanitize model names for filesystem", () => {
      const key = getCacheKey(
        { systemPrompt: "test", userPrompt: "test" },
        "org/model:v1",
      );

      expect(key.modelId).toBe("org_model_v1");
    });
  });

  describe("LLMCache", () => {
    const cacheDir = "/tmp/cache";
    const simpleRequest = { systemPrompt: "system", userPrompt: "user" };
    const expectedPath = join(
      cacheDir,
      "judge",
      "model",
      hash("system"),
      `${hash("user")}.json`,
    );

    it("should return null on cache miss", async () => {
      mockReadFile.mockRejectedValue(new Error("ENOENT"));

      const cache = new LLMCache(cacheDir, silentLogger);
      const result = await cache.get(simpleRequest, "model");

      expect(result).toBeNull();
    });

    it("should return cached response on hit", async () => {
      mockReadFile.mockResolvedValue(
        JSON.stringify({ content: "Cached content", model: "test-model" }),
      );

      const cache = new LLMCache(cacheDir, silentLogger);
      const result = await cache.get(simpleRequest, "model", "judge");

      expect(mockReadFile).toHaveBeenCalledWith(expectedPath, "utf-8");
      expect(result).toEqual({
        content: "Cached content",
        model: "test-model",
        cached: true,
      });
    });

    it("should treat a malformed entry as a miss", async () => {
      mockReadFile.mockResolvedValue(JSON.stringify({ text: "old format" }));

      const cache = new LLMCache(cacheDir, silentLogger);

      expect(await cache.get(simpleRequest, "model")).toBeNull();
    });

    it("should write to cache on set", async () => {
      mockMkdir.mockResolvedValue(undefined);
      mockWriteFile.mockResolvedValue(undefined);
      const response = {
        content: "Response",
        model: "model",
        usage: { promptTokens: 10, completionTokens: 10, totalTokens: 20 },
      };

      const cache = new LLMCache(cacheDir, silentLogger);
      await cache.set(simpleRequest, "model", response, "judge");

      expect(mockMkdir).toHaveBeenCalledWith(
        join(cacheDir, "judge", "model", hash("system")),
        { recursive: true },
      );
      expect(mockWriteFile).toHaveBeenCalledWith(
        expectedPath,
        JSON.stringify(response, null, 2),
        "utf-8",
      );
    });
  });
});
