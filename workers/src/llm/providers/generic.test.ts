/**
 * Validation Suite: OpenAI-compatible and Ollama providers
 * Request bodies and response mapping against a mocked fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GenericProvider } from "./generic.js";
import { OllamaProvider } from "./ollama.js";

const mockFetch = vi.fn();
const originalFetch = global.fetch;

function completion(content: string) {
  return new Response(
    JSON.stringify({
      model: "served-model",
      choices: [{ message: { content } }],
      usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
    }),
    { status: 200 },
  );
}

function sentBody(call = 0) {
  return JSON.parse(mockFetch.mock.calls[call][1].body);
}

describe("GenericProvider", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    global.fetch = mockFetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it("should post system and user messages with a bearer token", async () => {
    mockFetch.mockResolvedValue(completion("[]"));
    const provider = new GenericProvider(
      "https://llm.test/v1/chat/completions",
      "default-model",
      "test-secret",
    );

    const response = await provider.text("system", "user", { maxTokens: 4000 });

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/chat/completions");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-secret",
    });
    expect(sentBody()).toEqual({
      model: "default-model",
      messages: [
        { role: "system", content: "system" },
        { role: "user", content: "user" },
      ],
      temperature: 0,
      max_tokens: 4000,
    });
    expect(response).toEqual({
      content: "[]",
      model: "served-model",
      usage: { promptTokens: 5, completionTokens: 2, totalTokens: 7 },
    });
  });

  it("should omit the authorization header without a key", async () => {
    mockFetch.mockResolvedValue(completion("{}"));
    const provider = new GenericProvider("https://llm.test", "m", "");

    await provider.text("s", "u");

    expect(mockFetch.mock.calls[0][1].headers).toEqual({
      "Content-Type": "application/json",
    });
  });

  it("should send images as data URLs after the text", async () => {
    mockFetch.mockResolvedValue(completion("{}"));
    const provider = new GenericProvider("https://llm.test", "m", "k");

    await provider.vision("judge", "candidates", [
      { pageNumber: 0, mediaType: "image/png", base64: "AAA" },
    ]);

    expect(sentBody().messages[1]).toEqual({
      role: "user",
      content: [
        { type: "text", text: "candidates" },
        { type: "image_url", image_url: { url: "data:image/png;base64,AAA" } },
      ],
    });
  });

  it("should raise with status and body on API errors", async () => {
    mockFetch.mockResolvedValue(new Response("overloaded", { status: 503 }));
    const provider = new GenericProvider("https://llm.test", "m", "k");

    await expect(provider.text("s", "u")).rejects.toThrow(
      "openai-compatible API error (503): overloaded",
    );
  });

  it("should return empty content when no choice is returned", async () => {
    mockFetch.mockResolvedValue(
      new Response(JSON.stringify({ choices: [] }), { status: 200 }),
    );
    const provider = new GenericProvider("https://llm.test", "m", "k");

    const response = await provider.text("s", "u");

    expect(response).toEqual({ content: "", model: "m", usage: undefined });
  });
});

describe("OllamaProvider", () => {
  beforeEach(() => {
    mockFetch.mockReset();
    global.fetch = mockFetch;
  });

  afterEach(() => {
    global.fetch = originalFetch;
  });

  it("should add context size and disable streaming", async () => {
    mockFetch.mockResolvedValue(completion("{}"));
    const provider = new OllamaProvider("http://ollama.test", "llava", 8192);

    await provider.text("s", "u");

    expect(sentBody()).toMatchObject({
      model: "llava",
      stream: false,
      keep_alive: "5m",
      options: { num_ctx: 8192 },
    });
    expect(mockFetch.mock.calls[0][1].headers).toEqual({
      "Content-Type": "application/json",
    });
  });

  it("should run requests one at a time", async () => {
    let active = 0;
    let maxActive = 0;
    mockFetch.mockImplementation(async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return completion("{}");
    });
    const provider = new OllamaProvider("http://ollama.test", "llava", 4096);

    await Promise.all([
      provider.text("s", "one"),
      provider.text("s", "two"),
      provider.text("s", "three"),
    ]);

    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);
    expect(sentBody(2).messages[1].content).toBe("three");
  });
});
