/**
 * Validation Suite: anthropic provider
 * Request shape and response mapping against a mocked SDK client.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock the SDK client
const mockCreate = vi.fn();
const mockConstructor = vi.fn();
vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: mockCreate };
    constructor(options: unknown) {
      mockConstructor(options);
    }
  },
}));

// Import after mocking
const { AnthropicProvider } = await import("./anthropic.js");

function message(texts: string[]) {
  return {
    model: "claude-test",
    content: texts.map((text) => ({ type: "text", text })),
    usage: { input_tokens: 120, output_tokens: 30 },
  };
}

describe("AnthropicProvider", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should create the client with the API key", () => {
    new AnthropicProvider("test-secret", "claude-test");

    expect(mockConstructor).toHaveBeenCalledWith({ apiKey: "test-secret" });
  });

  it("should send a text request with the system prompt", async () => {
    mockCreate.mockResolvedValue(message(['{"products": []}']));
    const provider = new AnthropicProvider("test-secret", "claude-test");

    const response = await provider.text("be precise", "extract", {
      temperature: 0,
      maxTokens: 4000,
    });

    expect(mockCreate).toHaveBeenCalledWith({
      model: "claude-test",
      max_tokens: 4000,
      temperature: 0,
      system: "be precise",
      messages: [
        { role: "user", content: [{ type: "text", text: "extract" }] },
      ],
    });
    expect(response).toEqual({
      content: '{"products": []}',
      model: "claude-test",
      usage: { promptTokens: 120, completionTokens: 30, totalTokens: 150 },
    });
  });

  it("should put the text before the images, in page order", async () => {
    mockCreate.mockResolvedValue(message(["{}"]));
    const provider = new AnthropicProvider("test-secret", "claude-test");

    await provider.vision(
      "judge",
      "CANDIDATES_JSON:\n[]",
      [
        { pageNumber: 0, mediaType: "image/png", base64: "AAA" },
        { pageNumber: 1, mediaType: "image/jpeg", base64: "BBB" },
      ],
      { model: "claude-vision", maxTokens: 1800 },
    );

    const request = mockCreate.mock.calls[0][0];
    expect(request.model).toBe("claude-vision");
    expect(request.max_tokens).toBe(1800);
    expect(request.messages[0].content).toEqual([
      { type: "text", text: "CANDIDATES_JSON:\n[]" },
      {
        type: "image",
        source: { type: "base64", media_type: "image/png", data: "AAA" },
      },
      {
        type: "image",
        source: { type: "base64", media_type: "image/jpeg", data: "BBB" },
      },
    ]);
  });

  it("should join all text blocks and skip other block types", async () => {
    mockCreate.mockResolvedValue({
      model: "claude-test",
      content: [
        { type: "text", text: '{"selected_ids": ' },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: "[0]}" },
      ],
      usage: { input_tokens: 1, output_tokens: 1 },
    });
    const provider = new AnthropicProvider("test-secret", "claude-test");

    const response = await provider.text("s", "u");

    expect(response.content).toBe('{"selected_ids": [0]}');
  });

  it("should reject media types the API does not accept", async () => {
    const provider = new AnthropicProvider("test-secret", "claude-test");

    await expect(
      provider.vision("s", "u", [
        { pageNumber: 3, mediaType: "image/tiff", base64: "AAA" },
      ]),
    ).rejects.toThrow("Unsupported image media type for page 3: image/tiff");
    expect(mockCreate).not.toHaveBeenCalled();
  });
});
