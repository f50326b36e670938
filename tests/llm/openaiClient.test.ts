import { beforeEach, describe, expect, it, vi } from "vitest";

const mockConstructor = vi.fn();
const mockChatCreate = vi.fn();
const mockResponsesCreate = vi.fn();

vi.mock("openai", () => {
  class MockOpenAI {
    readonly chat = {
      completions: {
        create: mockChatCreate
      }
    };
    readonly responses = {
      create: mockResponsesCreate
    };

    constructor(options: unknown) {
      mockConstructor(options);
    }
  }

  return { default: MockOpenAI };
});

import { OpenAiClient } from "../../src/llm/openaiClient";

const createClient = () =>
  new OpenAiClient({ apiKey: "test-secret", baseURL: "http://localhost:8000/v1", model: "test-model" });

describe("OpenAiClient", () => {
  beforeEach(() => {
    mockConstructor.mockReset();
    mockChatCreate.mockReset();
    mockResponsesCreate.mockReset();
  });

  it("creates the SDK client without automatic retries", () => {
    createClient();

    expect(mockConstructor).toHaveBeenCalledWith({
      apiKey: "test-secret",
      baseURL: "http://localhost:8000/v1",
      maxRetries: 0
    });
  });

  it("returns the chat completion text", async () => {
    mockChatCreate.mockResolvedValueOnce({ choices: [{ message: { content: "# Plan" } }] });

    await expect(createClient().complete("Be precise.", "Write the plan.")).resolves.toBe("# Plan");

    expect(mockChatCreate).toHaveBeenCalledWith({
      model: "test-model",
      messages: [
        { role: "system", content: "Be precise." },
        { role: "user", content: "Write the plan." }
      ]
    });
    expect(mockResponsesCreate).not.toHaveBeenCalled();
  });

  it("returns an empty string when the completion has no content", async () => {
    mockChatCreate.mockResolvedValueOnce({ choices: [{ message: { content: null } }] });

    await expect(createClient().complete("Be precise.", "Write the plan.")).resolves.toBe("");
    expect(mockResponsesCreate).not.toHaveBeenCalled();
  });

  it("falls back to the responses endpoint when chat is not found", async () => {
    mockChatCreate.mockRejectedValueOnce({ status: 404, message: "chat endpoint not found" });
    mockResponsesCreate.mockResolvedValueOnce({ output_text: "# Plan from responses" });

    await expect(createClient().complete("Be precise.", "Write the plan.")).resolves.toBe("# Plan from responses");

    expect(mockResponsesCreate).toHaveBeenCalledWith({
      model: "test-model",
      instructions: "Be precise.",
      input: "Write the plan."
    });
  });

  it("rethrows errors that are not a missing endpoint", async () => {
    mockChatCreate.mockRejectedValueOnce(new Error("rate limit exceeded"));

    await expect(createClient().complete("Be precise.", "Write the plan.")).rejects.toThrow("rate limit exceeded");
    expect(mockChatCreate).toHaveBeenCalledTimes(1);
    expect(mockResponsesCreate).not.toHaveBeenCalled();
  });
});
