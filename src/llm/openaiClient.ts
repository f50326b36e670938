import OpenAI from "openai";
import { config } from "../config";

export interface OpenAiClientOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
}

export class OpenAiClient {
  private readonly client: OpenAI;
  readonly model: string;

  constructor(options: OpenAiClientOptions = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey ?? config.openaiApiKey,
      baseURL: options.baseURL ?? config.openaiBaseUrl,
      maxRetries: 0
    });
    this.model = options.model ?? config.model;
  }

  private static isNotFoundError(error: unknown): boolean {
    if (typeof error !== "object" || error === null) return false;
    if ("status" in error && error.status === 404) return true;
    const message = error instanceof Error ? error.message : String(error);
    return /not found/i.test(message);
  }

  private async completeWithChat(system: string, user: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user }
      ]
    });

    return response.choices[0]?.message?.content ?? "";
  }

  private async completeWithResponses(system: string, user: string): Promise<string> {
    const response = await this.client.responses.create({
      model: this.model,
      instructions: system,
      input: user
    });

    return response.output_text;
  }

  // Some OpenAI-compatible providers only expose one of the two endpoints.
  // Output is returned raw, empty included; callers decide what to keep.
  async complete(system: string, user: string): Promise<string> {
    try {
      return await this.completeWithChat(system, user);
    } catch (error: unknown) {
      if (!OpenAiClient.isNotFoundError(error)) {
        throw error;
      }
    }

    return this.completeWithResponses(system, user);
  }
}
