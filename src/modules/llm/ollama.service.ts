import fetch, { RequestInit, Response } from "node-fetch";
import { OllamaSettings } from "../config/service.config";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Thin client over the Ollama HTTP API. Errors carry the response body so
 * callers can log what the server said.
 */
export class OllamaClient {
  constructor(
    private readonly settings: OllamaSettings,
    private readonly fetchFn: FetchLike = fetch
  ) {}

  get judgeModel(): string {
    return this.settings.judgeModel;
  }

  async generate(prompt: string, modelName?: string): Promise<string> {
    const model = modelName ?? this.settings.model;

    const response = await this.fetchFn(`${this.settings.baseUrl}/api/generate`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model,
        prompt,
        stream: false,
      }),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Ollama error: ${text}`);
    }

    const data = (await response.json()) as { response?: string };

    if (!data.response) {
      throw new Error("Ollama returned an empty response.");
    }

    return data.response;
  }

  async embed(text: string): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new Error("Text cannot be empty");
    }

    const response = await this.fetchFn(`${this.settings.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.settings.embeddingModel,
        prompt: text,
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Ollama embedding error: ${body}`);
    }

    const data = (await response.json()) as { embedding?: number[] };

    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama returned an empty embedding.");
    }

    return data.embedding;
  }
}
