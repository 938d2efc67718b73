import { z } from "zod";
import type { ChatMessage } from "./types.ts";

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/** Anything that can answer a chat-style request with plain text. */
export interface ChatClient {
  chat(input: ChatRequest): Promise<string>;
}

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

const errorResponseSchema = z.object({ error: z.string() });

export function buildOllamaHeaders(): Record<string, string> {
  return {
    "Content-Type": "application/json",
    Accept: "application/json",
  };
}

/** Client for a local Ollama runtime (`/api/chat`, non-streaming). */
export class OllamaClient implements ChatClient {
  constructor(private readonly baseUrl = "http://localhost:11434") {}

  async chat(input: ChatRequest): Promise<string> {
    const res = await fetch(`${this.baseUrl.replace(/\/+$/, "")}/api/chat`, {
      method: "POST",
      headers: buildOllamaHeaders(),
      signal: input.signal,
      body: JSON.stringify({
        model: input.model,
        messages: input.messages,
        stream: false,
        options: {
          temperature: input.temperature ?? 0.1,
          ...(input.maxTokens ? { num_predict: input.maxTokens } : {}),
        },
      }),
    });

    const raw = await res.text();
    const data: unknown = raw ? JSON.parse(raw) : {};

    if (!res.ok) {
      const parsedError = errorResponseSchema.safeParse(data);
      const msg = parsedError.success ? parsedError.data.error : `Ollama error ${res.status}`;
      throw new Error(`LLM generation failed: ${msg}`);
    }

    const parsed = chatResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error("LLM generation failed: response has no message content");
    }
    return parsed.data.message.content;
  }

  /** True when the runtime answers its model listing. */
  async ping(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl.replace(/\/+$/, "")}/api/tags`, { headers: buildOllamaHeaders() });
      return res.ok;
    } catch (error) {
      console.warn(`[ollama] Could not reach ${this.baseUrl}: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
