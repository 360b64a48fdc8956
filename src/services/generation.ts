// src/services/generation.ts
// Generation service: chat completions against an OpenAI-compatible endpoint (Groq by default).
//
// Env:
//   COACH_LLM_API_KEY or GROQ_API_KEY   (required)
//   COACH_LLM_BASE_URL                   (default: generation.base_url in config/digest.yaml)
//   COACH_LLM_MODEL                      (default: generation.model)

import OpenAI from "openai";
import type { ChatMessage } from "../domain/types.js";
import { digestNumber, digestString, envOr } from "./config.js";
import { debug } from "./log.js";
import { withTimeout } from "./timeout.js";

const log = debug("coach:generation");

export interface GenerationService {
  complete(messages: ChatMessage[], maxOutputTokens: number, temperature: number): Promise<string>;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
}

export interface ChatCompletionReply {
  choices: Array<{ message: { content: string | null } }>;
}

export type ChatCompleter = (req: ChatCompletionRequest) => Promise<ChatCompletionReply>;

export function openAICompleter(client: OpenAI): ChatCompleter {
  return (req) => client.chat.completions.create(req);
}

export class ChatGenerationService implements GenerationService {
  constructor(
    private readonly completer: ChatCompleter,
    private readonly model: string,
    private readonly timeoutMs: number
  ) {}

  async complete(messages: ChatMessage[], maxOutputTokens: number, temperature: number): Promise<string> {
    const started = Date.now();
    const reply = await withTimeout(
      this.completer({ model: this.model, messages, max_tokens: maxOutputTokens, temperature }),
      this.timeoutMs,
      `generation (${this.model})`
    );
    const text = (reply.choices[0]?.message.content ?? "").trim();
    log("complete", { model: this.model, maxOutputTokens, temperature, tookMs: Date.now() - started, chars: text.length });
    return text;
  }
}

export function createGenerationService(): GenerationService {
  const apiKey = process.env.COACH_LLM_API_KEY || process.env.GROQ_API_KEY;
  if (!apiKey) {
    throw new Error("GROQ_API_KEY (or COACH_LLM_API_KEY) must be set in environment");
  }
  const timeoutMs = digestNumber("generation.timeout_ms", 30000);
  const client = new OpenAI({
    apiKey,
    baseURL: envOr("COACH_LLM_BASE_URL", digestString("generation.base_url", "https://api.groq.com/openai/v1")),
    timeout: timeoutMs,
    maxRetries: digestNumber("generation.max_retries", 2)
  });
  const model = envOr("COACH_LLM_MODEL", digestString("generation.model", "qwen/qwen3-32b"));
  return new ChatGenerationService(openAICompleter(client), model, timeoutMs);
}
