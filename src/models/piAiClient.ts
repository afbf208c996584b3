import {
  complete,
  type Api,
  type AssistantMessage,
  type Context,
  type Message,
  type Model
} from "@mariozechner/pi-ai";
import { resolveModelCredential } from "../auth/credentials.js";
import { ModelConfig } from "../types.js";
import { ChatMessage, CompletionOptions, ModelClient } from "./modelClient.js";

const NO_COST = { input: 0, output: 0, cacheRead: 0, cacheWrite: 0 };

interface ApiDefaults {
  api: Api;
  baseUrl: string;
}

const PROVIDER_DEFAULTS: Record<string, ApiDefaults> = {
  anthropic: { api: "anthropic-messages", baseUrl: "https://api.anthropic.com" },
  "openai-codex": { api: "openai-codex-responses", baseUrl: "https://chatgpt.com/backend-api" }
};

const FALLBACK_DEFAULTS: ApiDefaults = { api: "openai-completions", baseUrl: "https://api.openai.com/v1" };

export function describeModel(config: ModelConfig): Model<Api> {
  const defaults = PROVIDER_DEFAULTS[config.provider] ?? FALLBACK_DEFAULTS;
  const api = config.api ? (config.api as Api) : defaults.api;
  // An explicit api without a baseUrl targets that api's usual host.
  const baseUrl =
    config.baseUrl ??
    (Object.values(PROVIDER_DEFAULTS).find((entry) => entry.api === api) ?? FALLBACK_DEFAULTS).baseUrl;
  return {
    id: config.model,
    name: config.model,
    api,
    provider: config.provider,
    baseUrl,
    reasoning: false,
    input: ["text"],
    cost: NO_COST,
    contextWindow: 200_000,
    maxTokens: config.maxTokens ?? 4096,
    headers: config.headers
  };
}

/**
 * Maps the notebook's flat message list onto a pi-ai context. System turns
 * (protocol instructions, assembled experiment context) are merged into the
 * system prompt; earlier assistant turns are replayed as text-only replies.
 */
export function toContext(messages: ChatMessage[], model: Model<Api>, at = Date.now()): Context {
  const system = messages
    .filter((message) => message.role === "system")
    .map((message) => message.content.trim())
    .filter(Boolean)
    .join("\n\n");

  const turns = messages.filter((message) => message.role !== "system");
  const history = turns.map((message, index): Message => {
    const timestamp = at + index;
    if (message.role === "user") {
      return { role: "user", content: message.content, timestamp };
    }
    return {
      role: "assistant",
      content: [{ type: "text", text: message.content }],
      api: model.api,
      provider: model.provider,
      model: model.id,
      usage: { ...NO_COST, totalTokens: 0, cost: { ...NO_COST, total: 0 } },
      stopReason: "stop",
      timestamp
    };
  });

  return { systemPrompt: system || undefined, messages: history };
}

export function replyText(message: AssistantMessage): string {
  if (message.stopReason === "error" || message.stopReason === "aborted") {
    throw new Error(message.errorMessage ?? `model stopped with ${message.stopReason}`);
  }
  const text = message.content
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("")
    .trim();
  if (!text) {
    throw new Error(`model reply contained no text (stopReason=${message.stopReason})`);
  }
  return text;
}

/** Reasoning model behind the notebook, reached through pi-ai's provider adapters. */
export class PiAiClient implements ModelClient {
  readonly model: Model<Api>;

  constructor(private readonly config: ModelConfig) {
    this.model = describeModel(config);
  }

  async completeText(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
    const apiKey = await resolveModelCredential(this.config);
    const reply = await complete(this.model, toContext(messages, this.model), {
      apiKey,
      temperature: options?.temperature ?? this.config.temperature,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      signal: options?.signal,
      headers: this.config.headers
    });
    return replyText(reply);
  }
}
