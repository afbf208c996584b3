import { extractJsonObject } from "../utils.js";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/** The reasoning step: plain text in, plain text out. */
export interface ModelClient {
  completeText(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
}

export class JsonResponseParseError extends Error {
  readonly rawResponse: string;

  constructor(message: string, rawResponse: string) {
    super(message);
    this.name = "JsonResponseParseError";
    this.rawResponse = rawResponse;
  }
}

export async function completeJson(
  client: ModelClient,
  messages: ChatMessage[],
  options?: CompletionOptions
): Promise<unknown> {
  const text = await client.completeText(messages, options);
  try {
    return JSON.parse(extractJsonObject(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new JsonResponseParseError(`Failed to parse model JSON response: ${message}`, text);
  }
}
