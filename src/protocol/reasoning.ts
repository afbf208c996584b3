import {
  CollaboratorFailureError,
  CollaboratorTimeoutError,
  errorMessage
} from "../errors.js";
import { ChatMessage, completeJson, JsonResponseParseError, ModelClient } from "../models/modelClient.js";
import { ContextBundle, ContextSelection, ExperimentSummary, StepDecision, ToolRecord } from "../types.js";
import { clampText, extractJsonObject, withTimeout } from "../utils.js";
import {
  buildContextSelectionPrompt,
  buildExtractPrompt,
  buildProposeUpdatePrompt,
  buildStepPrompt,
  normalizeContextSelection,
  normalizeStepDecision,
  unwrapDocument
} from "./prompts.js";

export interface ReasoningOptions {
  timeoutMs: number;
}

export interface StepInput {
  bundle: ContextBundle;
  message: string;
  toolResults: ToolRecord[];
  toolsAvailable: boolean;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(extractJsonObject(text));
  } catch {
    return undefined;
  }
}

function asCollaboratorError(error: unknown): Error {
  if (error instanceof CollaboratorTimeoutError || error instanceof CollaboratorFailureError) {
    return error;
  }
  if (error instanceof JsonResponseParseError) {
    return new CollaboratorFailureError("reasoning", `${error.message} (reply: ${clampText(error.rawResponse, 200)})`, {
      cause: error
    });
  }
  return new CollaboratorFailureError("reasoning", errorMessage(error), { cause: error });
}

/**
 * Text-in/text-out contract with the reasoning step. Every call is bounded by
 * `timeoutMs`; anything other than a timeout surfaces as
 * {@link CollaboratorFailureError}.
 */
export class ReasoningProtocol {
  constructor(
    private readonly client: ModelClient,
    private readonly options: ReasoningOptions
  ) {}

  async extract(documentText: string, question: string): Promise<string> {
    const answer = await this.complete(buildExtractPrompt(documentText, question));
    return answer.trim();
  }

  /** Returns a complete replacement document. */
  async proposeUpdate(documentText: string, information: string): Promise<string> {
    const text = unwrapDocument(await this.complete(buildProposeUpdatePrompt(documentText, information)));
    if (!text) {
      throw new CollaboratorFailureError("reasoning", "proposed memory document was empty");
    }
    return `${text}\n`;
  }

  async selectContext(
    message: string,
    currentExperiment: string | undefined,
    experiments: ExperimentSummary[]
  ): Promise<ContextSelection> {
    const value = await this.completeStructured(
      buildContextSelectionPrompt(message, currentExperiment, experiments)
    );
    const selection = normalizeContextSelection(value, experiments);
    if (!selection) {
      throw new CollaboratorFailureError("reasoning", "context selection reply did not match the expected JSON");
    }
    return selection;
  }

  /**
   * One step of the tool loop. A reply with no JSON object in it is taken as
   * the final answer in prose.
   */
  async step(input: StepInput): Promise<StepDecision> {
    const text = await this.complete(buildStepPrompt(input));
    const parsed = tryParseJson(text);
    const decision: StepDecision | null =
      parsed === undefined ? { kind: "answer", answer: text.trim() } : normalizeStepDecision(parsed);
    if (!decision) {
      throw new CollaboratorFailureError("reasoning", `unrecognized step reply: ${clampText(text.trim(), 200)}`);
    }

    if (decision.kind === "tool" && !input.toolsAvailable) {
      throw new CollaboratorFailureError("reasoning", "requested a tool after the tool budget was spent");
    }
    if (decision.kind === "answer" && !decision.answer) {
      throw new CollaboratorFailureError("reasoning", "final answer was blank");
    }
    return decision;
  }

  private async completeStructured(messages: ChatMessage[]): Promise<unknown> {
    try {
      return await withTimeout("reasoning", this.options.timeoutMs, (signal) =>
        completeJson(this.client, messages, { signal })
      );
    } catch (error) {
      throw asCollaboratorError(error);
    }
  }

  private async complete(messages: ChatMessage[]): Promise<string> {
    let text: string;
    try {
      text = await withTimeout("reasoning", this.options.timeoutMs, (signal) =>
        this.client.completeText(messages, { signal })
      );
    } catch (error) {
      throw asCollaboratorError(error);
    }
    if (!text.trim()) {
      throw new CollaboratorFailureError("reasoning", "empty response");
    }
    return text;
  }
}
