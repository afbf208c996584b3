import { z } from "zod";
import { ChatMessage } from "../models/modelClient.js";
import { ContextBundle, ContextSelection, ExperimentSummary, StepDecision, ToolRecord } from "../types.js";

const TOOL_NAMES = ["list_directory", "read_file", "read_memory", "search_literature", "describe_file"] as const;

const NOTEBOOK_ROLE = [
  "You are the assistant of a wet-lab notebook.",
  "Each experiment folder has a README.md that is the authoritative memory of that experiment.",
  "The memory is free text in any structure and any language. Read it as a whole; never assume fixed headings.",
  "Reply in the language the user writes in."
].join("\n");

export function buildExtractPrompt(documentText: string, question: string): ChatMessage[] {
  return [
    { role: "system", content: NOTEBOOK_ROLE },
    {
      role: "user",
      content: [
        "Answer the question using only the experiment memory below.",
        "If the memory does not contain the answer, say plainly that it is not recorded. Do not estimate or invent values.",
        "",
        "Question:",
        question,
        "",
        "Experiment memory:",
        documentText.trim() || "(empty: nothing has been recorded yet)"
      ].join("\n")
    }
  ];
}

export function buildProposeUpdatePrompt(documentText: string, information: string): ChatMessage[] {
  return [
    { role: "system", content: NOTEBOOK_ROLE },
    {
      role: "user",
      content: [
        "Merge the new information into the experiment memory and return the complete updated document.",
        "",
        "Rules:",
        "- Keep every existing passage that the new information does not concern, word for word.",
        "- When the new information corrects a fact, state the corrected value where the old one was. The old value must no longer read as current.",
        "- Do not touch the \"## Change History\" section; it is maintained separately.",
        "- Keep the document's own structure and language. Add new sections only when nothing existing fits.",
        "- Output only the document text. No commentary, no code fences.",
        "",
        "New information:",
        information,
        "",
        "Current document:",
        documentText.trim() || "(empty document)"
      ].join("\n")
    }
  ];
}

export function buildContextSelectionPrompt(
  message: string,
  currentExperiment: string | undefined,
  experiments: ExperimentSummary[]
): ChatMessage[] {
  return [
    { role: "system", content: NOTEBOOK_ROLE },
    {
      role: "user",
      content: [
        "Decide which experiment memories are needed to handle the user's message.",
        `Current experiment: ${currentExperiment ?? "(none selected)"}`,
        "",
        "Experiments in this project:",
        ...(experiments.length > 0
          ? experiments.map((experiment) => `- ${experiment.name}: ${experiment.statusSummary}`)
          : ["- (none)"]),
        "",
        "User message:",
        message,
        "",
        "Set includeSiblings to true when the message needs an overview of other experiments.",
        "List in experiments every experiment other than the current one whose full memory is needed, e.g. to compare.",
        "",
        "Output MUST be valid JSON only. No markdown.",
        'Schema: {"includeSiblings":false,"experiments":["name"]}'
      ].join("\n")
    }
  ];
}

export function renderContextBundle(bundle: ContextBundle): string {
  const lines: string[] = [`Project: ${bundle.project.name}`, `Current folder: ${bundle.location}`];

  if (bundle.current) {
    lines.push(
      "",
      `Current experiment: ${bundle.current.name}`,
      bundle.current.memoryAvailable ? "Memory (README.md):" : "Memory: UNAVAILABLE for this turn.",
      bundle.current.memory.trim() || "(empty: nothing recorded yet)"
    );
  } else {
    lines.push("", "Current experiment: (none selected)");
  }

  for (const other of bundle.referenced) {
    lines.push("", `Memory of experiment ${other.name}:`, other.memory.trim() || "(empty: nothing recorded yet)");
  }

  if (bundle.siblings.length > 0) {
    lines.push("", "Other experiments:");
    lines.push(...bundle.siblings.map((sibling) => `- ${sibling.name} (${sibling.fileCount} files): ${sibling.statusSummary}`));
  }

  if (bundle.selectedFiles.length > 0) {
    lines.push("", "Selected files:");
    for (const file of bundle.selectedFiles) {
      if (!file.entry) {
        lines.push(`- ${file.path} (not registered)`);
        continue;
      }
      const parts = [
        `conversion ${file.entry.conversion.status}`,
        file.entry.convertedPath ? `text at ${file.entry.convertedPath}` : undefined,
        file.entry.stale ? "STALE: file missing on disk" : undefined,
        file.entry.summary ? `summary: ${file.entry.summary}` : undefined
      ].filter((part): part is string => part !== undefined);
      lines.push(`- ${file.path}: ${parts.join("; ")}`);
    }
  }

  if (bundle.notices.length > 0) {
    lines.push("", "Notices:", ...bundle.notices.map((notice) => `- ${notice}`));
  }
  return lines.join("\n");
}

function renderToolRecord(record: ToolRecord, index: number): string {
  return [
    `#${index + 1} ${record.tool}(${JSON.stringify(record.argument)}) -> ${record.ok ? "ok" : "failed"}`,
    record.output
  ].join("\n");
}

export interface StepPromptInput {
  bundle: ContextBundle;
  message: string;
  toolResults: ToolRecord[];
  toolsAvailable: boolean;
}

export function buildStepPrompt(input: StepPromptInput): ChatMessage[] {
  const history = input.bundle.history.map(
    (turn): ChatMessage => ({ role: turn.role, content: turn.content })
  );

  const instructions = [
    "Context:",
    renderContextBundle(input.bundle),
    "",
    "Rules:",
    "- Base every factual statement on the memory, files or tool results shown. Never invent measurements.",
    "- If the answer is not recorded anywhere you can see, say explicitly that it was not found in the notebook.",
    "- Set memoryUpdate only when the user states new facts or corrects recorded ones about the current experiment. Describe the change in one or two plain sentences.",
    "- Never set memoryUpdate when there is no current experiment.",
    ""
  ];

  if (input.toolsAvailable) {
    instructions.push(
      "Tools (paths are relative to the project root):",
      "- list_directory: argument is a folder path, \".\" for the project root.",
      "- read_file: argument is a file path. Converted text is returned for registered uploads.",
      "- read_memory: argument is an experiment name; returns its README.md.",
      "- search_literature: argument is a search query.",
      "- describe_file: argument is the path of an uploaded file, summary is what it contains (one or two sentences). Use it after reading a file whose description is missing or wrong.",
      "",
      "Take exactly one action: request one tool, or give the final answer.",
      "Output MUST be valid JSON only. No markdown.",
      "Schemas:",
      '{"action":"tool","tool":"read_file","argument":"exp_a/originals/data.csv"}',
      '{"action":"tool","tool":"describe_file","argument":"exp_a/originals/data.csv","summary":"..."}',
      '{"action":"answer","answer":"...","memoryUpdate":"optional"}'
    );
  } else {
    instructions.push(
      "No more tools are available. Give the final answer now.",
      "Output MUST be valid JSON only. No markdown.",
      'Schema: {"action":"answer","answer":"...","memoryUpdate":"optional"}'
    );
  }

  if (input.toolResults.length > 0) {
    instructions.push("", "Tool results so far:", ...input.toolResults.map(renderToolRecord));
  }

  instructions.push("", "User message:", input.message);

  return [
    { role: "system", content: NOTEBOOK_ROLE },
    ...history,
    { role: "user", content: instructions.join("\n") }
  ];
}

const selectionSchema = z.object({
  includeSiblings: z.boolean().default(false),
  experiments: z.array(z.string()).default([])
});

/** Unknown names are dropped; matching is by exact name or id. */
export function normalizeContextSelection(
  value: unknown,
  experiments: ExperimentSummary[]
): ContextSelection | null {
  const parsed = selectionSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const names = parsed.data.experiments
    .map((ref) => ref.trim())
    .map((ref) => experiments.find((experiment) => experiment.name === ref || experiment.id === ref)?.name)
    .filter((name): name is string => name !== undefined);
  return {
    includeSiblings: parsed.data.includeSiblings,
    experiments: [...new Set(names)]
  };
}

const toolStepSchema = z.object({
  action: z.literal("tool").optional(),
  tool: z.enum(TOOL_NAMES),
  argument: z.string().default(""),
  summary: z.string().optional()
});

const answerStepSchema = z.object({
  action: z.literal("answer").optional(),
  answer: z.string(),
  memoryUpdate: z.string().nullish()
});

/** `null` when the value matches neither shape. */
export function normalizeStepDecision(value: unknown): StepDecision | null {
  const tool = toolStepSchema.safeParse(value);
  if (tool.success) {
    const summary = tool.data.summary?.trim();
    return {
      kind: "tool",
      request: { tool: tool.data.tool, argument: tool.data.argument.trim(), ...(summary ? { summary } : {}) }
    };
  }
  const answer = answerStepSchema.safeParse(value);
  if (answer.success) {
    const memoryUpdate = answer.data.memoryUpdate?.trim();
    return {
      kind: "answer",
      answer: answer.data.answer.trim(),
      memoryUpdate: memoryUpdate ? memoryUpdate : undefined
    };
  }
  return null;
}

/** Strips one wrapping code fence, if the whole reply is fenced. */
export function unwrapDocument(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```[\w-]*\n([\s\S]*?)\n?```$/);
  return fenced?.[1] !== undefined ? fenced[1].trim() : trimmed;
}
