import { createHash, randomUUID } from "node:crypto";
import { rename, writeFile } from "node:fs/promises";
import { CollaboratorTimeoutError, type Collaborator } from "./errors.js";

export function nowIso(): string {
  return new Date().toISOString();
}

export function toJsonString(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function makeId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}

export function sha256(content: string | Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}

export function slugify(input: string, maxLength = 60): string {
  const slug = input
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^[_-]+|[_-]+$/g, "")
    .slice(0, maxLength)
    .replace(/[_-]+$/g, "");
  return slug;
}

export function clampText(input: string, maxChars: number): string {
  if (input.length <= maxChars) {
    return input;
  }
  return `${input.slice(0, maxChars)}\n…[truncated ${input.length - maxChars} chars]`;
}

export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  const tmp = `${filePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  await writeFile(tmp, content);
  await rename(tmp, filePath);
}

export async function withTimeout<T>(
  collaborator: Collaborator,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles with the timeout, not the abort.
      reject(new CollaboratorTimeoutError(collaborator, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export function extractJsonObject(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new Error("Model response was empty.");
  }

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidates = fenced?.[1] ? [fenced[1].trim(), trimmed] : [trimmed];

  for (const candidate of candidates) {
    for (const start of objectStarts(candidate)) {
      const balanced = scanBalancedObject(candidate, start);
      if (!balanced) {
        continue;
      }
      if (parses(balanced)) {
        return balanced;
      }
      const sanitized = escapeControlCharsInStrings(balanced);
      if (parses(sanitized)) {
        return sanitized;
      }
    }
  }

  throw new Error("Model response did not contain parseable JSON object.");
}

function objectStarts(input: string): number[] {
  const starts: number[] = [];
  for (let i = 0; i < input.length; i += 1) {
    if (input[i] === "{") {
      starts.push(i);
    }
  }
  return starts;
}

function parses(candidate: string): boolean {
  try {
    JSON.parse(candidate);
    return true;
  } catch {
    return false;
  }
}

function scanBalancedObject(input: string, start: number): string | null {
  let depth = 0;
  let inString = false;
  let escaping = false;

  for (let i = start; i < input.length; i += 1) {
    const ch = input[i];

    if (inString) {
      if (escaping) {
        escaping = false;
      } else if (ch === "\\") {
        escaping = true;
      } else if (ch === "\"") {
        inString = false;
      }
      continue;
    }

    if (ch === "\"") {
      inString = true;
    } else if (ch === "{") {
      depth += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        return input.slice(start, i + 1);
      }
    }
  }

  return null;
}

// Models often emit raw newlines inside JSON string values.
function escapeControlCharsInStrings(input: string): string {
  const replacements: Record<string, string> = { "\n": "\\n", "\r": "\\r", "\t": "\\t" };
  let out = "";
  let inString = false;
  let escaping = false;

  for (const ch of input) {
    if (!inString) {
      out += ch;
      inString = ch === "\"";
      continue;
    }
    if (escaping) {
      out += ch;
      escaping = false;
      continue;
    }
    if (ch === "\\") {
      escaping = true;
    } else if (ch === "\"") {
      inString = false;
    }
    out += replacements[ch] ?? ch;
  }

  return out;
}
