import { execFile as execFileCb } from "node:child_process";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { CollaboratorTimeoutError, errorMessage } from "../errors.js";
import { ConversionConfig, ConversionOutcome } from "../types.js";
import { withTimeout } from "../utils.js";

const execFile = promisify(execFileCb);

export const TEXT_EXTENSIONS = new Set([".txt", ".md", ".csv", ".tsv", ".json"]);

export interface ConversionResult extends ConversionOutcome {
  /** Markdown/plain text, present unless the conversion failed. */
  text?: string;
}

/** File path in, text or a recorded failure out. Never throws for a bad file. */
export interface DocumentConverter {
  convert(absolutePath: string): Promise<ConversionResult>;
}

/**
 * Text formats are passed through. Everything else goes to the configured
 * external command, which must print Markdown on stdout.
 */
export class CommandDocumentConverter implements DocumentConverter {
  constructor(private readonly config?: ConversionConfig) {}

  async convert(absolutePath: string): Promise<ConversionResult> {
    const extension = path.extname(absolutePath).toLowerCase();
    if (TEXT_EXTENSIONS.has(extension)) {
      return { status: "not_needed", method: "text", text: await readFile(absolutePath, "utf8") };
    }

    const config = this.config;
    if (!config) {
      return {
        status: "failed",
        error: `No converter is configured for ${extension || "files without an extension"}.`
      };
    }

    const method = path.basename(config.command);
    const args = config.args.map((arg) => arg.replaceAll("{input}", absolutePath));
    try {
      const { stdout } = await withTimeout("conversion", config.timeoutMs, (signal) =>
        execFile(config.command, args, { signal, maxBuffer: 64 * 1024 * 1024, encoding: "utf8" })
      );
      const text = stdout.trim();
      if (!text) {
        return { status: "failed", method, error: "Converter produced no text." };
      }
      return { status: "success", method, text: `${text}\n` };
    } catch (error) {
      const reason =
        error instanceof CollaboratorTimeoutError
          ? `Converter exceeded ${config.timeoutMs}ms.`
          : `Converter failed: ${errorMessage(error)}`;
      console.warn("[notebook] document conversion failed", { file: path.basename(absolutePath), reason });
      return { status: "failed", method, error: reason };
    }
  }
}
