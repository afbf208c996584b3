import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { describeError, NotFoundError, PathEscapeError, PermissionError } from "../errors.js";
import { requireProject, Session } from "../session/sessionManager.js";
import { MemoryStore } from "../storage/memoryStore.js";
import { META_DIR } from "../storage/registry.js";
import { ToolRecord, ToolRequest } from "../types.js";
import { clampText } from "../utils.js";
import { ResolvedPath } from "../workspace/pathResolver.js";
import { TEXT_EXTENSIONS } from "./documentConverter.js";
import { LiteratureSearch } from "./literatureSearch.js";

const MAX_TOOL_OUTPUT_CHARS = 12_000;

export interface ToolOutcome {
  record: ToolRecord;
  /** Set when an optional collaborator degraded. */
  notice?: string;
}

function isCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Executes the reasoning step's tool requests. Every path goes through the
 * session's resolver. Escapes and permission failures abort the turn; other
 * failures are reported back to the reasoning step as a failed result.
 */
export class ToolExecutor {
  constructor(
    private readonly store: MemoryStore,
    private readonly literature?: LiteratureSearch
  ) {}

  async run(session: Session, request: ToolRequest): Promise<ToolOutcome> {
    try {
      const output = await this.dispatch(session, request);
      return { record: { ...request, ok: true, output: clampText(output, MAX_TOOL_OUTPUT_CHARS) } };
    } catch (error) {
      if (error instanceof PathEscapeError || error instanceof PermissionError) {
        throw error;
      }
      const message = describeError(error);
      const record: ToolRecord = { ...request, ok: false, output: message };
      if (request.tool === "search_literature") {
        console.warn("[notebook] literature search degraded", { query: request.argument, message });
        return { record, notice: `Literature search failed: ${message}` };
      }
      return { record };
    }
  }

  private async dispatch(session: Session, request: ToolRequest): Promise<string> {
    switch (request.tool) {
      case "list_directory":
        return this.listDirectory(session, request.argument);
      case "read_file":
        return this.readFile(session, request.argument);
      case "read_memory":
        return this.readMemory(session, request.argument);
      case "search_literature":
        return this.searchLiterature(request.argument);
      case "describe_file":
        return this.describeFile(session, request.argument, request.summary);
    }
  }

  private async listDirectory(session: Session, ref: string): Promise<string> {
    const binding = requireProject(session);
    const folder = ref ? await binding.resolver.resolve(ref) : binding.location;
    const entries = await readdir(folder.absolute, { withFileTypes: true }).catch((error: unknown) => {
      if (isCode(error, "ENOENT") || isCode(error, "ENOTDIR")) {
        throw new NotFoundError("folder", ref || folder.toString());
      }
      throw error;
    });
    const lines = entries
      .filter((entry) => entry.name !== META_DIR)
      .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
      .sort((a, b) => a.localeCompare(b));
    return [`Contents of ${folder.toString()}:`, ...(lines.length > 0 ? lines.map((line) => `- ${line}`) : ["(empty)"])].join(
      "\n"
    );
  }

  /** Prefers the converted text of a registered upload. */
  private async readFile(session: Session, ref: string): Promise<string> {
    const binding = requireProject(session);
    const file = await binding.resolver.resolve(ref);
    const converted = await this.convertedFor(session, file);
    if (converted) {
      return readFile(converted.absolute, "utf8");
    }

    try {
      const info = await stat(file.absolute);
      if (info.isDirectory()) {
        throw new NotFoundError("file", ref);
      }
    } catch (error) {
      if (isCode(error, "ENOENT") || isCode(error, "ENOTDIR")) {
        throw new NotFoundError("file", ref);
      }
      throw error;
    }

    if (!TEXT_EXTENSIONS.has(path.extname(file.absolute).toLowerCase())) {
      return `${file.toString()} is a binary file with no converted text.`;
    }
    return readFile(file.absolute, "utf8");
  }

  private async convertedFor(session: Session, file: ResolvedPath): Promise<ResolvedPath | null> {
    const binding = requireProject(session);
    const [top, ...rest] = file.relative.split("/");
    const handle = (await binding.experiments.list()).find((candidate) => candidate.name === top);
    if (!handle) {
      return null;
    }
    const entries = await this.store.listFiles(handle);
    const entry = entries.find((candidate) => candidate.originalPath === rest.join("/"));
    if (!entry?.convertedPath || entry.stale) {
      return null;
    }
    return binding.resolver.child(handle.dir, entry.convertedPath);
  }

  /** Stores the reasoning step's description of an upload in its registry entry. */
  private async describeFile(session: Session, ref: string, summary: string | undefined): Promise<string> {
    const text = summary?.trim();
    if (!text) {
      throw new Error("describe_file needs a summary");
    }
    const binding = requireProject(session);
    const file = await binding.resolver.resolve(ref);
    const [top, ...rest] = file.relative.split("/");
    const inner = rest.join("/");
    const handle = (await binding.experiments.list()).find((candidate) => candidate.name === top);
    const entry = handle
      ? (await this.store.listFiles(handle)).find(
          (candidate) => candidate.originalPath === inner || candidate.convertedPath === inner
        )
      : undefined;
    if (!handle || !entry) {
      throw new NotFoundError("file", ref);
    }
    await this.store.updateFileSummary(handle, entry.originalName, text);
    return `Recorded the description of ${file.toString()}.`;
  }

  private async readMemory(session: Session, ref: string): Promise<string> {
    const binding = requireProject(session);
    const handle = ref ? await binding.experiments.resolve(ref) : binding.experiment;
    if (!handle) {
      throw new NotFoundError(
        "experiment",
        "(current)",
        (await binding.experiments.list()).map((candidate) => candidate.name)
      );
    }
    const snapshot = await this.store.read(handle);
    return snapshot.text.trim() ? snapshot.text : `The memory of ${handle.name} is empty.`;
  }

  private async searchLiterature(query: string): Promise<string> {
    if (!this.literature) {
      throw new Error("literature search is not configured");
    }
    if (!query.trim()) {
      throw new Error("empty search query");
    }
    const hits = await this.literature.search(query);
    if (hits.length === 0) {
      return `No results found for: ${query}`;
    }
    return hits
      .map((hit, index) => [`${index + 1}. ${hit.title}`, `   ${hit.url}`, hit.snippet ? `   ${hit.snippet}` : undefined])
      .flat()
      .filter((line): line is string => line !== undefined)
      .join("\n");
  }
}
