import { mkdir } from "node:fs/promises";
import path from "node:path";
import { CommandDocumentConverter, DocumentConverter } from "../agent/documentConverter.js";
import { ExaLiteratureSearch, LiteratureSearch } from "../agent/literatureSearch.js";
import { ToolExecutor } from "../agent/tools.js";
import { ContextBuilder } from "../context/contextBuilder.js";
import { describeError, PathEscapeError, PermissionError } from "../errors.js";
import { ModelClient } from "../models/modelClient.js";
import { ReasoningProtocol } from "../protocol/reasoning.js";
import { BoundProject, requireExperiment, requireProject, Session, SessionManager } from "../session/sessionManager.js";
import { ExperimentHandle } from "../storage/experimentCatalog.js";
import { MemoryStore, MemoryWriteResult } from "../storage/memoryStore.js";
import { CONVERTED_DIR, META_DIR, ORIGINALS_DIR } from "../storage/registry.js";
import {
  ConversionOutcome,
  ExperimentSummary,
  LabbookConfig,
  Permission,
  RegistryEntry,
  RegistryEntryView,
  ToolRecord
} from "../types.js";
import { writeFileAtomic } from "../utils.js";
import { ResolvedPath } from "../workspace/pathResolver.js";
import { ProjectCatalog } from "../workspace/projectCatalog.js";

export interface MemoryChange extends MemoryWriteResult {
  information: string;
}

export interface AskResult {
  answer: string;
  toolCalls: ToolRecord[];
  memoryUpdate?: MemoryChange;
  notices: string[];
}

export interface UploadResult {
  entry: RegistryEntry;
  conversion: ConversionOutcome;
  notices: string[];
}

export interface NotebookServices {
  config: LabbookConfig;
  projects: ProjectCatalog;
  sessions: SessionManager;
  store: MemoryStore;
  reasoning: ReasoningProtocol;
  context: ContextBuilder;
  tools: ToolExecutor;
  converter: DocumentConverter;
}

export interface NotebookOverrides {
  literature?: LiteratureSearch;
  converter?: DocumentConverter;
}

const MANAGE: Permission[] = ["owner", "admin"];

function requirePermission(binding: BoundProject, action: string, allowed: Permission[]): void {
  if (!allowed.includes(binding.permission)) {
    throw new PermissionError(action, allowed, binding.permission);
  }
}

/**
 * Wires the notebook from config. One instance per process: the memory store
 * inside it holds the per-experiment write queues.
 */
export function createNotebook(
  config: LabbookConfig,
  client: ModelClient,
  overrides: NotebookOverrides = {}
): Notebook {
  const projects = new ProjectCatalog(config);
  const store = new MemoryStore(config.memory);
  const reasoning = new ReasoningProtocol(client, { timeoutMs: config.reasoning.timeoutMs });
  const literature =
    overrides.literature ?? (config.literature ? new ExaLiteratureSearch(config.literature) : undefined);
  return new Notebook({
    config,
    projects,
    sessions: new SessionManager(projects),
    store,
    reasoning,
    context: new ContextBuilder(store, reasoning, config.context),
    tools: new ToolExecutor(store, literature),
    converter: overrides.converter ?? new CommandDocumentConverter(config.conversion)
  });
}

export class Notebook {
  constructor(private readonly services: NotebookServices) {}

  get projects(): ProjectCatalog {
    return this.services.projects;
  }

  get sessions(): SessionManager {
    return this.services.sessions;
  }

  /** One conversational turn. */
  async ask(session: Session, message: string): Promise<AskResult> {
    const { sessions, context, reasoning, tools, config } = this.services;
    requireProject(session);
    await sessions.refresh(session);

    const bundle = await context.build(session, message);
    const notices = [...bundle.notices];
    const toolCalls: ToolRecord[] = [];

    let decision = await reasoning.step({
      bundle,
      message,
      toolResults: toolCalls,
      toolsAvailable: config.reasoning.maxToolSteps > 0
    });
    while (decision.kind === "tool") {
      const outcome = await tools.run(session, decision.request);
      toolCalls.push(outcome.record);
      if (outcome.notice) {
        notices.push(outcome.notice);
      }
      decision = await reasoning.step({
        bundle,
        message,
        toolResults: toolCalls,
        toolsAvailable: toolCalls.length < config.reasoning.maxToolSteps
      });
    }

    let memoryUpdate: MemoryChange | undefined;
    if (decision.memoryUpdate) {
      const experiment = requireProject(session).experiment;
      if (!experiment) {
        notices.push("New information was not saved because no experiment is selected.");
      } else {
        try {
          memoryUpdate = await this.merge(experiment, decision.memoryUpdate);
        } catch (error) {
          console.error("[notebook] memory update failed", {
            experimentId: experiment.id,
            message: describeError(error)
          });
          notices.push(`The memory of ${experiment.name} was not updated: ${describeError(error)}`);
        }
      }
    }

    sessions.recordTurn(session, "user", message);
    sessions.recordTurn(session, "assistant", decision.answer);
    return { answer: decision.answer, toolCalls, memoryUpdate, notices };
  }

  /**
   * Stores the original under `originals/`, converts it outside the write
   * queue, then registers it and notes the upload in the change history.
   */
  async upload(session: Session, originalName: string, bytes: Uint8Array): Promise<UploadResult> {
    const { store, converter } = this.services;
    await this.services.sessions.refresh(session);
    const binding = requireExperiment(session);
    const experiment = binding.experiment;

    const name = path.posix.basename(originalName.replace(/\\/g, "/"));
    if (!name || name === "." || name === "..") {
      throw new PathEscapeError(originalName, binding.resolver.root);
    }

    const original = await binding.resolver.child(experiment.dir, ORIGINALS_DIR, name);
    await mkdir(path.dirname(original.absolute), { recursive: true });
    await writeFileAtomic(original.absolute, bytes);

    const result = await converter.convert(original.absolute);
    const notices: string[] = [];
    let converted: ResolvedPath | undefined;
    if (result.status === "success" && result.text !== undefined) {
      converted = await binding.resolver.child(experiment.dir, META_DIR, CONVERTED_DIR, `${name}.md`);
      await mkdir(path.dirname(converted.absolute), { recursive: true });
      await writeFileAtomic(converted.absolute, result.text);
    }
    if (result.status === "failed") {
      notices.push(`${name} was stored but could not be converted to text: ${result.error ?? "unknown reason"}`);
    }

    const conversion: ConversionOutcome = { status: result.status, method: result.method, error: result.error };
    const entry = await store.registerFile(experiment, { originalName: name, original, converted, conversion });
    await store.appendHistory(
      experiment,
      `Uploaded ${name} (conversion: ${conversion.status}${conversion.error ? `, ${conversion.error}` : ""}).`
    );
    return { entry, conversion, notices };
  }

  async listExperiments(session: Session): Promise<ExperimentSummary[]> {
    return requireProject(session).experiments.summaries();
  }

  async createExperiment(session: Session, displayName: string): Promise<ExperimentHandle> {
    const binding = requireProject(session);
    const experiment = await binding.experiments.create(displayName);
    console.log("[notebook] experiment created", { projectId: binding.project.id, experimentId: experiment.id });
    return experiment;
  }

  /** Owner or admin only. The session follows the folder if it was inside it. */
  async renameExperiment(session: Session, ref: string, newName: string): Promise<ExperimentHandle> {
    const binding = requireProject(session);
    requirePermission(binding, "rename experiment", MANAGE);
    const { store, sessions } = this.services;

    const target = await binding.experiments.resolve(ref);
    const renamed = await store.exclusive(target.id, () => binding.experiments.rename(target.id, newName));
    if (renamed.name !== target.name) {
      await store.appendHistory(renamed, `Renamed from ${target.name} to ${renamed.name}.`);
    }
    await sessions.refresh(session);
    return renamed;
  }

  async readMemory(session: Session, ref?: string): Promise<string> {
    const experiment = await this.experimentFor(session, ref);
    return (await this.services.store.read(experiment)).text;
  }

  async files(session: Session, ref?: string): Promise<RegistryEntryView[]> {
    return this.services.store.listFiles(await this.experimentFor(session, ref));
  }

  /** Extracts an answer from one experiment's memory without the tool loop. */
  async query(session: Session, question: string, ref?: string): Promise<string> {
    const experiment = await this.experimentFor(session, ref);
    const snapshot = await this.services.store.read(experiment);
    return this.services.reasoning.extract(snapshot.text, question);
  }

  /** Explicit correction path; errors propagate. */
  async remember(session: Session, information: string, ref?: string): Promise<MemoryChange> {
    return this.merge(await this.experimentFor(session, ref), information);
  }

  private async experimentFor(session: Session, ref?: string): Promise<ExperimentHandle> {
    await this.services.sessions.refresh(session);
    if (ref) {
      return requireProject(session).experiments.resolve(ref);
    }
    return requireExperiment(session).experiment;
  }

  private async merge(experiment: ExperimentHandle, information: string): Promise<MemoryChange> {
    const { store, reasoning } = this.services;
    const result = await store.writeSection(experiment, {
      information,
      propose: (documentText, info) => reasoning.proposeUpdate(documentText, info)
    });
    return { ...result, information };
  }
}
