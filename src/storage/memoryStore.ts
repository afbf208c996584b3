import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { createPatch } from "diff";
import { ConcurrentModificationError, NotFoundError } from "../errors.js";
import { ConversionOutcome, FileRegistry, MemoryConfig, RegistryEntry, RegistryEntryView } from "../types.js";
import { clampText, nowIso, sha256, writeFileAtomic } from "../utils.js";
import { PathResolver, ResolvedPath } from "../workspace/pathResolver.js";
import { appendChangeHistory, carryOverHistory, formatHistoryEntry } from "./changeHistory.js";
import { ExperimentCatalog, ExperimentHandle } from "./experimentCatalog.js";
import { README_FILE, readRegistry, writeRegistry } from "./registry.js";
import { KeyedWriteQueue } from "./writeQueue.js";

export interface MemorySnapshot {
  text: string;
  /** False when the experiment has no README yet ("empty memory"). */
  exists: boolean;
  hash: string;
  mtimeMs: number;
}

/** Produces a complete replacement document. */
export type UpdateProposer = (documentText: string, information: string) => Promise<string>;

export interface MemoryUpdateRequest {
  information: string;
  propose: UpdateProposer;
  /** Change history line; defaults to the information itself. */
  note?: string;
}

export interface MemoryWriteResult {
  before: string;
  after: string;
  /** Unified patch of before → after. */
  diff: string;
  attempts: number;
}

export interface FileRegistration {
  originalName: string;
  original: ResolvedPath;
  converted?: ResolvedPath;
  conversion: ConversionOutcome;
  summary?: string;
}

const HISTORY_NOTE_MAX_CHARS = 240;

function isCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

async function fileExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (isCode(error, "ENOENT") || isCode(error, "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

function relativeTo(dir: ResolvedPath, target: ResolvedPath): string {
  return path.relative(dir.absolute, target.absolute).split(path.sep).join("/");
}

/**
 * Durable memory of every experiment: the free-text README and the file
 * registry next to it.
 *
 * Reads never lock. Every mutation of one experiment (README or registry) runs
 * through a single per-experiment queue, keyed on the stable id, so one store
 * instance must be shared by everything in the process that writes.
 *
 * Handles may be stale: a rename moves the folder but keeps the id, so every
 * operation looks the folder up again by id before touching disk.
 */
export class MemoryStore {
  constructor(
    private readonly config: MemoryConfig,
    private readonly queue = new KeyedWriteQueue()
  ) {}

  private readmePath(experiment: ExperimentHandle): string {
    return path.join(experiment.dir.absolute, README_FILE);
  }

  /** Runs `task` while holding the experiment's write slot. */
  exclusive<T>(experimentId: string, task: () => Promise<T>): Promise<T> {
    return this.queue.run(experimentId, task);
  }

  async read(experiment: ExperimentHandle): Promise<MemorySnapshot> {
    return this.readAt(await this.locate(experiment));
  }

  private async readAt(experiment: ExperimentHandle): Promise<MemorySnapshot> {
    const file = this.readmePath(experiment);
    try {
      const [text, info] = await Promise.all([readFile(file, "utf8"), stat(file)]);
      return { text, exists: true, hash: sha256(text), mtimeMs: info.mtimeMs };
    } catch (error) {
      if (isCode(error, "ENOENT")) {
        return { text: "", exists: false, hash: sha256(""), mtimeMs: 0 };
      }
      throw error;
    }
  }

  /**
   * Merges new information into the README.
   *
   * The proposer runs outside the write slot. Inside it the file is hashed
   * again; if it moved since the snapshot the attempt fails with
   * {@link ConcurrentModificationError} and the whole read-propose-write cycle
   * is retried up to `memory.writeRetries` times. A rename that lands in
   * between only moves the target folder.
   */
  async writeSection(experiment: ExperimentHandle, request: MemoryUpdateRequest): Promise<MemoryWriteResult> {
    const note = clampText(request.note ?? request.information, HISTORY_NOTE_MAX_CHARS);
    let attempt = 0;

    for (;;) {
      attempt += 1;
      const snapshot = await this.read(experiment);
      const proposed = await request.propose(snapshot.text, request.information);

      try {
        return await this.queue.run(experiment.id, async () => {
          const target = await this.locate(experiment);
          const current = await this.readAt(target);
          if (current.exists !== snapshot.exists || current.hash !== snapshot.hash) {
            throw new ConcurrentModificationError(experiment.id, this.readmePath(target));
          }
          const merged = carryOverHistory(snapshot.text, proposed);
          const after = appendChangeHistory(merged, formatHistoryEntry(nowIso(), note));
          await writeFileAtomic(this.readmePath(target), after);
          return {
            before: snapshot.text,
            after,
            diff: createPatch(README_FILE, snapshot.text, after, "before", "after"),
            attempts: attempt
          };
        });
      } catch (error) {
        if (!(error instanceof ConcurrentModificationError) || attempt > this.config.writeRetries) {
          throw error;
        }
        console.warn("[memory] README changed during update, retrying", {
          experimentId: experiment.id,
          attempt
        });
      }
    }
  }

  /** History-only append, for events that do not change the described state. */
  async appendHistory(experiment: ExperimentHandle, note: string): Promise<string> {
    return this.queue.run(experiment.id, async () => {
      const target = await this.locate(experiment);
      const current = await this.readAt(target);
      const after = appendChangeHistory(
        current.text,
        formatHistoryEntry(nowIso(), clampText(note, HISTORY_NOTE_MAX_CHARS))
      );
      await writeFileAtomic(this.readmePath(target), after);
      return after;
    });
  }

  /**
   * Upserts the registry entry keyed on `originalName`. Registering the same
   * original with the same converted content leaves the registry untouched.
   * The paths in `registration` are taken relative to `experiment.dir`.
   */
  async registerFile(experiment: ExperimentHandle, registration: FileRegistration): Promise<RegistryEntry> {
    const originalPath = relativeTo(experiment.dir, registration.original);
    const convertedPath = registration.converted ? relativeTo(experiment.dir, registration.converted) : undefined;

    return this.queue.run(experiment.id, async () => {
      const target = await this.locate(experiment);
      const [originalBytes, convertedBytes] = await Promise.all([
        readFile(path.join(target.dir.absolute, originalPath)),
        convertedPath ? readFile(path.join(target.dir.absolute, convertedPath)) : Promise.resolve(undefined)
      ]);
      const originalHash = sha256(originalBytes);
      const convertedHash = convertedBytes ? sha256(convertedBytes) : undefined;

      const registry = await this.loadRegistry(target);
      const existing = registry.files[registration.originalName];
      const now = nowIso();

      const sameContent =
        existing !== undefined &&
        existing.originalHash === originalHash &&
        existing.convertedHash === convertedHash &&
        existing.conversion.status === registration.conversion.status;
      if (existing && sameContent && registration.summary === undefined) {
        return existing;
      }

      const entry: RegistryEntry = {
        originalName: registration.originalName,
        originalPath,
        convertedPath,
        originalHash,
        convertedHash,
        sizeBytes: originalBytes.byteLength,
        conversion: registration.conversion,
        summary: registration.summary ?? (sameContent ? existing?.summary : undefined),
        analysis:
          registration.summary !== undefined
            ? { status: "analyzed", updatedAt: now }
            : sameContent && existing
              ? existing.analysis
              : { status: "pending" },
        registeredAt: existing?.registeredAt ?? now,
        updatedAt: now
      };

      await writeRegistry(target.dir.absolute, {
        ...registry,
        files: { ...registry.files, [entry.originalName]: entry },
        updatedAt: now
      });
      return entry;
    });
  }

  async listFiles(handle: ExperimentHandle): Promise<RegistryEntryView[]> {
    const experiment = await this.locate(handle);
    const registry = await this.loadRegistry(experiment);
    const views = await Promise.all(
      Object.values(registry.files).map(async (entry): Promise<RegistryEntryView> => {
        const originalPresent = await fileExists(path.join(experiment.dir.absolute, entry.originalPath));
        const convertedPresent = entry.convertedPath
          ? await fileExists(path.join(experiment.dir.absolute, entry.convertedPath))
          : true;
        return { ...entry, stale: !originalPresent || !convertedPresent };
      })
    );
    return views.sort((a, b) => a.originalName.localeCompare(b.originalName));
  }

  async updateFileSummary(
    experiment: ExperimentHandle,
    originalName: string,
    summary: string
  ): Promise<RegistryEntry> {
    return this.queue.run(experiment.id, async () => {
      const target = await this.locate(experiment);
      const registry = await this.loadRegistry(target);
      const existing = registry.files[originalName];
      if (!existing) {
        throw new NotFoundError("file", originalName, Object.keys(registry.files));
      }
      const now = nowIso();
      const entry: RegistryEntry = {
        ...existing,
        summary,
        analysis: { status: "analyzed", updatedAt: now },
        updatedAt: now
      };
      await writeRegistry(target.dir.absolute, {
        ...registry,
        files: { ...registry.files, [originalName]: entry },
        updatedAt: now
      });
      return entry;
    });
  }

  private async loadRegistry(experiment: ExperimentHandle): Promise<FileRegistry> {
    const registry = await readRegistry(experiment.dir.absolute);
    if (!registry || registry.experimentId !== experiment.id) {
      throw new NotFoundError("experiment", experiment.name);
    }
    return registry;
  }

  /** The experiment's folder as it is now, found by id. */
  private async locate(experiment: ExperimentHandle): Promise<ExperimentHandle> {
    const registry = await readRegistry(experiment.dir.absolute);
    if (registry?.experimentId === experiment.id) {
      return experiment;
    }
    const catalog = new ExperimentCatalog(await PathResolver.create(experiment.dir.root));
    const moved = (await catalog.list()).find((handle) => handle.id === experiment.id);
    if (!moved) {
      throw new NotFoundError("experiment", experiment.name);
    }
    return moved;
  }
}
