import { mkdir, readdir, readFile, rename, stat } from "node:fs/promises";
import path from "node:path";
import { NotFoundError } from "../errors.js";
import { ExperimentSummary, FileRegistry } from "../types.js";
import { makeId, nowIso, slugify, writeFileAtomic } from "../utils.js";
import { PathResolver, ResolvedPath } from "../workspace/pathResolver.js";
import { CHANGE_HISTORY_HEADING, formatHistoryEntry } from "./changeHistory.js";
import {
  META_DIR,
  ORIGINALS_DIR,
  README_FILE,
  RegistryFormatError,
  readRegistry,
  writeRegistry
} from "./registry.js";

export interface ExperimentHandle {
  /** Stable across renames; lives in the folder's registry. */
  id: string;
  /** Current folder name, editable by the user. */
  name: string;
  dir: ResolvedPath;
}

const STATUS_MAX_CHARS = 120;
const NO_MEMORY = "No memory yet";

function isCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (isCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

function statusLine(readme: string): string {
  const line = readme
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .find((entry) => entry !== "" && !entry.startsWith("#"));
  if (!line) {
    return NO_MEMORY;
  }
  return line.length > STATUS_MAX_CHARS ? `${line.slice(0, STATUS_MAX_CHARS - 1)}…` : line;
}

function readmeTemplate(displayName: string, createdAt: string): string {
  return [
    `# ${displayName}`,
    "",
    `Created: ${createdAt.slice(0, 10)}`,
    "",
    CHANGE_HISTORY_HEADING,
    "",
    formatHistoryEntry(createdAt, "Experiment created.")
  ].join("\n");
}

/**
 * Experiments of one project. Any direct subfolder of the project root that
 * has `.meta/registry.json` is an experiment. The id-to-folder map is rebuilt
 * from disk on every call.
 */
export class ExperimentCatalog {
  constructor(private readonly resolver: PathResolver) {}

  async list(): Promise<ExperimentHandle[]> {
    const root = this.resolver.rootPath();
    const entries = await readdir(root.absolute, { withFileTypes: true });
    const handles: ExperimentHandle[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith(".")) {
        continue;
      }
      const dir = await this.resolver.child(root, entry.name);
      let registry: FileRegistry | null;
      try {
        registry = await readRegistry(dir.absolute);
      } catch (error) {
        if (!(error instanceof RegistryFormatError)) {
          throw error;
        }
        console.warn("[memory] skipping folder with unreadable registry", {
          folder: dir.relative,
          message: error.message
        });
        continue;
      }
      if (registry) {
        handles.push({ id: registry.experimentId, name: entry.name, dir });
      }
    }

    return handles.sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Accepts a stable id or a current folder name. */
  async resolve(ref: string): Promise<ExperimentHandle> {
    const wanted = ref.trim().replace(/^\.?\/+|\/+$/g, "");
    const handles = await this.list();
    const match =
      handles.find((handle) => handle.id === wanted) ?? handles.find((handle) => handle.name === wanted);
    if (!match) {
      throw new NotFoundError(
        "experiment",
        ref,
        handles.map((handle) => handle.name)
      );
    }
    return match;
  }

  /** The experiment containing `location`, if it sits inside one. */
  async containing(location: ResolvedPath): Promise<ExperimentHandle | null> {
    const [top] = location.relative.split("/");
    if (!top) {
      return null;
    }
    const handles = await this.list();
    return handles.find((handle) => handle.name === top) ?? null;
  }

  async create(displayName: string): Promise<ExperimentHandle> {
    const base = slugify(displayName) || "experiment";
    const root = this.resolver.rootPath();

    for (let attempt = 1; ; attempt += 1) {
      const name = attempt === 1 ? base : `${base}_${attempt}`;
      const dir = await this.resolver.child(root, name);
      try {
        await mkdir(dir.absolute);
      } catch (error) {
        if (isCode(error, "EEXIST")) {
          continue;
        }
        throw error;
      }

      const createdAt = nowIso();
      const id = makeId("exp");
      await mkdir(path.join(dir.absolute, META_DIR), { recursive: true });
      await mkdir(path.join(dir.absolute, ORIGINALS_DIR), { recursive: true });
      await writeFileAtomic(path.join(dir.absolute, README_FILE), `${readmeTemplate(displayName.trim() || name, createdAt)}\n`);
      await writeRegistry(dir.absolute, {
        version: 1,
        experimentId: id,
        displayName: displayName.trim() || name,
        files: {},
        createdAt,
        updatedAt: createdAt
      });
      return { id, name, dir };
    }
  }

  /** Moves the folder; the stable id travels with it. */
  async rename(ref: string, newName: string): Promise<ExperimentHandle> {
    const current = await this.resolve(ref);
    const name = slugify(newName);
    if (!name) {
      throw new Error(`"${newName}" is not a usable folder name.`);
    }
    if (name === current.name) {
      return current;
    }

    const target = await this.resolver.child(this.resolver.rootPath(), name);
    if (await pathExists(target.absolute)) {
      throw new Error(`An experiment folder named "${name}" already exists.`);
    }

    await rename(current.dir.absolute, target.absolute);
    return { id: current.id, name, dir: target };
  }

  /** Most recently modified first. */
  async summaries(): Promise<ExperimentSummary[]> {
    const handles = await this.list();
    const rows = await Promise.all(
      handles.map(async (handle): Promise<ExperimentSummary> => {
        const readmePath = path.join(handle.dir.absolute, README_FILE);
        let statusSummary = NO_MEMORY;
        let modified = (await stat(handle.dir.absolute)).mtime;
        try {
          statusSummary = statusLine(await readFile(readmePath, "utf8"));
          const readmeStat = await stat(readmePath);
          modified = readmeStat.mtime > modified ? readmeStat.mtime : modified;
        } catch (error) {
          if (!isCode(error, "ENOENT")) {
            throw error;
          }
        }
        const registry = await readRegistry(handle.dir.absolute);
        const registryUpdated = registry ? new Date(registry.updatedAt) : modified;
        const updatedAt = registryUpdated > modified ? registryUpdated : modified;
        return {
          id: handle.id,
          name: handle.name,
          statusSummary,
          fileCount: registry ? Object.keys(registry.files).length : 0,
          updatedAt: updatedAt.toISOString()
        };
      })
    );
    return rows.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt) || a.name.localeCompare(b.name));
  }
}
