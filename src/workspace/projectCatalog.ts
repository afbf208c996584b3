import { randomUUID } from "node:crypto";
import { mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { NotFoundError, PermissionError } from "../errors.js";
import { KeyedWriteQueue } from "../storage/writeQueue.js";
import { AccessLevel, LabbookConfig, ProjectCatalogFile, ProjectRecord, UserConfig } from "../types.js";
import { nowIso, slugify, toJsonString, writeFileAtomic } from "../utils.js";

export const PROJECT_CATALOG_FILE = "projects.json";

const projectSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  ownerId: z.string().min(1),
  description: z.string().default(""),
  createdAt: z.string(),
  rootDir: z.string().min(1),
  sharedWith: z.array(z.string()).default([]),
  admins: z.array(z.string()).default([])
});

const catalogSchema = z.object({
  version: z.literal(1),
  projects: z.array(projectSchema),
  updatedAt: z.string()
});

export type ShareLevel = "shared" | "admin";

function isMissing(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Registry of projects under `storage.dataRoot`. Each project root is
 * `<dataRoot>/<ownerId>_projects/<projectId>/`.
 */
export class ProjectCatalog {
  private readonly queue = new KeyedWriteQueue();

  constructor(private readonly config: LabbookConfig) {}

  private catalogPath(): string {
    return path.join(this.config.storage.dataRoot, PROJECT_CATALOG_FILE);
  }

  rootOf(project: ProjectRecord): string {
    return path.resolve(this.config.storage.dataRoot, project.rootDir);
  }

  user(userId: string): UserConfig {
    const user = this.config.users.find((candidate) => candidate.id === userId);
    if (!user) {
      throw new NotFoundError(
        "user",
        userId,
        this.config.users.map((candidate) => candidate.id)
      );
    }
    return user;
  }

  permissionFor(userId: string, project: ProjectRecord): AccessLevel {
    if (project.ownerId === userId) {
      return "owner";
    }
    const user = this.config.users.find((candidate) => candidate.id === userId);
    if (user?.role === "admin" || project.admins.includes(userId)) {
      return "admin";
    }
    if (project.sharedWith.includes(userId)) {
      return "shared";
    }
    return "none";
  }

  async list(userId: string): Promise<ProjectRecord[]> {
    this.user(userId);
    const catalog = await this.read();
    return catalog.projects.filter((project) => this.permissionFor(userId, project) !== "none");
  }

  /** By id or exact name. The not-found hint lists only what `userId` can read. */
  async get(ref: string, userId?: string): Promise<ProjectRecord> {
    const catalog = await this.read();
    const visible = userId
      ? catalog.projects.filter((project) => this.permissionFor(userId, project) !== "none")
      : catalog.projects;
    const match =
      catalog.projects.find((project) => project.id === ref) ??
      catalog.projects.find((project) => project.name === ref);
    if (!match) {
      throw new NotFoundError(
        "project",
        ref,
        visible.map((project) => project.name)
      );
    }
    return match;
  }

  async create(ownerId: string, name: string, description = ""): Promise<ProjectRecord> {
    this.user(ownerId);
    const displayName = name.trim();
    if (!displayName) {
      throw new Error("Project name must not be empty.");
    }
    const id = `project_${randomUUID().replace(/-/g, "").slice(0, 8)}_${slugify(displayName, 40) || "project"}`;
    const record: ProjectRecord = {
      id,
      name: displayName,
      ownerId,
      description: description.trim(),
      createdAt: nowIso(),
      rootDir: `${ownerId}_projects/${id}`,
      sharedWith: [],
      admins: []
    };

    const root = this.rootOf(record);
    await mkdir(root, { recursive: true });
    await writeFileAtomic(
      path.join(root, "README.md"),
      [`# ${record.name}`, "", record.description || "No description yet.", ""].join("\n")
    );

    await this.mutate((catalog) => ({
      catalog: { ...catalog, projects: [...catalog.projects, record] },
      result: record
    }));
    console.log("[notebook] project created", { projectId: id, ownerId });
    return record;
  }

  async share(projectId: string, actorId: string, targetId: string, level: ShareLevel): Promise<ProjectRecord> {
    return this.changeAccess(projectId, actorId, targetId, "share", (project) => ({
      ...project,
      sharedWith: level === "shared" ? [...new Set([...project.sharedWith, targetId])] : project.sharedWith.filter((id) => id !== targetId),
      admins: level === "admin" ? [...new Set([...project.admins, targetId])] : project.admins.filter((id) => id !== targetId)
    }));
  }

  async unshare(projectId: string, actorId: string, targetId: string): Promise<ProjectRecord> {
    return this.changeAccess(projectId, actorId, targetId, "unshare", (project) => ({
      ...project,
      sharedWith: project.sharedWith.filter((id) => id !== targetId),
      admins: project.admins.filter((id) => id !== targetId)
    }));
  }

  private async changeAccess(
    projectId: string,
    actorId: string,
    targetId: string,
    action: string,
    apply: (project: ProjectRecord) => ProjectRecord
  ): Promise<ProjectRecord> {
    this.user(targetId);
    return this.mutate((catalog) => {
      const project = catalog.projects.find((candidate) => candidate.id === projectId);
      if (!project) {
        throw new NotFoundError("project", projectId);
      }
      const actual = this.permissionFor(actorId, project);
      if (actual !== "owner") {
        throw new PermissionError(action, ["owner"], actual);
      }
      const next = targetId === project.ownerId ? project : apply(project);
      return {
        catalog: {
          ...catalog,
          projects: catalog.projects.map((candidate) => (candidate.id === projectId ? next : candidate))
        },
        result: next
      };
    });
  }

  private async read(): Promise<ProjectCatalogFile> {
    let raw: string;
    try {
      raw = await readFile(this.catalogPath(), "utf8");
    } catch (error) {
      if (isMissing(error)) {
        return { version: 1, projects: [], updatedAt: nowIso() };
      }
      throw error;
    }
    const parsed = catalogSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(
        `Project catalog ${this.catalogPath()} is invalid: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue"}`
      );
    }
    return parsed.data;
  }

  private async mutate<T>(
    change: (catalog: ProjectCatalogFile) => { catalog: ProjectCatalogFile; result: T }
  ): Promise<T> {
    return this.queue.run("catalog", async () => {
      const { catalog, result } = change(await this.read());
      await mkdir(this.config.storage.dataRoot, { recursive: true });
      await writeFileAtomic(this.catalogPath(), `${toJsonString({ ...catalog, updatedAt: nowIso() })}\n`);
      return result;
    });
  }
}
