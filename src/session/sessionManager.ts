import { stat } from "node:fs/promises";
import { NotFoundError, PermissionError, SessionStateError } from "../errors.js";
import { ExperimentCatalog, ExperimentHandle } from "../storage/experimentCatalog.js";
import { ConversationTurn, Permission, ProjectRecord } from "../types.js";
import { makeId, nowIso } from "../utils.js";
import { PathResolver, ResolvedPath } from "../workspace/pathResolver.js";
import { ProjectCatalog, ShareLevel } from "../workspace/projectCatalog.js";

export interface BoundProject {
  state: "bound";
  project: ProjectRecord;
  permission: Permission;
  resolver: PathResolver;
  experiments: ExperimentCatalog;
  location: ResolvedPath;
  experiment?: ExperimentHandle;
}

export type SessionBinding = { state: "unbound" } | BoundProject;

/**
 * One conversation. Every path it holds is a {@link ResolvedPath}; nothing
 * here owns files, so dropping a session never touches disk.
 */
export interface Session {
  readonly id: string;
  readonly userId: string;
  readonly createdAt: string;
  binding: SessionBinding;
  selectedFiles: ResolvedPath[];
  history: ConversationTurn[];
}

function isCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

async function kindOf(location: ResolvedPath): Promise<"file" | "folder" | "missing"> {
  try {
    const info = await stat(location.absolute);
    return info.isDirectory() ? "folder" : "file";
  } catch (error) {
    if (isCode(error, "ENOENT") || isCode(error, "ENOTDIR")) {
      return "missing";
    }
    throw error;
  }
}

export function requireProject(session: Session): BoundProject {
  if (session.binding.state !== "bound") {
    throw new SessionStateError("project");
  }
  return session.binding;
}

export function requireExperiment(session: Session): BoundProject & { experiment: ExperimentHandle } {
  const binding = requireProject(session);
  const experiment = binding.experiment;
  if (!experiment) {
    throw new SessionStateError("experiment");
  }
  return { ...binding, experiment };
}

export class SessionManager {
  constructor(private readonly projects: ProjectCatalog) {}

  createSession(userId: string): Session {
    this.projects.user(userId);
    return {
      id: makeId("session"),
      userId,
      createdAt: nowIso(),
      binding: { state: "unbound" },
      selectedFiles: [],
      history: []
    };
  }

  /** Unbound → Bound(project). Requires owner, admin or shared access. */
  async selectProject(session: Session, projectRef: string): Promise<BoundProject> {
    const project = await this.projects.get(projectRef, session.userId);
    const permission = this.projects.permissionFor(session.userId, project);
    if (permission === "none") {
      throw new PermissionError("open project", ["owner", "admin", "shared"], permission);
    }

    const resolver = await PathResolver.create(this.projects.rootOf(project));
    const binding: BoundProject = {
      state: "bound",
      project,
      permission,
      resolver,
      experiments: new ExperimentCatalog(resolver),
      location: resolver.rootPath()
    };
    session.binding = binding;
    session.selectedFiles = [];
    return binding;
  }

  /**
   * Moves the session to `folderRef` (project-relative). The current
   * experiment becomes the one containing the new location, if any.
   */
  async updateLocation(session: Session, folderRef: string): Promise<ResolvedPath> {
    const binding = requireProject(session);
    const location = await binding.resolver.resolve(folderRef);
    if ((await kindOf(location)) !== "folder") {
      throw new NotFoundError("folder", folderRef);
    }
    const experiment = await binding.experiments.containing(location);
    session.binding = { ...binding, location, experiment: experiment ?? undefined };
    return location;
  }

  async selectExperiment(session: Session, experimentRef: string): Promise<ExperimentHandle> {
    const binding = requireProject(session);
    const experiment = await binding.experiments.resolve(experimentRef);
    session.binding = { ...binding, location: experiment.dir, experiment };
    return experiment;
  }

  /**
   * Re-reads the current experiment by its stable id, so a rename done
   * elsewhere does not leave the session pointing at the old folder name.
   * An experiment that no longer exists keeps its handle; reads through it
   * then report it as missing.
   */
  async refresh(session: Session): Promise<void> {
    const binding = session.binding;
    if (binding.state !== "bound" || !binding.experiment) {
      return;
    }
    const previous = binding.experiment;
    let current: ExperimentHandle;
    try {
      current = await binding.experiments.resolve(previous.id);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      console.warn("[session] current experiment is gone", { experimentId: previous.id, name: previous.name });
      return;
    }
    if (current.name === previous.name) {
      return;
    }
    const inside = binding.location.relative.split("/").slice(1);
    const location = await binding.resolver.child(current.dir, ...inside);
    const files = await Promise.all(
      session.selectedFiles.map(async (file) => {
        const [top, ...rest] = file.relative.split("/");
        return top === previous.name ? binding.resolver.child(current.dir, ...rest) : file;
      })
    );
    session.binding = { ...binding, location, experiment: current };
    session.selectedFiles = files;
  }

  async selectFiles(session: Session, fileRefs: string[]): Promise<ResolvedPath[]> {
    const binding = requireProject(session);
    const files: ResolvedPath[] = [];
    for (const ref of fileRefs) {
      const file = await binding.resolver.resolve(ref);
      if ((await kindOf(file)) !== "file") {
        throw new NotFoundError("file", ref);
      }
      files.push(file);
    }
    session.selectedFiles = files;
    return files;
  }

  /** Only the project owner may share. */
  async share(session: Session, otherUser: string, level: ShareLevel = "shared"): Promise<ProjectRecord> {
    const binding = requireProject(session);
    if (binding.permission !== "owner") {
      throw new PermissionError("share", ["owner"], binding.permission);
    }
    const project = await this.projects.share(binding.project.id, session.userId, otherUser, level);
    session.binding = { ...binding, project };
    return project;
  }

  async unshare(session: Session, otherUser: string): Promise<ProjectRecord> {
    const binding = requireProject(session);
    if (binding.permission !== "owner") {
      throw new PermissionError("unshare", ["owner"], binding.permission);
    }
    const project = await this.projects.unshare(binding.project.id, session.userId, otherUser);
    session.binding = { ...binding, project };
    return project;
  }

  recordTurn(session: Session, role: ConversationTurn["role"], content: string): void {
    session.history.push({ role, content, timestamp: nowIso() });
  }
}
