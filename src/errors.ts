import { AccessLevel, Permission } from "./types.js";

export type Collaborator = "reasoning" | "literature" | "conversion";

export abstract class LabbookError extends Error {
  abstract readonly retryable: boolean;
}

export class PathEscapeError extends LabbookError {
  readonly retryable = false;

  constructor(
    readonly requested: string,
    readonly root: string
  ) {
    super(`Path escapes the project root: ${requested}`);
    this.name = "PathEscapeError";
  }
}

export type NotFoundKind = "project" | "experiment" | "file" | "folder" | "user" | "session";

export class NotFoundError extends LabbookError {
  readonly retryable = true;

  constructor(
    readonly kind: NotFoundKind,
    readonly ref: string,
    readonly available: string[] = []
  ) {
    super(`${kind} not found: ${ref}`);
    this.name = "NotFoundError";
  }
}

export class ConcurrentModificationError extends LabbookError {
  readonly retryable = true;

  constructor(
    readonly experimentId: string,
    readonly path: string
  ) {
    super(`Memory document for ${experimentId} changed on disk while an update was being prepared.`);
    this.name = "ConcurrentModificationError";
  }
}

export class PermissionError extends LabbookError {
  readonly retryable = false;

  constructor(
    readonly action: string,
    readonly required: Permission[],
    readonly actual: AccessLevel
  ) {
    super(`Permission denied for ${action}: requires ${required.join(" or ")}, have ${actual}.`);
    this.name = "PermissionError";
  }
}

export class CollaboratorTimeoutError extends LabbookError {
  readonly retryable = true;

  constructor(
    readonly collaborator: Collaborator,
    readonly timeoutMs: number
  ) {
    super(`${collaborator} call exceeded its ${timeoutMs}ms budget.`);
    this.name = "CollaboratorTimeoutError";
  }
}

export class CollaboratorFailureError extends LabbookError {
  readonly retryable = true;

  constructor(
    readonly collaborator: Collaborator,
    readonly detail: string,
    options?: { cause?: unknown }
  ) {
    super(`${collaborator} call failed: ${detail}`, options);
    this.name = "CollaboratorFailureError";
  }
}

/** The session is not in the state the operation needs (no project or experiment selected). */
export class SessionStateError extends LabbookError {
  readonly retryable = true;

  constructor(readonly missing: "project" | "experiment") {
    super(`No ${missing} is selected in this session.`);
    this.name = "SessionStateError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof PathEscapeError) {
    return `Access denied: "${error.requested}" points outside the current project.`;
  }
  if (error instanceof NotFoundError) {
    const hint =
      error.available.length > 0
        ? ` Available: ${error.available.join(", ")}.`
        : ` Use "list" to see what exists.`;
    return `The ${error.kind} "${error.ref}" does not exist.${hint}`;
  }
  if (error instanceof ConcurrentModificationError) {
    return `The memory of ${error.experimentId} was edited by someone else at the same time. Re-read it and try again.`;
  }
  if (error instanceof PermissionError) {
    return `Permission denied: ${error.action} needs ${error.required.join(" or ")} access, you have ${error.actual}.`;
  }
  if (error instanceof SessionStateError) {
    return error.missing === "project"
      ? "No project is selected. Select a project first."
      : "No experiment is selected. Move into an experiment folder first.";
  }
  if (error instanceof CollaboratorTimeoutError) {
    return `The ${error.collaborator} service did not answer within ${Math.round(error.timeoutMs / 1000)}s. Please retry.`;
  }
  if (error instanceof CollaboratorFailureError) {
    return `The ${error.collaborator} service failed: ${error.detail}`;
  }
  const message = errorMessage(error).trim();
  return message ? `Unexpected error: ${message}` : "Unexpected error with no message.";
}
