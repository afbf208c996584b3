import { realpath } from "node:fs/promises";
import path from "node:path";
import { PathEscapeError } from "../errors.js";

const issuer: unique symbol = Symbol("path-resolver");

/**
 * A location already proven to sit inside a project root.
 *
 * Only {@link PathResolver} can mint one, so holding a `ResolvedPath` is the
 * proof that validation happened. Pass it around instead of re-deriving paths
 * from strings.
 */
export class ResolvedPath {
  constructor(
    token: typeof issuer,
    readonly root: string,
    readonly absolute: string
  ) {
    if (token !== issuer) {
      throw new TypeError("ResolvedPath can only be created by PathResolver");
    }
  }

  /** Root-relative, POSIX separators, "" for the root itself. */
  get relative(): string {
    return path.relative(this.root, this.absolute).split(path.sep).join("/");
  }

  get name(): string {
    return path.basename(this.absolute);
  }

  toString(): string {
    return this.relative || ".";
  }
}

function isInside(root: string, candidate: string): boolean {
  if (candidate === root) {
    return true;
  }
  const rel = path.relative(root, candidate);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

function isMissing(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Canonicalizes the deepest existing ancestor with realpath, then re-appends
 * the segments that do not exist yet. A symlink anywhere on the existing part
 * is followed before the containment check.
 */
async function canonicalize(target: string): Promise<string> {
  const pending: string[] = [];
  let current = target;
  for (;;) {
    try {
      const real = await realpath(current);
      return pending.length > 0 ? path.join(real, ...pending.reverse()) : real;
    } catch (error) {
      if (!isMissing(error)) {
        throw error;
      }
      const parent = path.dirname(current);
      if (parent === current) {
        return target;
      }
      pending.push(path.basename(current));
      current = parent;
    }
  }
}

export class PathResolver {
  private constructor(readonly root: string) {}

  /** The root is canonicalized once; every later check compares against it. */
  static async create(root: string): Promise<PathResolver> {
    const canonical = await realpath(path.resolve(root));
    return new PathResolver(canonical);
  }

  rootPath(): ResolvedPath {
    return new ResolvedPath(issuer, this.root, this.root);
  }

  /**
   * Maps a caller-supplied reference to one location inside the root.
   *
   * "" and "." give the root. Absolute input is accepted only when it already
   * lies inside the root. Anything that lands outside after normalization or
   * symlink resolution raises {@link PathEscapeError}.
   */
  async resolve(reference: string): Promise<ResolvedPath> {
    if (reference.includes("\0")) {
      throw new PathEscapeError(reference, this.root);
    }

    const cleaned = reference.trim().replace(/\\/g, "/");
    const joined = path.isAbsolute(cleaned)
      ? path.normalize(cleaned)
      : path.resolve(this.root, path.normalize(cleaned || "."));

    if (!isInside(this.root, joined)) {
      throw new PathEscapeError(reference, this.root);
    }

    const canonical = await canonicalize(joined);
    if (!isInside(this.root, canonical)) {
      throw new PathEscapeError(reference, this.root);
    }
    return new ResolvedPath(issuer, this.root, canonical);
  }

  /** Resolves `segments` beneath an already validated location. */
  async child(base: ResolvedPath, ...segments: string[]): Promise<ResolvedPath> {
    if (base.root !== this.root) {
      throw new PathEscapeError(base.absolute, this.root);
    }
    return this.resolve(path.join(base.relative, ...segments));
  }
}
