import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { FileRegistry } from "../types.js";
import { toJsonString, writeFileAtomic } from "../utils.js";

export const README_FILE = "README.md";
export const META_DIR = ".meta";
export const REGISTRY_FILE = "registry.json";
export const ORIGINALS_DIR = "originals";
export const CONVERTED_DIR = "converted";

const conversionSchema = z.object({
  status: z.enum(["success", "not_needed", "failed"]),
  method: z.string().optional(),
  error: z.string().optional()
});

const entrySchema = z.object({
  originalName: z.string().min(1),
  originalPath: z.string().min(1),
  convertedPath: z.string().optional(),
  originalHash: z.string(),
  convertedHash: z.string().optional(),
  sizeBytes: z.number().int().min(0),
  conversion: conversionSchema,
  summary: z.string().optional(),
  analysis: z.object({
    status: z.enum(["pending", "analyzed"]),
    updatedAt: z.string().optional()
  }),
  registeredAt: z.string(),
  updatedAt: z.string()
});

const registrySchema = z.object({
  version: z.literal(1),
  experimentId: z.string().min(1),
  displayName: z.string(),
  files: z.record(z.string(), entrySchema),
  createdAt: z.string(),
  updatedAt: z.string()
});

export function registryPath(experimentDir: string): string {
  return path.join(experimentDir, META_DIR, REGISTRY_FILE);
}

export class RegistryFormatError extends Error {
  constructor(
    readonly filePath: string,
    detail: string
  ) {
    super(`Unreadable file registry at ${filePath}: ${detail}`);
    this.name = "RegistryFormatError";
  }
}

function isMissing(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/** `null` when the folder has no registry, i.e. is not an experiment. */
export async function readRegistry(experimentDir: string): Promise<FileRegistry | null> {
  const filePath = registryPath(experimentDir);
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissing(error)) {
      return null;
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new RegistryFormatError(filePath, error instanceof Error ? error.message : String(error));
  }
  const parsed = registrySchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RegistryFormatError(filePath, issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid");
  }
  return parsed.data;
}

export async function writeRegistry(experimentDir: string, registry: FileRegistry): Promise<void> {
  await writeFileAtomic(registryPath(experimentDir), `${toJsonString(registry)}\n`);
}
