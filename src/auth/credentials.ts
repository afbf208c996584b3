import { exec as execCb } from "node:child_process";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { z } from "zod";
import { CommandAuthConfig, ModelAuthConfig, ModelConfig } from "../types.js";

const exec = promisify(execCb);

const cachedTokenSchema = z.object({
  accessToken: z.string(),
  expiresAt: z.string().optional()
});

const tokenStoreSchema = z.record(z.string(), cachedTokenSchema);

type CachedToken = z.infer<typeof cachedTokenSchema>;
type TokenStore = z.infer<typeof tokenStoreSchema>;

export function defaultTokenStorePath(): string {
  return process.env.LABBOOK_TOKEN_STORE ?? path.join(os.homedir(), ".labbook", "tokens.json");
}

async function readTokenStore(filePath: string): Promise<TokenStore> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw error;
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn("[auth] ignoring unreadable token store", { filePath, message });
    return {};
  }
  const parsed = tokenStoreSchema.safeParse(json);
  if (!parsed.success) {
    console.warn("[auth] ignoring token store with unexpected shape", { filePath });
    return {};
  }
  return parsed.data;
}

async function writeTokenStore(filePath: string, store: TokenStore): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(store, null, 2)}\n`, { encoding: "utf8", mode: 0o600 });
}

function stillFresh(entry: CachedToken | undefined): entry is CachedToken {
  if (!entry?.accessToken) {
    return false;
  }
  if (!entry.expiresAt) {
    return true;
  }
  return Date.now() + 60_000 < new Date(entry.expiresAt).getTime();
}

async function fromCommand(auth: CommandAuthConfig, config: ModelConfig): Promise<string> {
  const cacheKey = auth.cacheKey ?? `${config.provider}:${config.model}`;
  const storePath = auth.tokenStorePath ?? defaultTokenStorePath();
  const store = await readTokenStore(storePath);
  const cached = store[cacheKey];
  if (stillFresh(cached)) {
    return cached.accessToken;
  }

  const { stdout, stderr } = await exec(auth.command);
  const token = stdout.trim();
  if (!token) {
    throw new Error(`Auth command returned empty token. stderr=${stderr.trim()}`);
  }

  if (auth.cacheTtlSeconds && auth.cacheTtlSeconds > 0) {
    store[cacheKey] = {
      accessToken: token,
      expiresAt: new Date(Date.now() + auth.cacheTtlSeconds * 1000).toISOString()
    };
    await writeTokenStore(storePath, store);
  }
  return token;
}

function authFor(config: ModelConfig): ModelAuthConfig {
  if (config.auth) {
    return config.auth;
  }
  if (config.apiKeyEnv) {
    return { method: "api-key-env", apiKeyEnv: config.apiKeyEnv };
  }
  throw new Error(`Model ${config.model} has no credentials configured. Set model.auth or model.apiKeyEnv.`);
}

export async function resolveModelCredential(config: ModelConfig): Promise<string> {
  const auth = authFor(config);
  if (auth.method === "api-key-env") {
    const token = process.env[auth.apiKeyEnv] ?? "";
    if (!token) {
      throw new Error(`Missing API credential in env var: ${auth.apiKeyEnv}`);
    }
    return token;
  }
  return fromCommand(auth, config);
}
