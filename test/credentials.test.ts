import { readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resolveModelCredential } from "../src/auth/credentials.js";
import { ModelConfig } from "../src/types.js";
import { cleanupTempDirs, makeTempDir } from "./helpers/fixture.js";

const base: ModelConfig = { provider: "anthropic", model: "test-model" };

describe("resolveModelCredential", () => {
  let storePath: string;

  beforeEach(() => {
    storePath = path.join(makeTempDir("labbook-auth-"), "tokens.json");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    cleanupTempDirs();
  });

  it("reads the key from the configured env var", async () => {
    vi.stubEnv("LABBOOK_TEST_KEY", "test-secret");
    await expect(resolveModelCredential({ ...base, apiKeyEnv: "LABBOOK_TEST_KEY" })).resolves.toBe("test-secret");
  });

  it("fails when the env var is empty", async () => {
    vi.stubEnv("LABBOOK_TEST_KEY", "");
    await expect(resolveModelCredential({ ...base, apiKeyEnv: "LABBOOK_TEST_KEY" })).rejects.toThrow(
      "Missing API credential in env var: LABBOOK_TEST_KEY"
    );
  });

  it("fails without any credential settings", async () => {
    await expect(resolveModelCredential(base)).rejects.toThrow(
      "Model test-model has no credentials configured. Set model.auth or model.apiKeyEnv."
    );
  });

  it("runs the auth command and caches its token", async () => {
    const first = await resolveModelCredential({
      ...base,
      auth: { method: "command", command: "echo test-token-a", cacheTtlSeconds: 600, tokenStorePath: storePath }
    });
    const second = await resolveModelCredential({
      ...base,
      auth: { method: "command", command: "echo test-token-b", cacheTtlSeconds: 600, tokenStorePath: storePath }
    });

    expect(first).toBe("test-token-a");
    expect(second).toBe("test-token-a");
    expect(readFileSync(storePath, "utf8")).toContain('"anthropic:test-model"');
  });

  it("does not cache without a ttl", async () => {
    const auth = { method: "command" as const, command: "echo test-token", tokenStorePath: storePath };
    await expect(resolveModelCredential({ ...base, auth })).resolves.toBe("test-token");
    await expect(resolveModelCredential({ ...base, auth: { ...auth, command: "echo test-token-2" } })).resolves.toBe(
      "test-token-2"
    );
  });

  it("ignores an unreadable token store", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    writeFileSync(storePath, "{not json");

    const token = await resolveModelCredential({
      ...base,
      auth: { method: "command", command: "echo test-token", tokenStorePath: storePath }
    });

    expect(token).toBe("test-token");
    expect(warn).toHaveBeenCalledWith(
      "[auth] ignoring unreadable token store",
      expect.objectContaining({ filePath: storePath })
    );
  });

  it("rejects an empty token", async () => {
    await expect(
      resolveModelCredential({ ...base, auth: { method: "command", command: "true", tokenStorePath: storePath } })
    ).rejects.toThrow("Auth command returned empty token.");
  });
});
