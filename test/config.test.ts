import { writeFileSync } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfig } from "../src/config.js";
import { cleanupTempDirs, makeTempDir } from "./helpers/fixture.js";

const minimal = {
  storage: { dataRoot: "./data" },
  users: [{ id: "alice" }],
  reasoning: { model: { provider: "anthropic", model: "test-model", apiKeyEnv: "LABBOOK_TEST_KEY" } }
};

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig(minimal);

    expect(config.users).toEqual([{ id: "alice", role: "user" }]);
    expect(config.reasoning).toMatchObject({ timeoutMs: 60_000, maxToolSteps: 6 });
    expect(config.context).toEqual({ historyTurns: 6, siblingLimit: 12, memoryMaxChars: 24_000 });
    expect(config.memory).toEqual({ writeRetries: 2 });
    expect(config.literature).toBeUndefined();
    expect(config.conversion).toBeUndefined();
  });

  it("fills in literature and conversion defaults when the sections are present", () => {
    const config = parseConfig({ ...minimal, literature: {}, conversion: { command: "pandoc" } });

    expect(config.literature).toEqual({ provider: "exa", apiKeyEnv: "EXA_API_KEY", numResults: 5, timeoutMs: 20_000 });
    expect(config.conversion).toEqual({ command: "pandoc", args: ["{input}"], timeoutMs: 120_000 });
  });

  it("names every offending path", () => {
    expect(() =>
      parseConfig({ ...minimal, users: [], memory: { writeRetries: -1 } }, "labbook.config.json")
    ).toThrow(/^Config validation error \(labbook\.config\.json\):\n- users: .*\n- memory\.writeRetries: /);
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig({ ...minimal, telemetry: true })).toThrow(/Unrecognized key/);
  });

  it("rejects duplicate user ids", () => {
    expect(() => parseConfig({ ...minimal, users: [{ id: "alice" }, { id: "alice", role: "admin" }] })).toThrow(
      "Config validation error: duplicate user ids: alice"
    );
  });

  it("requires model credentials", () => {
    expect(() =>
      parseConfig({ ...minimal, reasoning: { model: { provider: "anthropic", model: "test-model" } } })
    ).toThrow("Config validation error: reasoning.model needs auth or apiKeyEnv");
  });

  it("requires an {input} placeholder in converter arguments", () => {
    expect(() => parseConfig({ ...minimal, conversion: { command: "pandoc", args: ["-t", "markdown"] } })).toThrow(
      "Config validation error: conversion.args must contain an {input} placeholder"
    );
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    cleanupTempDirs();
  });

  it("resolves the data root against the config file's folder", async () => {
    const dir = makeTempDir("labbook-config-");
    const file = path.join(dir, "labbook.config.json");
    writeFileSync(file, JSON.stringify(minimal));

    const config = await loadConfig(file);
    expect(config.storage.dataRoot).toBe(path.join(dir, "data"));
  });

  it("reports invalid JSON with the file path", async () => {
    const dir = makeTempDir("labbook-config-");
    const file = path.join(dir, "labbook.config.json");
    writeFileSync(file, "{ storage: ");

    await expect(loadConfig(file)).rejects.toThrow(`Config validation error: invalid JSON in ${file}:`);
  });
});
