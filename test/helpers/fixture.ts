import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { parseConfig } from "../../src/config.js";
import { DocumentConverter } from "../../src/agent/documentConverter.js";
import { LiteratureSearch } from "../../src/agent/literatureSearch.js";
import { createNotebook, Notebook } from "../../src/notebook/notebook.js";
import { LabbookConfig } from "../../src/types.js";
import { Reply, ScriptedModel } from "./scriptedModel.js";

export interface Fixture {
  dataRoot: string;
  config: LabbookConfig;
  model: ScriptedModel;
  notebook: Notebook;
}

const tempDirs: string[] = [];

export function makeTempDir(prefix = "labbook-test-"): string {
  const dir = mkdtempSync(path.join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function cleanupTempDirs(): void {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}

export function testConfig(dataRoot: string, overrides: Record<string, unknown> = {}): LabbookConfig {
  return parseConfig({
    storage: { dataRoot },
    users: [
      { id: "alice", role: "user" },
      { id: "bob", role: "user" },
      { id: "carol", role: "user" },
      { id: "root-admin", role: "admin" }
    ],
    reasoning: {
      model: { provider: "anthropic", model: "test-model", apiKeyEnv: "LABBOOK_TEST_KEY" },
      timeoutMs: 2_000,
      maxToolSteps: 3
    },
    ...overrides
  });
}

export function makeFixture(
  reply: Reply,
  options: { literature?: LiteratureSearch; converter?: DocumentConverter; config?: Record<string, unknown> } = {}
): Fixture {
  const dataRoot = makeTempDir();
  const config = testConfig(dataRoot, options.config);
  const model = new ScriptedModel(reply);
  const notebook = createNotebook(config, model, {
    literature: options.literature,
    converter: options.converter
  });
  return { dataRoot, config, model, notebook };
}
