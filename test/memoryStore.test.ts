import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConcurrentModificationError, NotFoundError } from "../src/errors.js";
import { ExperimentCatalog, ExperimentHandle } from "../src/storage/experimentCatalog.js";
import { MemoryStore } from "../src/storage/memoryStore.js";
import { registryPath } from "../src/storage/registry.js";
import { PathResolver } from "../src/workspace/pathResolver.js";
import { cleanupTempDirs, makeTempDir } from "./helpers/fixture.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function historyLines(text: string): string[] {
  return text.split("\n").filter((line) => line.startsWith("- **"));
}

describe("MemoryStore", () => {
  let resolver: PathResolver;
  let experiment: ExperimentHandle;
  let readme: string;

  beforeEach(async () => {
    resolver = await PathResolver.create(makeTempDir("labbook-memory-"));
    experiment = await new ExperimentCatalog(resolver).create("exp_001");
    readme = path.join(experiment.dir.absolute, "README.md");
  });

  afterEach(() => {
    cleanupTempDirs();
  });

  describe("read", () => {
    it("returns the README with its hash", async () => {
      const snapshot = await new MemoryStore({ writeRetries: 0 }).read(experiment);
      expect(snapshot.exists).toBe(true);
      expect(snapshot.text.startsWith("# exp_001\n")).toBe(true);
      expect(snapshot.hash).toMatch(/^[0-9a-f]{64}$/);
    });

    it("treats a missing README as empty memory", async () => {
      rmSync(readme);
      const snapshot = await new MemoryStore({ writeRetries: 0 }).read(experiment);
      expect(snapshot).toMatchObject({ text: "", exists: false, mtimeMs: 0 });
    });

    it("raises NotFoundError when the experiment folder is gone", async () => {
      rmSync(experiment.dir.absolute, { recursive: true });
      const error = await new MemoryStore({ writeRetries: 0 }).read(experiment).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ kind: "experiment", ref: "exp_001" });
    });

    it("follows a renamed folder by id", async () => {
      await new ExperimentCatalog(resolver).rename(experiment.id, "annealing");
      const snapshot = await new MemoryStore({ writeRetries: 0 }).read(experiment);
      expect(snapshot.text.startsWith("# exp_001\n")).toBe(true);
    });
  });

  describe("writeSection", () => {
    it("writes the proposed document, keeps earlier history and appends a dated note", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const result = await store.writeSection(experiment, {
        information: "Optimal temperature is 62°C",
        propose: async () => "# exp_001\n\nOptimal temperature: 62°C\n"
      });

      expect(result.attempts).toBe(1);
      expect(result.after.startsWith("# exp_001\n\nOptimal temperature: 62°C\n\n## Change History\n\n")).toBe(true);
      const entries = historyLines(result.after);
      expect(entries).toHaveLength(2);
      expect(entries[0]).toMatch(/ - Experiment created\.$/);
      expect(entries[1]).toMatch(/^- \*\*\d{4}-\d{2}-\d{2}T[\d:.]+Z\*\* - Optimal temperature is 62°C$/);
      expect(readFileSync(readme, "utf8")).toBe(result.after);
      expect(result.diff).toContain("+Optimal temperature: 62°C");
      expect(result.diff).toContain("--- README.md\tbefore");
    });

    it("passes the current text and the information to the proposer", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const seen: Array<[string, string]> = [];
      await store.writeSection(experiment, {
        information: "Yield 80%",
        note: "Recorded yield",
        propose: async (text, information) => {
          seen.push([text, information]);
          return `${text}Yield 80%\n`;
        }
      });

      expect(seen).toHaveLength(1);
      expect(seen[0]?.[0].startsWith("# exp_001\n")).toBe(true);
      expect(seen[0]?.[1]).toBe("Yield 80%");
      expect(historyLines(readFileSync(readme, "utf8")).at(-1)).toMatch(/ - Recorded yield$/);
    });

    it("creates the README when the experiment had none", async () => {
      rmSync(readme);
      const store = new MemoryStore({ writeRetries: 0 });
      const result = await store.writeSection(experiment, {
        information: "first fact",
        propose: async () => "First fact\n"
      });

      expect(result.before).toBe("");
      expect(result.after).toMatch(/^First fact\n\n## Change History\n\n- \*\*[^*]+\*\* - first fact\n$/);
    });

    it("serializes concurrent updates so no information is lost", async () => {
      const store = new MemoryStore({ writeRetries: 2 });
      const propose = (line: string) => async (text: string) => {
        await delay(10);
        return `${text.split("\n## Change History")[0]?.trimEnd()}\n${line}\n`;
      };

      const results = await Promise.all([
        store.writeSection(experiment, { information: "fact A", propose: propose("Fact A") }),
        store.writeSection(experiment, { information: "fact B", propose: propose("Fact B") })
      ]);

      const finalText = readFileSync(readme, "utf8");
      expect(finalText).toContain("\nFact A\n");
      expect(finalText).toContain("\nFact B\n");
      expect(results.map((result) => result.attempts).sort()).toEqual([1, 2]);
      expect(historyLines(finalText)).toHaveLength(3);
    });

    it("raises ConcurrentModificationError when the README moves and no retries are left", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const attempt = store.writeSection(experiment, {
        information: "fact",
        propose: async (text) => {
          writeFileSync(readme, `${text}edited by hand\n`);
          return "# replaced\n";
        }
      });

      await expect(attempt).rejects.toBeInstanceOf(ConcurrentModificationError);
      expect(readFileSync(readme, "utf8").endsWith("edited by hand\n")).toBe(true);
    });

    it("retries the whole cycle against the new text", async () => {
      const store = new MemoryStore({ writeRetries: 1 });
      const seen: string[] = [];
      const result = await store.writeSection(experiment, {
        information: "fact",
        propose: async (text) => {
          seen.push(text);
          if (seen.length === 1) {
            writeFileSync(readme, `${text}edited by hand\n`);
          }
          return `${text}merged\n`;
        }
      });

      expect(result.attempts).toBe(2);
      expect(seen[1]?.endsWith("edited by hand\n")).toBe(true);
      expect(result.after).toContain("edited by hand\nmerged\n");
    });

    it("waits for a rename holding the write slot and writes into the renamed folder", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const catalog = new ExperimentCatalog(resolver);
      let release: () => void = () => undefined;
      const proposing = new Promise<void>((resolve) => {
        release = resolve;
      });
      let proposed = false;

      const write = store.writeSection(experiment, {
        information: "Optimal temperature is 62°C",
        propose: async (text) => {
          proposed = true;
          await proposing;
          return `${text.split("\n## Change History")[0]?.trimEnd()}\n\nOptimal temperature: 62°C\n`;
        }
      });
      while (!proposed) {
        await delay(1);
      }
      const renamed = await store.exclusive(experiment.id, () => catalog.rename(experiment.id, "annealing"));
      release();
      const result = await write;

      expect(result.attempts).toBe(1);
      expect(existsSync(experiment.dir.absolute)).toBe(false);
      const moved = readFileSync(path.join(renamed.dir.absolute, "README.md"), "utf8");
      expect(moved).toBe(result.after);
      expect(moved).toContain("\nOptimal temperature: 62°C\n");
    });

    it("propagates proposer failures without writing", async () => {
      const store = new MemoryStore({ writeRetries: 2 });
      const before = readFileSync(readme, "utf8");
      await expect(
        store.writeSection(experiment, {
          information: "fact",
          propose: async () => {
            throw new Error("model offline");
          }
        })
      ).rejects.toThrow("model offline");
      expect(readFileSync(readme, "utf8")).toBe(before);
    });
  });

  it("appends a history-only note", async () => {
    const store = new MemoryStore({ writeRetries: 0 });
    const after = await store.appendHistory(experiment, "Uploaded plate.csv");

    expect(historyLines(after)).toHaveLength(2);
    expect(historyLines(after)[1]).toMatch(/ - Uploaded plate\.csv$/);
    expect(readFileSync(readme, "utf8")).toBe(after);
  });

  it("appends history to the renamed folder when given the old handle", async () => {
    const renamed = await new ExperimentCatalog(resolver).rename(experiment.id, "annealing");
    const after = await new MemoryStore({ writeRetries: 0 }).appendHistory(experiment, "Uploaded plate.csv");
    expect(readFileSync(path.join(renamed.dir.absolute, "README.md"), "utf8")).toBe(after);
  });

  describe("file registry", () => {
    async function writeOriginal(name: string, content: string) {
      const original = await resolver.child(experiment.dir, "originals", name);
      writeFileSync(original.absolute, content);
      return original;
    }

    it("registers an upload with hashes and a pending analysis", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const original = await writeOriginal("plate.csv", "well,od\nA1,0.4\n");

      const entry = await store.registerFile(experiment, {
        originalName: "plate.csv",
        original,
        conversion: { status: "not_needed", method: "text" }
      });

      expect(entry).toMatchObject({
        originalName: "plate.csv",
        originalPath: "originals/plate.csv",
        sizeBytes: 15,
        conversion: { status: "not_needed", method: "text" },
        analysis: { status: "pending" }
      });
      expect(entry.convertedPath).toBeUndefined();
      const files = await store.listFiles(experiment);
      expect(files).toHaveLength(1);
      expect(files[0]?.stale).toBe(false);
    });

    it("leaves the registry untouched when the same file is registered again", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const original = await writeOriginal("plate.csv", "A1,0.4\n");
      const registration = {
        originalName: "plate.csv",
        original,
        conversion: { status: "not_needed" as const }
      };

      const first = await store.registerFile(experiment, registration);
      const raw = readFileSync(registryPath(experiment.dir.absolute), "utf8");
      const second = await store.registerFile(experiment, registration);

      expect(second).toEqual(first);
      expect(readFileSync(registryPath(experiment.dir.absolute), "utf8")).toBe(raw);
    });

    it("updates the entry in place when the content changes", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const original = await writeOriginal("plate.csv", "A1,0.4\n");
      const first = await store.registerFile(experiment, {
        originalName: "plate.csv",
        original,
        conversion: { status: "not_needed" }
      });
      await store.updateFileSummary(experiment, "plate.csv", "OD readings");

      writeFileSync(original.absolute, "A1,0.5\n");
      const second = await store.registerFile(experiment, {
        originalName: "plate.csv",
        original,
        conversion: { status: "not_needed" }
      });

      expect(second.registeredAt).toBe(first.registeredAt);
      expect(second.originalHash).not.toBe(first.originalHash);
      expect(second.analysis).toEqual({ status: "pending" });
      expect(second.summary).toBeUndefined();
      expect(await store.listFiles(experiment)).toHaveLength(1);
    });

    it("records converted text and a summary", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const original = await writeOriginal("protocol.pdf", "%PDF-1.4");
      const converted = await resolver.child(experiment.dir, ".meta", "converted", "protocol.pdf.md");
      mkdirSync(path.dirname(converted.absolute), { recursive: true });
      writeFileSync(converted.absolute, "# Protocol\n");

      const entry = await store.registerFile(experiment, {
        originalName: "protocol.pdf",
        original,
        converted,
        conversion: { status: "success", method: "pdftotext" },
        summary: "PCR protocol"
      });

      expect(entry).toMatchObject({
        convertedPath: ".meta/converted/protocol.pdf.md",
        summary: "PCR protocol",
        analysis: { status: "analyzed" }
      });
      expect(entry.convertedHash).toMatch(/^[0-9a-f]{64}$/);
    });

    it("flags entries whose files disappeared as stale", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const original = await writeOriginal("plate.csv", "A1,0.4\n");
      await store.registerFile(experiment, { originalName: "plate.csv", original, conversion: { status: "not_needed" } });
      rmSync(original.absolute);

      const [view] = await store.listFiles(experiment);
      expect(view?.stale).toBe(true);
      expect(existsSync(registryPath(experiment.dir.absolute))).toBe(true);
    });

    it("registers into the renamed folder when the experiment moved after the upload", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const original = await writeOriginal("plate.csv", "A1,0.4\n");
      const renamed = await new ExperimentCatalog(resolver).rename(experiment.id, "annealing");

      const entry = await store.registerFile(experiment, {
        originalName: "plate.csv",
        original,
        conversion: { status: "not_needed" }
      });

      expect(entry).toMatchObject({ originalPath: "originals/plate.csv", sizeBytes: 7 });
      expect(readFileSync(registryPath(renamed.dir.absolute), "utf8")).toContain('"plate.csv"');
    });

    it("stores a summary and marks the entry analyzed", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const original = await writeOriginal("plate.csv", "A1,0.4\n");
      await store.registerFile(experiment, { originalName: "plate.csv", original, conversion: { status: "not_needed" } });

      const entry = await store.updateFileSummary(experiment, "plate.csv", "OD600 plate reading");

      expect(entry).toMatchObject({ summary: "OD600 plate reading", analysis: { status: "analyzed" } });
      const [view] = await store.listFiles(experiment);
      expect(view?.summary).toBe("OD600 plate reading");
    });

    it("rejects a summary for an unregistered file", async () => {
      const store = new MemoryStore({ writeRetries: 0 });
      const error = await store.updateFileSummary(experiment, "missing.csv", "x").catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ kind: "file", ref: "missing.csv" });
    });
  });
});
