import { afterEach, describe, expect, it, vi } from "vitest";
import { parseArgs, usage } from "../src/cli.js";

describe("parseArgs", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("reads the command and its options", () => {
    const args = parseArgs([
      "ask",
      "--user",
      "alice",
      "--project",
      "PCR",
      "--folder",
      "exp_001",
      "--files",
      "exp_001/a.csv, exp_001/b.csv,",
      "--message",
      "  What temperature?  ",
      "--diff"
    ]);

    expect(args).toMatchObject({
      command: "ask",
      configPath: "labbook.config.json",
      user: "alice",
      project: "PCR",
      folder: "exp_001",
      files: ["exp_001/a.csv", "exp_001/b.csv"],
      message: "What temperature?",
      level: "shared",
      showDiff: true
    });
  });

  it("defaults to help and falls back to LABBOOK_USER", () => {
    vi.stubEnv("LABBOOK_USER", "bob");
    const args = parseArgs([]);
    expect(args.command).toBe("help");
    expect(args.user).toBe("bob");
    expect(args.showDiff).toBe(false);
  });

  it("only accepts admin as the alternative share level", () => {
    expect(parseArgs(["share", "--with", "carol", "--level", "admin"]).level).toBe("admin");
    expect(parseArgs(["share", "--with", "carol", "--level", "owner"]).level).toBe("shared");
  });

  it("treats a flag followed by another flag as a switch", () => {
    const args = parseArgs(["remember", "--diff", "--message", "Yield 80%", "--config", "lab.json"]);
    expect(args.showDiff).toBe(true);
    expect(args.message).toBe("Yield 80%");
    expect(args.configPath).toBe("lab.json");
  });

  it("documents every command", () => {
    const text = usage();
    for (const command of ["projects", "create-project", "create-experiment", "rename-experiment", "list", "ask", "query", "remember", "upload", "memory", "files", "share", "chat"]) {
      expect(text).toContain(`labbook ${command} `);
    }
  });
});
