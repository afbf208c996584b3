import { describe, expect, it } from "vitest";
import {
  appendChangeHistory,
  carryOverHistory,
  formatHistoryEntry
} from "../src/storage/changeHistory.js";

const T1 = "2026-03-01T09:00:00.000Z";

describe("formatHistoryEntry", () => {
  it("renders a single bold-timestamped line", () => {
    expect(formatHistoryEntry(T1, "Annealing temperature\n  corrected to 63°C ")).toBe(
      "- **2026-03-01T09:00:00.000Z** - Annealing temperature corrected to 63°C"
    );
  });
});

describe("appendChangeHistory", () => {
  it("creates the history section at the end when it is missing", () => {
    expect(appendChangeHistory("# PCR\n\nSome notes\n\n\n", "- e1")).toBe(
      "# PCR\n\nSome notes\n\n## Change History\n\n- e1\n"
    );
  });

  it("creates the section in an empty document", () => {
    expect(appendChangeHistory("", "- e1")).toBe("## Change History\n\n- e1\n");
  });

  it("appends after the last entry of an existing section", () => {
    const doc = "# PCR\n\n## Change History\n\n- e1\n";
    expect(appendChangeHistory(doc, "- e2")).toBe("# PCR\n\n## Change History\n\n- e1\n- e2\n");
  });

  it("keeps text after the history section in place", () => {
    const doc = "# PCR\n\n## Change History\n\n- e1\n\n## Notes\nhand-written remark\n";
    expect(appendChangeHistory(doc, "- e2")).toBe(
      "# PCR\n\n## Change History\n\n- e1\n- e2\n\n## Notes\nhand-written remark\n"
    );
  });

  it("treats deeper headings as part of the history section", () => {
    const doc = "## Change History\n\n### March\n- e1\n";
    expect(appendChangeHistory(doc, "- e2")).toBe("## Change History\n\n### March\n- e1\n- e2\n");
  });

  it("fills an empty section", () => {
    expect(appendChangeHistory("# PCR\n\n## Change History\n", "- e1")).toBe(
      "# PCR\n\n## Change History\n\n- e1\n"
    );
  });
});

describe("carryOverHistory", () => {
  const previous = "# PCR\nOptimal temperature: 62°C\n\n## Change History\n\n- a\n- b\n";

  it("restores entries a replacement dropped, ahead of the ones it kept", () => {
    const next = "# PCR\nOptimal temperature: 63°C\n\n## Change History\n\n- b\n";
    expect(carryOverHistory(previous, next)).toBe(
      "# PCR\nOptimal temperature: 63°C\n\n## Change History\n\n- a\n- b\n"
    );
  });

  it("recreates the section when a replacement removed it entirely", () => {
    const next = "# PCR\nOptimal temperature: 63°C\n";
    expect(carryOverHistory(previous, next)).toBe(
      "# PCR\nOptimal temperature: 63°C\n\n## Change History\n\n- a\n- b\n"
    );
  });

  it("returns the replacement untouched when nothing was lost", () => {
    const next = "# PCR (revised)\nOptimal temperature: 63°C\n\n## Change History\n\n- a\n- b\n";
    expect(carryOverHistory(previous, next)).toBe(next);
  });

  it("ignores documents without a history section", () => {
    expect(carryOverHistory("free text only", "new text")).toBe("new text");
  });
});
