export const CHANGE_HISTORY_HEADING = "## Change History";

export function formatHistoryEntry(timestamp: string, note: string): string {
  const singleLine = note.replace(/\s+/g, " ").trim();
  return `- **${timestamp}** - ${singleLine}`;
}

interface HistoryRegion {
  /** Line index of the heading. */
  heading: number;
  /** Exclusive end line index. */
  end: number;
}

function splitLines(text: string): string[] {
  return text.replace(/\r\n/g, "\n").split("\n");
}

function findRegion(lines: string[]): HistoryRegion | null {
  const heading = lines.findIndex((line) => line.trim() === CHANGE_HISTORY_HEADING);
  if (heading === -1) {
    return null;
  }
  let end = lines.length;
  for (let i = heading + 1; i < lines.length; i += 1) {
    if (/^#{1,2} /.test(lines[i] ?? "")) {
      end = i;
      break;
    }
  }
  return { heading, end };
}

function historyEntries(lines: string[], region: HistoryRegion): string[] {
  return lines.slice(region.heading + 1, region.end).filter((line) => line.trim().startsWith("- "));
}

/**
 * Appends `entry` as the last line of the change history region, creating the
 * region at the end of the document when it is missing. Nothing else in the
 * document is touched.
 */
export function appendChangeHistory(text: string, entry: string): string {
  const lines = splitLines(text);
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === "") {
    lines.pop();
  }

  const region = findRegion(lines);
  if (!region) {
    const prefix = lines.length > 0 ? [...lines, ""] : [];
    return `${[...prefix, CHANGE_HISTORY_HEADING, "", entry].join("\n")}\n`;
  }

  let insertAt = region.end;
  while (insertAt > region.heading + 1 && lines[insertAt - 1]?.trim() === "") {
    insertAt -= 1;
  }
  const needsGap = insertAt === region.heading + 1;
  const inserted = needsGap ? ["", entry] : [entry];
  const trailing = region.end < lines.length ? [""] : [];
  const next = [...lines.slice(0, insertAt), ...inserted, ...trailing, ...lines.slice(region.end)];
  return `${next.join("\n")}\n`;
}

/**
 * History is append-only. When a replacement document produced by the
 * reasoning step lost history lines that the previous version had, put them
 * back in their original order before the new entry is added.
 */
export function carryOverHistory(previous: string, next: string): string {
  const previousLines = splitLines(previous);
  const previousRegion = findRegion(previousLines);
  if (!previousRegion) {
    return next;
  }
  const prior = historyEntries(previousLines, previousRegion);
  if (prior.length === 0) {
    return next;
  }

  const nextLines = splitLines(next);
  const nextRegion = findRegion(nextLines);
  const kept = new Set(nextRegion ? historyEntries(nextLines, nextRegion).map((line) => line.trim()) : []);
  const missing = prior.filter((line) => !kept.has(line.trim()));
  if (missing.length === 0) {
    return next;
  }

  if (!nextRegion) {
    return missing.reduce((doc, line) => appendChangeHistory(doc, line), next);
  }

  // Restored lines go ahead of whatever the replacement already lists.
  const firstEntry = nextLines.findIndex(
    (line, index) => index > nextRegion.heading && index < nextRegion.end && line.trim().startsWith("- ")
  );
  const insertAt = firstEntry === -1 ? nextRegion.heading + 1 : firstEntry;
  const gap = firstEntry === -1 ? [""] : [];
  const merged = [...nextLines.slice(0, insertAt), ...gap, ...missing, ...nextLines.slice(insertAt)];
  return merged.join("\n");
}
