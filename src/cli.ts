import { readFile } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline/promises";
import { loadConfig } from "./config.js";
import { PiAiClient } from "./models/piAiClient.js";
import { AskResult, createNotebook, Notebook } from "./notebook/notebook.js";
import { Session } from "./session/sessionManager.js";
import { describeError } from "./errors.js";
import { ShareLevel } from "./workspace/projectCatalog.js";

export interface CliArgs {
  command: string;
  configPath: string;
  user?: string;
  project?: string;
  experiment?: string;
  folder?: string;
  files: string[];
  name?: string;
  description?: string;
  message: string;
  file?: string;
  target?: string;
  level: ShareLevel;
  showDiff: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  const map = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < rest.length; i += 1) {
    const current = rest[i] ?? "";
    const next = rest[i + 1];
    if (current.startsWith("--")) {
      if (next === undefined || next.startsWith("--")) {
        flags.add(current);
        continue;
      }
      map.set(current, next);
      i += 1;
    }
  }

  const files = (map.get("--files") ?? "")
    .split(",")
    .map((file) => file.trim())
    .filter(Boolean);

  return {
    command: command ?? "help",
    configPath: map.get("--config") ?? "labbook.config.json",
    user: map.get("--user") ?? process.env.LABBOOK_USER,
    project: map.get("--project"),
    experiment: map.get("--experiment"),
    folder: map.get("--folder"),
    files,
    name: map.get("--name"),
    description: map.get("--description"),
    message: (map.get("--message") ?? "").trim(),
    file: map.get("--file"),
    target: map.get("--with"),
    level: map.get("--level") === "admin" ? "admin" : "shared",
    showDiff: flags.has("--diff")
  };
}

export function usage(): string {
  return [
    "Usage:",
    "  labbook projects --user <id>",
    '  labbook create-project --user <id> --name "Name" [--description "..."]',
    '  labbook create-experiment --user <id> --project <ref> --name "Name"',
    '  labbook rename-experiment --user <id> --project <ref> --experiment <ref> --name "New name"',
    "  labbook list --user <id> --project <ref>",
    '  labbook ask --user <id> --project <ref> [--experiment <ref> | --folder <path>] [--files a,b] --message "..." [--diff]',
    '  labbook query --user <id> --project <ref> --experiment <ref> --message "..."',
    '  labbook remember --user <id> --project <ref> --experiment <ref> --message "..." [--diff]',
    "  labbook upload --user <id> --project <ref> --experiment <ref> --file <local path>",
    "  labbook memory --user <id> --project <ref> --experiment <ref>",
    "  labbook files --user <id> --project <ref> --experiment <ref>",
    "  labbook share --user <id> --project <ref> --with <user> [--level shared|admin]",
    "  labbook chat --user <id> --project <ref> [--experiment <ref>]",
    "",
    "Options:",
    "  --config <path>            Path to labbook config JSON (default labbook.config.json)",
    "  --user <id>                Acting user (or LABBOOK_USER)",
    "  --diff                     Print the unified diff of a memory update"
  ].join("\n");
}

function required(value: string | undefined, flag: string): string {
  if (!value?.trim()) {
    throw new Error(`Missing required ${flag} argument.\n\n${usage()}`);
  }
  return value.trim();
}

async function openSession(notebook: Notebook, args: CliArgs): Promise<Session> {
  const session = notebook.sessions.createSession(required(args.user, "--user"));
  await notebook.sessions.selectProject(session, required(args.project, "--project"));
  if (args.experiment) {
    await notebook.sessions.selectExperiment(session, args.experiment);
  } else if (args.folder) {
    await notebook.sessions.updateLocation(session, args.folder);
  }
  if (args.files.length > 0) {
    await notebook.sessions.selectFiles(session, args.files);
  }
  return session;
}

function printAnswer(result: AskResult, showDiff: boolean): void {
  console.log(result.answer);
  for (const notice of result.notices) {
    console.log(`! ${notice}`);
  }
  if (result.memoryUpdate) {
    console.log(`(memory updated: ${result.memoryUpdate.information})`);
    if (showDiff) {
      console.log(result.memoryUpdate.diff);
    }
  }
}

async function chat(notebook: Notebook, session: Session, showDiff: boolean): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log('Type a message, "/cd <folder>", "/select a,b", "/list", or "/exit".');
  try {
    for (;;) {
      const line = (await rl.question("> ")).trim();
      if (!line) {
        continue;
      }
      if (line === "/exit") {
        return;
      }
      try {
        if (line.startsWith("/cd ")) {
          const location = await notebook.sessions.updateLocation(session, line.slice(4).trim());
          console.log(`Now in ${location.toString()}`);
        } else if (line.startsWith("/select ")) {
          const files = await notebook.sessions.selectFiles(
            session,
            line
              .slice(8)
              .split(",")
              .map((file) => file.trim())
              .filter(Boolean)
          );
          console.log(`Selected ${files.map((file) => file.toString()).join(", ")}`);
        } else if (line === "/list") {
          for (const row of await notebook.listExperiments(session)) {
            console.log(`- ${row.name}: ${row.statusSummary}`);
          }
        } else {
          printAnswer(await notebook.ask(session, line), showDiff);
        }
      } catch (error) {
        console.log(describeError(error));
      }
    }
  } finally {
    rl.close();
  }
}

export async function runCli(argv: string[]): Promise<void> {
  const args = parseArgs(argv);
  if (args.command === "help") {
    console.log(usage());
    return;
  }

  const config = await loadConfig(args.configPath);
  const notebook = createNotebook(config, new PiAiClient(config.reasoning.model));

  switch (args.command) {
    case "projects": {
      const user = required(args.user, "--user");
      for (const project of await notebook.projects.list(user)) {
        console.log(`- ${project.name} (${project.id}) [${notebook.projects.permissionFor(user, project)}]`);
      }
      return;
    }
    case "create-project": {
      const project = await notebook.projects.create(
        required(args.user, "--user"),
        required(args.name, "--name"),
        args.description
      );
      console.log(`Created project ${project.name} (${project.id})`);
      return;
    }
    case "create-experiment": {
      const session = await openSession(notebook, args);
      const experiment = await notebook.createExperiment(session, required(args.name, "--name"));
      console.log(`Created experiment ${experiment.name} (${experiment.id})`);
      return;
    }
    case "rename-experiment": {
      const session = await openSession(notebook, { ...args, experiment: undefined });
      const experiment = await notebook.renameExperiment(
        session,
        required(args.experiment, "--experiment"),
        required(args.name, "--name")
      );
      console.log(`Renamed to ${experiment.name} (${experiment.id})`);
      return;
    }
    case "list": {
      const session = await openSession(notebook, args);
      const rows = await notebook.listExperiments(session);
      if (rows.length === 0) {
        console.log("No experiments yet.");
      }
      for (const row of rows) {
        console.log(`- ${row.name} (${row.fileCount} files, updated ${row.updatedAt}): ${row.statusSummary}`);
      }
      return;
    }
    case "ask": {
      const session = await openSession(notebook, args);
      printAnswer(await notebook.ask(session, required(args.message, "--message")), args.showDiff);
      return;
    }
    case "query": {
      const session = await openSession(notebook, args);
      console.log(await notebook.query(session, required(args.message, "--message")));
      return;
    }
    case "remember": {
      const session = await openSession(notebook, args);
      const change = await notebook.remember(session, required(args.message, "--message"));
      console.log(args.showDiff ? change.diff : "Memory updated.");
      return;
    }
    case "upload": {
      const session = await openSession(notebook, args);
      const localPath = required(args.file, "--file");
      const result = await notebook.upload(session, path.basename(localPath), await readFile(localPath));
      console.log(`Registered ${result.entry.originalName} (conversion: ${result.conversion.status})`);
      for (const notice of result.notices) {
        console.log(`! ${notice}`);
      }
      return;
    }
    case "memory": {
      const session = await openSession(notebook, args);
      console.log(await notebook.readMemory(session));
      return;
    }
    case "files": {
      const session = await openSession(notebook, args);
      for (const entry of await notebook.files(session)) {
        const flags = [entry.conversion.status, entry.analysis.status, entry.stale ? "STALE" : undefined]
          .filter((flag): flag is string => flag !== undefined)
          .join(", ");
        console.log(`- ${entry.originalName} [${flags}]${entry.summary ? `: ${entry.summary}` : ""}`);
      }
      return;
    }
    case "share": {
      const session = await openSession(notebook, args);
      const project = await notebook.sessions.share(session, required(args.target, "--with"), args.level);
      console.log(`Shared ${project.name} with ${args.target ?? ""} as ${args.level}.`);
      return;
    }
    case "chat": {
      const session = await openSession(notebook, args);
      await chat(notebook, session, args.showDiff);
      return;
    }
    default:
      throw new Error(`Unsupported command: ${args.command}\n\n${usage()}`);
  }
}
