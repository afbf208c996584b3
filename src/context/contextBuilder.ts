import { describeError } from "../errors.js";
import { ReasoningProtocol } from "../protocol/reasoning.js";
import { requireProject, Session } from "../session/sessionManager.js";
import { MemoryStore } from "../storage/memoryStore.js";
import {
  ContextBundle,
  ContextConfig,
  ContextSelection,
  ExperimentMemoryView,
  ExperimentSummary,
  SelectedFileContext
} from "../types.js";
import { clampText } from "../utils.js";

/**
 * Assembles what the reasoning step sees for one turn. Which other
 * experiments to pull in is decided by the reasoning step itself, with a
 * recency fallback; the user's wording is never matched locally.
 */
export class ContextBuilder {
  constructor(
    private readonly store: MemoryStore,
    private readonly reasoning: ReasoningProtocol,
    private readonly config: ContextConfig
  ) {}

  async build(session: Session, message: string): Promise<ContextBundle> {
    const binding = requireProject(session);
    const notices: string[] = [];
    const experiment = binding.experiment;

    let current: ContextBundle["current"];
    if (experiment) {
      try {
        const snapshot = await this.store.read(experiment);
        current = {
          id: experiment.id,
          name: experiment.name,
          memory: this.clampMemory(snapshot.text, experiment.name, notices),
          memoryAvailable: true
        };
      } catch (error) {
        console.warn("[context] memory unavailable, continuing without it", {
          experimentId: experiment.id,
          message: describeError(error)
        });
        notices.push(`Memory of ${experiment.name} could not be read: ${describeError(error)}`);
        current = { id: experiment.id, name: experiment.name, memory: "", memoryAvailable: false };
      }
    }

    let summaries: ExperimentSummary[] = [];
    try {
      summaries = await binding.experiments.summaries();
    } catch (error) {
      console.warn("[context] experiment listing failed", { projectId: binding.project.id, message: describeError(error) });
      notices.push(`The experiment list is unavailable: ${describeError(error)}`);
    }
    const others = summaries.filter((summary) => summary.id !== experiment?.id);

    const selection = await this.select(message, experiment?.name, others, notices);
    const includeSiblings = selection.includeSiblings || !current;

    const referenced: ExperimentMemoryView[] = [];
    for (const name of selection.experiments) {
      const view = await this.readOther(session, name, notices);
      if (view) {
        referenced.push(view);
      }
    }

    return {
      project: { id: binding.project.id, name: binding.project.name },
      location: binding.location.toString(),
      current,
      siblings: includeSiblings ? others.slice(0, this.config.siblingLimit) : [],
      referenced,
      selectedFiles: await this.selectedFiles(session),
      history: this.config.historyTurns > 0 ? session.history.slice(-this.config.historyTurns) : [],
      notices
    };
  }

  private async select(
    message: string,
    currentName: string | undefined,
    others: ExperimentSummary[],
    notices: string[]
  ): Promise<ContextSelection> {
    if (others.length === 0) {
      return { includeSiblings: false, experiments: [] };
    }
    try {
      return await this.reasoning.selectContext(message, currentName, others);
    } catch (error) {
      console.warn("[context] context selection failed, falling back to recent experiments", {
        message: describeError(error)
      });
      notices.push("Context selection was unavailable; only the most recent experiments are listed.");
      return { includeSiblings: true, experiments: [] };
    }
  }

  private async readOther(session: Session, ref: string, notices: string[]): Promise<ExperimentMemoryView | null> {
    const binding = requireProject(session);
    try {
      const handle = await binding.experiments.resolve(ref);
      const snapshot = await this.store.read(handle);
      return { id: handle.id, name: handle.name, memory: this.clampMemory(snapshot.text, handle.name, notices) };
    } catch (error) {
      console.warn("[context] referenced memory unavailable", { ref, message: describeError(error) });
      notices.push(`Memory of ${ref} could not be read: ${describeError(error)}`);
      return null;
    }
  }

  private async selectedFiles(session: Session): Promise<SelectedFileContext[]> {
    const binding = requireProject(session);
    const result: SelectedFileContext[] = [];

    for (const file of session.selectedFiles) {
      const [top, ...rest] = file.relative.split("/");
      const inner = rest.join("/");
      const handle = (await binding.experiments.list()).find((candidate) => candidate.name === top);
      if (!handle) {
        result.push({ path: file.relative });
        continue;
      }
      try {
        const entries = await this.store.listFiles(handle);
        const entry = entries.find((candidate) => candidate.originalPath === inner || candidate.convertedPath === inner);
        result.push({ path: file.relative, entry });
      } catch (error) {
        console.warn("[context] registry unavailable for selected file", {
          file: file.relative,
          message: describeError(error)
        });
        result.push({ path: file.relative });
      }
    }
    return result;
  }

  private clampMemory(text: string, name: string, notices: string[]): string {
    if (text.length > this.config.memoryMaxChars) {
      notices.push(`Memory of ${name} is long; only the first ${this.config.memoryMaxChars} characters are shown.`);
    }
    return clampText(text, this.config.memoryMaxChars);
  }
}
