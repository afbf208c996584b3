import { CollaboratorFailureError, CollaboratorTimeoutError, errorMessage } from "../errors.js";
import { LiteratureConfig, LiteratureHit } from "../types.js";
import { withTimeout } from "../utils.js";

/** Query string in, ranked hits out. */
export interface LiteratureSearch {
  search(query: string): Promise<LiteratureHit[]>;
}

const API_URL = "https://api.exa.ai/search";
const MAX_SNIPPET_CHARS = 320;

interface ExaSearchResult {
  title?: string;
  url?: string;
  text?: string;
}

interface ExaSearchResponse {
  results?: ExaSearchResult[];
  error?: string;
}

function normalizeSnippet(text: string | undefined): string | undefined {
  if (!text) {
    return undefined;
  }
  const singleLine = text.replace(/\s+/g, " ").trim();
  if (!singleLine) {
    return undefined;
  }
  if (singleLine.length <= MAX_SNIPPET_CHARS) {
    return singleLine;
  }
  return `${singleLine.slice(0, MAX_SNIPPET_CHARS - 1)}…`;
}

export function toLiteratureHits(payload: ExaSearchResponse): LiteratureHit[] {
  return (payload.results ?? [])
    .filter((result): result is ExaSearchResult & { url: string } => typeof result.url === "string" && result.url !== "")
    .map((result, index) => ({
      title: result.title?.trim() || `Result ${index + 1}`,
      url: result.url,
      snippet: normalizeSnippet(result.text)
    }));
}

export class ExaLiteratureSearch implements LiteratureSearch {
  constructor(private readonly config: LiteratureConfig) {}

  async search(query: string): Promise<LiteratureHit[]> {
    const apiKey = process.env[this.config.apiKeyEnv] ?? "";
    if (!apiKey) {
      throw new CollaboratorFailureError("literature", `missing API key in env var ${this.config.apiKeyEnv}`);
    }

    try {
      return await withTimeout("literature", this.config.timeoutMs, async (signal) => {
        const res = await fetch(API_URL, {
          method: "POST",
          headers: {
            "content-type": "application/json",
            "x-api-key": apiKey
          },
          body: JSON.stringify({
            query,
            numResults: this.config.numResults,
            contents: { text: { maxCharacters: MAX_SNIPPET_CHARS * 2 } }
          }),
          signal
        });
        if (!res.ok) {
          const body = await res.text();
          throw new Error(`Exa request failed (${res.status}): ${body.trim()}`);
        }
        const payload = (await res.json()) as ExaSearchResponse;
        if (payload.error) {
          throw new Error(payload.error);
        }
        return toLiteratureHits(payload);
      });
    } catch (error) {
      if (error instanceof CollaboratorTimeoutError) {
        throw error;
      }
      throw new CollaboratorFailureError("literature", errorMessage(error), { cause: error });
    }
  }
}
