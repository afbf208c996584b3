export type Permission = "owner" | "admin" | "shared";

export type AccessLevel = Permission | "none";

export type UserRole = "user" | "admin";

export interface UserConfig {
  id: string;
  role: UserRole;
}

export interface ModelConfig {
  provider:
    | "openai-compatible"
    | "openai"
    | "anthropic"
    | "openai-codex"
    | (string & {});
  model: string;
  apiKeyEnv?: string;
  auth?: ModelAuthConfig;
  api?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  headers?: Record<string, string>;
}

export interface ApiKeyEnvAuthConfig {
  method: "api-key-env";
  apiKeyEnv: string;
}

export interface CommandAuthConfig {
  method: "command";
  command: string;
  cacheKey?: string;
  cacheTtlSeconds?: number;
  tokenStorePath?: string;
}

export type ModelAuthConfig = ApiKeyEnvAuthConfig | CommandAuthConfig;

export interface ReasoningConfig {
  model: ModelConfig;
  timeoutMs: number;
  maxToolSteps: number;
}

export interface ContextConfig {
  historyTurns: number;
  siblingLimit: number;
  memoryMaxChars: number;
}

export interface MemoryConfig {
  writeRetries: number;
}

export interface LiteratureConfig {
  provider: "exa";
  apiKeyEnv: string;
  numResults: number;
  timeoutMs: number;
}

export interface ConversionConfig {
  command: string;
  args: string[];
  timeoutMs: number;
}

export interface LabbookConfig {
  storage: {
    dataRoot: string;
  };
  users: UserConfig[];
  reasoning: ReasoningConfig;
  context: ContextConfig;
  memory: MemoryConfig;
  literature?: LiteratureConfig;
  conversion?: ConversionConfig;
}

export interface ProjectRecord {
  id: string;
  name: string;
  ownerId: string;
  description: string;
  createdAt: string;
  rootDir: string;
  sharedWith: string[];
  admins: string[];
}

export interface ProjectCatalogFile {
  version: 1;
  projects: ProjectRecord[];
  updatedAt: string;
}

export type ConversionStatus = "success" | "not_needed" | "failed";

export interface ConversionOutcome {
  status: ConversionStatus;
  method?: string;
  error?: string;
}

export interface RegistryEntry {
  originalName: string;
  /** Relative to the experiment folder. */
  originalPath: string;
  convertedPath?: string;
  originalHash: string;
  convertedHash?: string;
  sizeBytes: number;
  conversion: ConversionOutcome;
  summary?: string;
  analysis: {
    status: "pending" | "analyzed";
    updatedAt?: string;
  };
  registeredAt: string;
  updatedAt: string;
}

export interface FileRegistry {
  version: 1;
  experimentId: string;
  displayName: string;
  files: Record<string, RegistryEntry>;
  createdAt: string;
  updatedAt: string;
}

export interface RegistryEntryView extends RegistryEntry {
  stale: boolean;
}

export interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
  timestamp: string;
}

export interface LiteratureHit {
  title: string;
  url: string;
  snippet?: string;
}

export type ToolName = "list_directory" | "read_file" | "read_memory" | "search_literature" | "describe_file";

export interface ToolRequest {
  tool: ToolName;
  argument: string;
  /** describe_file only: what the file contains. */
  summary?: string;
}

export interface ToolRecord extends ToolRequest {
  ok: boolean;
  output: string;
}

export interface ExperimentSummary {
  id: string;
  name: string;
  statusSummary: string;
  fileCount: number;
  updatedAt: string;
}

export interface SelectedFileContext {
  /** Project-relative path. */
  path: string;
  entry?: RegistryEntryView;
}

export interface ExperimentMemoryView {
  id: string;
  name: string;
  memory: string;
}

export interface ContextBundle {
  project: { id: string; name: string };
  /** Project-relative current folder, "." for the root. */
  location: string;
  current?: ExperimentMemoryView & { memoryAvailable: boolean };
  siblings: ExperimentSummary[];
  referenced: ExperimentMemoryView[];
  selectedFiles: SelectedFileContext[];
  history: ConversationTurn[];
  notices: string[];
}

export interface ContextSelection {
  includeSiblings: boolean;
  /** Experiment names or ids whose full memory the turn needs. */
  experiments: string[];
}

export type StepDecision =
  | { kind: "tool"; request: ToolRequest }
  | { kind: "answer"; answer: string; memoryUpdate?: string };
