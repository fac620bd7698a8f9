// ─── Agents ──────────────────────────────────────────────────────────────────

export const BUILTIN_AGENT_TYPES = ["coder", "general", "analyzer", "creative"] as const;
export type BuiltinAgentType = typeof BUILTIN_AGENT_TYPES[number];

export type AgentStatus = "starting" | "running" | "unhealthy" | "stopped";

export interface AgentEndpoint {
  host: string;
  port: number;
  url: string;
}

export interface Agent {
  id: string;
  name: string;
  /** A built-in type or a caller-supplied label */
  type: string;
  model: string;
  deployment: string;
  systemPrompt: string;
  template: string | null;
  containerRef: string;
  endpoint: AgentEndpoint;
  status: AgentStatus;
  createdAt: string;
  lastHealthCheck: string | null;
}

/** Creation request as the core receives it. Empty strings count as absent. */
export interface AgentSpec {
  type?: string;
  model?: string;
  deployment?: string;
  systemPrompt?: string;
  template?: string;
}

// ─── Health ──────────────────────────────────────────────────────────────────

export type HealthState = "healthy" | "unreachable" | "degraded";

export interface ProbeResult {
  state: HealthState;
  checkedAt: string;
  latencyMs: number;
  detail?: string;
  /** Body of a healthy response */
  payload?: Record<string, unknown>;
}

export interface HealthReport {
  agentId: string;
  status: AgentStatus;
  health: ProbeResult;
}

// ─── Chat ────────────────────────────────────────────────────────────────────

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatReply {
  response: string;
  /** Which AI backend the container used, e.g. "azure_openai" */
  backend: string | null;
  model: string | null;
  deployment: string | null;
  timestamp: string;
  usage: TokenUsage | null;
}

export interface ChatResult {
  agentId: string;
  reply: ChatReply;
}

// ─── Templates ───────────────────────────────────────────────────────────────

/** category → template name → prompt text */
export type TemplateCatalog = Readonly<Record<string, Readonly<Record<string, string>>>>;

export interface TemplateListing {
  categories: Record<string, string[]>;
  all: string[];
}
