import dotenv from "dotenv";
import { createLogger } from "../lib/logger.js";

dotenv.config();

const log = createLogger("config");

export interface BackendConfig {
  endpoint: string;
  apiKey: string;
  apiVersion: string;
  defaultDeployment: string;
}

export interface ContainerSettings {
  image: string;
  /** Overrides the image's default command when non-empty */
  command: string[];
  /** Host path of an agent script to bind-mount read-only, or "" */
  scriptPath: string;
  scriptMount: string;
  internalPort: number;
  memoryBytes: number;
  namePrefix: string;
  stopGraceSec: number;
}

export interface AppConfig {
  server: {
    port: number;
    host: string;
    /** Host agents are reached at; the container's published ports live here */
    publicHost: string;
  };
  corsOrigins: string[];
  backend: BackendConfig;
  defaults: {
    model: string;
  };
  container: ContainerSettings;
  health: {
    timeoutMs: number;
    startupAttempts: number;
    startupIntervalMs: number;
  };
  chat: {
    timeoutMs: number;
  };
  ports: {
    inspectAttempts: number;
    inspectBaseDelayMs: number;
  };
  docker: {
    timeoutMs: number;
  };
}

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envInt(key: string, fallback: number): number {
  const v = process.env[key];
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : fallback;
}

function envList(key: string, fallback: string): string[] {
  return env(key, fallback).split(",").map(s => s.trim()).filter(Boolean);
}

/** Accepts "agents.example.com" or "https://agents.example.com:8443" and returns the bare hostname. */
export function normalizeHost(raw: string): string {
  const trimmed = raw.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    try {
      return new URL(trimmed).hostname || "localhost";
    } catch {
      log.warn("invalid host URL, using localhost", { value: trimmed });
      return "localhost";
    }
  }
  return trimmed.split(":")[0] || "localhost";
}

export function isBackendConfigured(backend: BackendConfig): boolean {
  return backend.endpoint !== "" && backend.apiKey !== "";
}

export const config: AppConfig = Object.freeze({
  server: Object.freeze({
    port: envInt("PORT", 8080),
    host: env("HOST", "0.0.0.0"),
    publicHost: normalizeHost(env("SERVER_HOST", "localhost")),
  }),
  corsOrigins: envList("CORS_ORIGINS", "http://localhost:3000,http://127.0.0.1:3000,http://localhost:8000,http://127.0.0.1:8000"),
  backend: Object.freeze({
    endpoint: env("AZURE_OPENAI_ENDPOINT", "").trim(),
    apiKey: env("AZURE_OPENAI_API_KEY", "").trim(),
    apiVersion: env("AZURE_OPENAI_API_VERSION", "2024-02-15-preview"),
    defaultDeployment: env("AZURE_DEPLOYMENT_NAME", "gpt-4o-mini"),
  }),
  defaults: Object.freeze({
    model: env("DEFAULT_MODEL", "gpt-4o-mini"),
  }),
  container: Object.freeze({
    image: env("AGENT_IMAGE", "chat-agent:latest"),
    command: env("AGENT_COMMAND", "").split(" ").filter(Boolean),
    scriptPath: env("AGENT_SCRIPT", ""),
    scriptMount: env("AGENT_SCRIPT_MOUNT", "/app/agent"),
    internalPort: envInt("AGENT_INTERNAL_PORT", 8080),
    memoryBytes: envInt("AGENT_MEMORY_MB", 512) * 1024 * 1024,
    namePrefix: "chat-agent-",
    stopGraceSec: envInt("AGENT_STOP_GRACE_SEC", 10),
  }),
  health: Object.freeze({
    timeoutMs: envInt("HEALTH_TIMEOUT_MS", 3000),
    startupAttempts: envInt("STARTUP_PROBE_ATTEMPTS", 20),
    startupIntervalMs: envInt("STARTUP_PROBE_INTERVAL_MS", 1000),
  }),
  chat: Object.freeze({
    timeoutMs: envInt("CHAT_TIMEOUT_MS", 60_000),
  }),
  ports: Object.freeze({
    inspectAttempts: envInt("PORT_INSPECT_ATTEMPTS", 5),
    inspectBaseDelayMs: envInt("PORT_INSPECT_DELAY_MS", 200),
  }),
  docker: Object.freeze({
    timeoutMs: envInt("DOCKER_TIMEOUT_MS", 30_000),
  }),
});
