import type { AppConfig } from "../../src/config/env.js";

/** Small budgets so failure paths finish quickly; agents are reached on 127.0.0.1. */
export function testConfig(): AppConfig {
  return {
    server: { port: 0, host: "127.0.0.1", publicHost: "127.0.0.1" },
    corsOrigins: ["http://localhost:3000"],
    backend: {
      endpoint: "https://backend.test",
      apiKey: "test-secret",
      apiVersion: "2024-02-15-preview",
      defaultDeployment: "test-deployment",
    },
    defaults: { model: "gpt-4o-mini" },
    container: {
      image: "chat-agent:test",
      command: [],
      scriptPath: "",
      scriptMount: "/app/agent",
      internalPort: 8080,
      memoryBytes: 512 * 1024 * 1024,
      namePrefix: "chat-agent-",
      stopGraceSec: 1,
    },
    health: { timeoutMs: 500, startupAttempts: 3, startupIntervalMs: 20 },
    chat: { timeoutMs: 300 },
    ports: { inspectAttempts: 3, inspectBaseDelayMs: 5 },
    docker: { timeoutMs: 1000 },
  };
}
