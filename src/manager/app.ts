import { isBackendConfigured, type AppConfig } from "../config/env.js";
import { createPromptCatalog, type PromptCatalog } from "../config/prompts.js";
import { createService, type ServiceInstance } from "../lib/service-factory.js";
import { createChatProxy } from "./chat-proxy.js";
import { createHealthProber } from "./health.js";
import { createContainerLauncher } from "./launcher.js";
import { createAgentManager, type AgentManager } from "./lifecycle.js";
import { createPortAllocator } from "./port-allocator.js";
import { createRegistry } from "./registry.js";
import { registerAgentRoutes } from "./routes/agents.js";
import { registerStatusRoutes } from "./routes/status.js";
import { registerTemplateRoutes } from "./routes/templates.js";
import type { ContainerRuntime } from "./runtime.js";

export interface ManagerAppDeps {
  config: AppConfig;
  runtime: ContainerRuntime;
  prompts?: PromptCatalog;
}

export interface ManagerApp {
  service: ServiceInstance;
  manager: AgentManager;
}

/** Wires the core components and mounts every route on a fresh express service. */
export function createManagerApp(deps: ManagerAppDeps): ManagerApp {
  const { config, runtime } = deps;
  const prompts = deps.prompts ?? createPromptCatalog();

  const registry = createRegistry();
  const ports = createPortAllocator(runtime, {
    attempts: config.ports.inspectAttempts,
    baseDelayMs: config.ports.inspectBaseDelayMs,
  });
  const launcher = createContainerLauncher({
    runtime,
    ports,
    container: config.container,
    backend: config.backend,
  });

  const manager = createAgentManager({
    registry,
    launcher,
    prober: createHealthProber({ timeoutMs: config.health.timeoutMs }),
    chatProxy: createChatProxy({ timeoutMs: config.chat.timeoutMs }),
    prompts,
    settings: {
      defaultModel: config.defaults.model,
      defaultDeployment: config.backend.defaultDeployment,
      publicHost: config.server.publicHost,
      namePrefix: config.container.namePrefix,
      startup: { attempts: config.health.startupAttempts, intervalMs: config.health.startupIntervalMs },
    },
  });

  const service = createService({
    name: "manager",
    displayName: "chat-agent-manager",
    port: config.server.port,
    host: config.server.host,
    corsOrigins: config.corsOrigins,
    healthExtra: () => ({
      agents: registry.size,
      backendConfigured: isBackendConfigured(config.backend),
    }),
    onShutdown: () => manager.shutdown(),
    // Every container may need its full stop grace period
    shutdownTimeoutMs: (config.container.stopGraceSec + 20) * 1000,
  });

  registerTemplateRoutes(service.app, prompts);
  registerAgentRoutes(service.app, manager);
  registerStatusRoutes(service.app, { config, runtime, manager });

  return { service, manager };
}
