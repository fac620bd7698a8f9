import type { Application } from "express";
import { isBackendConfigured, type AppConfig } from "../../config/env.js";
import { errorMessage } from "../../lib/errors.js";
import type { AgentManager } from "../lifecycle.js";
import type { ContainerRuntime } from "../runtime.js";

/** Non-secret view of the running configuration plus container engine reachability. */
export function registerStatusRoutes(
  app: Application,
  deps: { config: AppConfig; runtime: ContainerRuntime; manager: AgentManager },
): void {
  const { config, runtime, manager } = deps;

  app.get("/debug/config", async (_req, res) => {
    let runtimeStatus: { reachable: boolean; error?: string };
    try {
      await runtime.ping();
      runtimeStatus = { reachable: true };
    } catch (err) {
      runtimeStatus = { reachable: false, error: errorMessage(err) };
    }

    res.json({
      success: true,
      environment: {
        backendEndpoint: config.backend.endpoint || null,
        apiVersion: config.backend.apiVersion,
        defaultDeployment: config.backend.defaultDeployment,
        defaultModel: config.defaults.model,
        apiKeyPresent: config.backend.apiKey !== "",
        backendConfigured: isBackendConfigured(config.backend),
        publicHost: config.server.publicHost,
        corsOrigins: config.corsOrigins,
      },
      container: {
        image: config.container.image,
        internalPort: config.container.internalPort,
        memoryMb: Math.round(config.container.memoryBytes / (1024 * 1024)),
        scriptMounted: config.container.scriptPath !== "",
      },
      runtime: runtimeStatus,
      agentCount: manager.listAgents().length,
    });
  });
}
