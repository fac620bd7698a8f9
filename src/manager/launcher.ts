/**
 * Container Launcher — starts an agent container with its environment and
 * port binding, and tears it down again.
 */

import { existsSync } from "fs";
import { ConfigurationError, LaunchError, ManagerError, errorMessage } from "../lib/errors.js";
import { createLogger } from "../lib/logger.js";
import { isBackendConfigured, type BackendConfig, type ContainerSettings } from "../config/env.js";
import type { PortAllocator } from "./port-allocator.js";
import type { ContainerRuntime, LaunchSpec } from "./runtime.js";

const log = createLogger("launcher");

export interface LaunchRequest {
  agentId: string;
  name: string;
  type: string;
  model: string;
  deployment: string;
  systemPrompt: string;
}

export interface LaunchedContainer {
  containerRef: string;
  hostPort: number;
}

export interface ContainerLauncher {
  start(req: LaunchRequest): Promise<LaunchedContainer>;
  stop(containerRef: string): Promise<void>;
}

export interface LauncherDeps {
  runtime: ContainerRuntime;
  ports: PortAllocator;
  container: ContainerSettings;
  backend: BackendConfig;
}

export function buildLaunchSpec(req: LaunchRequest, container: ContainerSettings, backend: BackendConfig): LaunchSpec {
  return {
    name: req.name,
    image: container.image,
    command: container.command,
    env: {
      AGENT_ID: req.agentId,
      AGENT_TYPE: req.type,
      MODEL_NAME: req.model,
      AZURE_DEPLOYMENT_NAME: req.deployment,
      AZURE_OPENAI_ENDPOINT: backend.endpoint,
      AZURE_OPENAI_API_KEY: backend.apiKey,
      AZURE_OPENAI_API_VERSION: backend.apiVersion,
      CUSTOM_SYSTEM_PROMPT: req.systemPrompt,
    },
    internalPort: container.internalPort,
    memoryBytes: container.memoryBytes,
    binds: container.scriptPath ? [`${container.scriptPath}:${container.scriptMount}:ro`] : [],
  };
}

export function createContainerLauncher(deps: LauncherDeps): ContainerLauncher {
  const { runtime, ports, container, backend } = deps;

  async function stop(containerRef: string): Promise<void> {
    try {
      await runtime.stop(containerRef, container.stopGraceSec);
    } catch (err) {
      throw new LaunchError(`Failed to stop container ${containerRef}: ${errorMessage(err)}`, { cause: err });
    }
    log.info("container stopped", { ref: containerRef });
  }

  return {
    async start(req) {
      if (!isBackendConfigured(backend)) {
        throw new ConfigurationError("AI backend not configured: AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_API_KEY are required");
      }
      if (container.scriptPath && !existsSync(container.scriptPath)) {
        throw new LaunchError(`Agent script not found: ${container.scriptPath}`);
      }

      const spec = buildLaunchSpec(req, container, backend);
      let containerRef: string;
      try {
        containerRef = await runtime.start(spec);
      } catch (err) {
        throw new LaunchError(`Failed to start container from ${spec.image}: ${errorMessage(err)}`, { cause: err });
      }

      try {
        const hostPort = await ports.allocate(containerRef, container.internalPort);
        log.info("container launched", { agentId: req.agentId, ref: containerRef, hostPort });
        return { containerRef, hostPort };
      } catch (err) {
        await stop(containerRef).catch((stopErr: unknown) => {
          log.warn("failed to stop container after port allocation failure", {
            ref: containerRef,
            error: errorMessage(stopErr),
          });
        });
        if (err instanceof ManagerError) throw err;
        throw new LaunchError(`Port allocation failed: ${errorMessage(err)}`, { cause: err });
      }
    },

    stop,
  };
}
