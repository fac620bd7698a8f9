/**
 * Lifecycle Controller — composes launcher, prober, chat proxy and registry
 * into the operations the HTTP layer exposes.
 *
 * Same-id operations are serialized by a keyed lock held across the registry
 * read-modify-write (and the container stop in delete), never across chat or
 * probe calls. Different ids never wait on each other.
 */

import { randomUUID } from "crypto";
import {
  ConflictError,
  NotFoundError,
  StartupTimeoutError,
  UnreachableError,
  ValidationError,
  errorMessage,
} from "../lib/errors.js";
import { createKeyedLock } from "../lib/keyed-lock.js";
import { createLogger } from "../lib/logger.js";
import { normalizeSpec, type PromptCatalog } from "../config/prompts.js";
import type { Agent, AgentSpec, ChatReply, ChatResult, HealthReport } from "../types/index.js";
import type { ChatProxy } from "./chat-proxy.js";
import type { HealthProber } from "./health.js";
import type { ContainerLauncher } from "./launcher.js";
import type { Registry } from "./registry.js";

const log = createLogger("lifecycle");

export const DEFAULT_AGENT_TYPE = "coder";
export const DEFAULT_USER_ID = "api_user";

export interface ManagerSettings {
  defaultModel: string;
  defaultDeployment: string;
  /** Host the agents' published ports are reached at */
  publicHost: string;
  namePrefix: string;
  startup: { attempts: number; intervalMs: number };
}

export interface ManagerDeps {
  registry: Registry;
  launcher: ContainerLauncher;
  prober: HealthProber;
  chatProxy: ChatProxy;
  prompts: PromptCatalog;
  settings: ManagerSettings;
}

export interface AgentManager {
  createAgent(spec: AgentSpec): Promise<Agent>;
  listAgents(): Agent[];
  getAgent(id: string): Agent;
  /** Stops the container and unregisters the agent; returns its final (stopped) record */
  deleteAgent(id: string): Promise<Agent>;
  checkHealth(id: string): Promise<HealthReport>;
  chat(id: string, message: string, userId?: string): Promise<ChatResult>;
  /** Refuses further creates and stops every container this manager owns */
  shutdown(): Promise<void>;
}

export function createAgentManager(deps: ManagerDeps): AgentManager {
  const { registry, launcher, prober, chatProxy, prompts, settings } = deps;
  const lock = createKeyedLock();
  /** agent id → container ref, for containers started but not yet registered */
  const provisioning = new Map<string, string>();
  let closing = false;

  async function rollback(agentId: string, containerRef: string, reason: string): Promise<void> {
    await launcher.stop(containerRef).catch((err: unknown) => {
      log.warn("failed to stop container during rollback", { agentId, ref: containerRef, reason, error: errorMessage(err) });
    });
  }

  async function markUnhealthy(id: string, checkedAt: string): Promise<void> {
    await lock.run(id, async () => {
      if (!registry.has(id)) return;
      registry.setStatus(id, "unhealthy", checkedAt);
    });
  }

  return {
    async createAgent(spec) {
      if (closing) throw new ConflictError("Manager is shutting down");

      const normalized = normalizeSpec(spec);
      const type = normalized.type ?? DEFAULT_AGENT_TYPE;
      const systemPrompt = prompts.resolveSystemPrompt({
        type,
        systemPrompt: normalized.systemPrompt,
        template: normalized.template,
      });

      const id = randomUUID();
      const name = `${settings.namePrefix}${id.slice(0, 8)}`;
      const model = normalized.model ?? settings.defaultModel;
      const deployment = normalized.deployment ?? settings.defaultDeployment;
      const agentLog = log.child({ agentId: id });

      agentLog.info("creating agent", { type, model, deployment, template: normalized.template ?? null });

      const { containerRef, hostPort } = await launcher.start({ agentId: id, name, type, model, deployment, systemPrompt });
      provisioning.set(id, containerRef);

      const abortIfClosing = async (): Promise<void> => {
        if (!closing) return;
        await rollback(id, containerRef, "shutdown");
        throw new ConflictError("Manager is shutting down");
      };

      try {
        await abortIfClosing();
        const url = `http://${settings.publicHost}:${hostPort}`;
        const health = await prober.waitUntilHealthy(url, { ...settings.startup, isCancelled: () => closing });

        await abortIfClosing();
        if (health.state !== "healthy") {
          await rollback(id, containerRef, "startup timeout");
          throw new StartupTimeoutError(
            `Agent ${name} did not become healthy after ${settings.startup.attempts} probes (${health.detail ?? health.state})`,
          );
        }

        const agent = registry.put({
          id,
          name,
          type,
          model,
          deployment,
          systemPrompt,
          template: normalized.template ?? null,
          containerRef,
          endpoint: { host: settings.publicHost, port: hostPort, url },
          status: "running",
          createdAt: new Date().toISOString(),
          lastHealthCheck: health.checkedAt,
        });
        agentLog.info("agent running", { url, ref: containerRef });
        return agent;
      } finally {
        provisioning.delete(id);
      }
    },

    listAgents() {
      return registry.list();
    },

    getAgent(id) {
      return registry.get(id);
    },

    deleteAgent(id) {
      return lock.run(id, async () => {
        const agent = registry.get(id);
        await launcher.stop(agent.containerRef);
        const stopped = registry.setStatus(id, "stopped");
        registry.remove(id);
        log.info("agent deleted", { agentId: id, ref: agent.containerRef });
        return stopped;
      });
    },

    async checkHealth(id) {
      const agent = registry.get(id);
      const health = await prober.probe(agent.endpoint.url);

      return lock.run(id, async () => {
        // Deleted while the probe was in flight
        if (!registry.has(id)) throw new NotFoundError(id);
        const next = health.state === "healthy" ? "running" : "unhealthy";
        const updated = registry.setStatus(id, next, health.checkedAt);
        if (next !== agent.status) {
          log.info("agent status changed", { agentId: id, from: agent.status, to: next, detail: health.detail });
        }
        return { agentId: id, status: updated.status, health };
      });
    },

    async chat(id, message, userId = DEFAULT_USER_ID) {
      if (!message.trim()) throw new ValidationError("Message is required");
      const agent = registry.get(id);

      let reply: ChatReply;
      try {
        reply = await chatProxy.send(agent.endpoint.url, message, userId);
      } catch (err) {
        if (err instanceof UnreachableError) {
          log.warn("agent unreachable during chat", { agentId: id, error: err.message });
          await markUnhealthy(id, new Date().toISOString());
        }
        throw err;
      }

      return { agentId: id, reply };
    },

    async shutdown() {
      closing = true;
      const agents = registry.list();
      const pending = [...provisioning.entries()];
      log.info("shutting down", { agents: agents.length, provisioning: pending.length });

      const results = await Promise.allSettled([
        ...agents.map((a) => lock.run(a.id, async () => {
          if (!registry.has(a.id)) return;
          await launcher.stop(a.containerRef);
          registry.remove(a.id);
        })),
        ...pending.map(([, ref]) => launcher.stop(ref)),
      ]);

      for (const r of results) {
        if (r.status === "rejected") log.warn("failed to stop container on shutdown", { error: errorMessage(r.reason) });
      }
    },
  };
}
