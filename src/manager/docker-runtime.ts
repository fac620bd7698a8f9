import Docker from "dockerode";
import { isRecord } from "../lib/json.js";
import { createLogger } from "../lib/logger.js";
import type { ContainerRuntime, ContainerState, LaunchSpec } from "./runtime.js";

const log = createLogger("docker");

/** HTTP status carried by dockerode errors (304 not modified, 404 no such container, ...). */
export function statusOf(err: unknown): number | null {
  const status = isRecord(err) ? err["statusCode"] : undefined;
  return typeof status === "number" ? status : null;
}

export function buildCreateOptions(spec: LaunchSpec): Docker.ContainerCreateOptions {
  const portKey = `${spec.internalPort}/tcp`;
  return {
    Image: spec.image,
    name: spec.name,
    ...(spec.command.length > 0 ? { Cmd: spec.command } : {}),
    Env: Object.entries(spec.env).map(([k, v]) => `${k}=${v}`),
    ExposedPorts: { [portKey]: {} },
    HostConfig: {
      Memory: spec.memoryBytes,
      // Empty HostPort lets the engine pick a free one
      PortBindings: { [portKey]: [{ HostPort: "" }] },
      Binds: spec.binds,
    },
  };
}

export function parsePorts(raw: unknown): Record<number, number | undefined> {
  const ports: Record<number, number | undefined> = {};
  if (!isRecord(raw)) return ports;
  for (const [key, bindings] of Object.entries(raw)) {
    const internal = parseInt(key.split("/")[0] ?? "", 10);
    if (!Number.isFinite(internal)) continue;
    const first: unknown = Array.isArray(bindings) ? bindings[0] : undefined;
    const published = isRecord(first) ? first["HostPort"] : undefined;
    const hostPort = typeof published === "string" ? parseInt(published, 10) : NaN;
    ports[internal] = Number.isFinite(hostPort) && hostPort > 0 ? hostPort : undefined;
  }
  return ports;
}

export function createDockerRuntime(opts: { timeoutMs: number }): ContainerRuntime {
  const docker = new Docker({ timeout: opts.timeoutMs });

  return {
    async ping() {
      await docker.ping();
    },

    async start(spec) {
      const container = await docker.createContainer(buildCreateOptions(spec));
      try {
        await container.start();
      } catch (err) {
        await container.remove({ force: true }).catch((rmErr: unknown) => {
          log.warn("failed to remove container that did not start", { ref: container.id, status: statusOf(rmErr) });
        });
        throw err;
      }
      log.debug("container started", { ref: container.id, name: spec.name });
      return container.id;
    },

    async inspect(ref): Promise<ContainerState | null> {
      try {
        const info = await docker.getContainer(ref).inspect();
        return {
          running: info.State.Running,
          exitCode: info.State.Running ? null : info.State.ExitCode,
          ports: parsePorts(info.NetworkSettings.Ports),
        };
      } catch (err) {
        if (statusOf(err) === 404) return null;
        throw err;
      }
    },

    async stop(ref, graceSec) {
      const container = docker.getContainer(ref);
      try {
        await container.stop({ t: graceSec });
      } catch (err) {
        const status = statusOf(err);
        // 304: already stopped, 404: already gone
        if (status !== 304 && status !== 404) throw err;
      }
      try {
        await container.remove({ force: true });
      } catch (err) {
        const status = statusOf(err);
        // 409: removal already in progress
        if (status !== 404 && status !== 409) throw err;
      }
    },
  };
}
