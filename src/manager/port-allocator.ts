/**
 * Reads back the host port the engine bound to a container's internal port.
 *
 * The binding can lag behind `start`, so inspection is retried with backoff.
 * A container that is gone or has exited fails at once: no amount of waiting
 * will publish its port.
 */

import { LaunchError, PortAllocationError, errorMessage } from "../lib/errors.js";
import { retryWithBackoff } from "../lib/retry.js";
import { createLogger } from "../lib/logger.js";
import type { ContainerRuntime, ContainerState } from "./runtime.js";

const log = createLogger("ports");

export interface PortAllocatorOpts {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

export interface PortAllocator {
  allocate(containerRef: string, internalPort: number): Promise<number>;
}

class PortNotBoundYet extends Error {}

export function createPortAllocator(runtime: ContainerRuntime, opts: PortAllocatorOpts): PortAllocator {
  return {
    async allocate(containerRef, internalPort) {
      try {
        return await retryWithBackoff(async () => {
          let state: ContainerState | null;
          try {
            state = await runtime.inspect(containerRef);
          } catch (err) {
            throw new LaunchError(`Failed to inspect container ${containerRef}: ${errorMessage(err)}`, { cause: err });
          }
          if (!state) {
            throw new LaunchError(`Container ${containerRef} disappeared right after starting`);
          }
          if (!state.running) {
            throw new LaunchError(
              `Container ${containerRef} exited right after starting (exit code ${state.exitCode ?? "unknown"})`,
            );
          }
          const hostPort = state.ports[internalPort];
          if (hostPort === undefined) throw new PortNotBoundYet();
          return hostPort;
        }, {
          attempts: opts.attempts,
          baseDelayMs: opts.baseDelayMs,
          maxDelayMs: opts.maxDelayMs ?? 2000,
          shouldRetry: (err) => err instanceof PortNotBoundYet,
          onRetry: (_err, attempt, delayMs) => {
            log.debug("port not bound yet", { ref: containerRef, attempt, delayMs });
          },
        });
      } catch (err) {
        if (err instanceof PortNotBoundYet) {
          throw new PortAllocationError(
            `No host port bound to ${internalPort}/tcp on container ${containerRef} after ${opts.attempts} attempts`,
          );
        }
        throw err;
      }
    },
  };
}
