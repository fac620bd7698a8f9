/**
 * In-memory agent registry. Process-wide, empty at start, never persisted.
 *
 * Records are frozen snapshots: a status change swaps in a new object, so a
 * reader holding a record never sees it change underneath it.
 */

import { ConflictError, NotFoundError } from "../lib/errors.js";
import type { Agent, AgentStatus } from "../types/index.js";

const TRANSITIONS: Readonly<Record<AgentStatus, readonly AgentStatus[]>> = {
  starting: ["running", "stopped"],
  running: ["unhealthy", "stopped"],
  unhealthy: ["running", "stopped"],
  stopped: [],
};

export function canTransition(from: AgentStatus, to: AgentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface Registry {
  put(agent: Agent): Agent;
  get(id: string): Agent;
  has(id: string): boolean;
  remove(id: string): Agent;
  list(): Agent[];
  /** Applies a status change; re-setting the current status only refreshes `lastHealthCheck`. */
  setStatus(id: string, status: AgentStatus, checkedAt?: string): Agent;
  readonly size: number;
}

export function createRegistry(): Registry {
  const agents = new Map<string, Agent>();

  function get(id: string): Agent {
    const agent = agents.get(id);
    if (!agent) throw new NotFoundError(id);
    return agent;
  }

  return {
    put(agent) {
      if (agents.has(agent.id)) throw new ConflictError(`Agent already registered: ${agent.id}`);
      const record = Object.freeze({ ...agent, endpoint: Object.freeze({ ...agent.endpoint }) });
      agents.set(record.id, record);
      return record;
    },

    get,

    has(id) {
      return agents.has(id);
    },

    remove(id) {
      const agent = get(id);
      agents.delete(id);
      return agent;
    },

    list() {
      return [...agents.values()];
    },

    setStatus(id, status, checkedAt) {
      const current = get(id);
      if (current.status !== status && !canTransition(current.status, status)) {
        throw new ConflictError(`Illegal status change for ${id}: ${current.status} → ${status}`);
      }
      const next: Agent = Object.freeze({
        ...current,
        status,
        lastHealthCheck: checkedAt ?? current.lastHealthCheck,
      });
      agents.set(id, next);
      return next;
    },

    get size() {
      return agents.size;
    },
  };
}
