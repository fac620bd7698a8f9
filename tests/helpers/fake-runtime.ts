/**
 * In-process ContainerRuntime: each "container" is a fake agent HTTP server.
 */

import type { ContainerRuntime, ContainerState, LaunchSpec } from "../../src/manager/runtime.js";
import { startFakeAgent, type FakeAgent, type FakeAgentOpts } from "./fake-agent.js";

export interface FakeContainer {
  ref: string;
  spec: LaunchSpec;
  agent: FakeAgent;
  running: boolean;
  removed: boolean;
}

export interface FakeRuntimeOpts {
  /** Options for agents started from now on */
  agent?: FakeAgentOpts;
  failStart?: boolean;
  /** Never publish the internal port */
  withholdPort?: boolean;
  /** Container exits as soon as it starts */
  exitOnStart?: boolean;
  failStop?: boolean;
  failPing?: boolean;
}

export class FakeRuntime implements ContainerRuntime {
  readonly containers = new Map<string, FakeContainer>();
  readonly started: LaunchSpec[] = [];
  readonly stopped: string[] = [];
  opts: FakeRuntimeOpts;
  private seq = 0;

  constructor(opts: FakeRuntimeOpts = {}) {
    this.opts = opts;
  }

  async ping(): Promise<void> {
    if (this.opts.failPing) throw new Error("connect ENOENT /var/run/docker.sock");
  }

  async start(spec: LaunchSpec): Promise<string> {
    if (this.opts.failStart) throw new Error(`No such image: ${spec.image}`);
    const agent = await startFakeAgent(this.opts.agent, spec.env);
    const ref = `fake-${++this.seq}`;
    const running = !this.opts.exitOnStart;
    if (!running) await agent.close();
    this.containers.set(ref, { ref, spec, agent, running, removed: false });
    this.started.push(spec);
    return ref;
  }

  async inspect(ref: string): Promise<ContainerState | null> {
    const c = this.containers.get(ref);
    if (!c || c.removed) return null;
    return {
      running: c.running,
      exitCode: c.running ? null : 1,
      ports: { [c.spec.internalPort]: this.opts.withholdPort ? undefined : c.agent.port },
    };
  }

  async stop(ref: string): Promise<void> {
    if (this.opts.failStop) throw new Error("engine refused to stop container");
    this.stopped.push(ref);
    const c = this.containers.get(ref);
    if (!c || c.removed) return;
    c.running = false;
    c.removed = true;
    await c.agent.close();
  }

  /** Kills a container out of band; the record stays but nothing answers. */
  async kill(ref: string): Promise<void> {
    const c = this.containers.get(ref);
    if (!c) throw new Error(`unknown container ${ref}`);
    c.running = false;
    await c.agent.close();
  }

  get live(): FakeContainer[] {
    return [...this.containers.values()].filter((c) => !c.removed);
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.containers.values()].map((c) => c.agent.close()));
  }
}
