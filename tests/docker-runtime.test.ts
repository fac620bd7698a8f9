import { beforeEach, describe, it, expect, vi } from "vitest";
import { buildCreateOptions, createDockerRuntime, parsePorts, statusOf } from "../src/manager/docker-runtime.js";
import type { LaunchSpec } from "../src/manager/runtime.js";

const engine = vi.hoisted(() => ({
  stop: vi.fn<(opts: unknown) => Promise<void>>(),
  remove: vi.fn<(opts: unknown) => Promise<void>>(),
  inspect: vi.fn<() => Promise<unknown>>(),
  getContainer: vi.fn<(ref: string) => void>(),
}));

vi.mock("dockerode", () => ({
  default: class {
    getContainer(ref: string) {
      engine.getContainer(ref);
      return { stop: engine.stop, remove: engine.remove, inspect: engine.inspect };
    }
  },
}));

function engineError(statusCode: number): Error {
  return Object.assign(new Error(`engine answered ${statusCode}`), { statusCode });
}

const spec: LaunchSpec = {
  name: "chat-agent-0d4f6c1e",
  image: "chat-agent:test",
  command: [],
  env: { AGENT_ID: "0d4f6c1e", AGENT_TYPE: "coder" },
  internalPort: 8080,
  memoryBytes: 256 * 1024 * 1024,
  binds: ["/opt/agent.py:/app/agent:ro"],
};

describe("buildCreateOptions", () => {
  it("binds the internal port to an engine-chosen host port", () => {
    const opts = buildCreateOptions(spec);
    expect(opts.ExposedPorts).toEqual({ "8080/tcp": {} });
    expect(opts.HostConfig?.PortBindings).toEqual({ "8080/tcp": [{ HostPort: "" }] });
    expect(opts.HostConfig?.Memory).toBe(268435456);
    expect(opts.HostConfig?.Binds).toEqual(["/opt/agent.py:/app/agent:ro"]);
  });

  it("renders env as KEY=value pairs", () => {
    expect(buildCreateOptions(spec).Env).toEqual(["AGENT_ID=0d4f6c1e", "AGENT_TYPE=coder"]);
  });

  it("only overrides the command when one is given", () => {
    expect(buildCreateOptions(spec).Cmd).toBeUndefined();
    expect(buildCreateOptions({ ...spec, command: ["python", "/app/agent"] }).Cmd).toEqual(["python", "/app/agent"]);
  });
});

describe("parsePorts", () => {
  it("reads the first host binding of each port", () => {
    expect(parsePorts({
      "8080/tcp": [{ HostIp: "0.0.0.0", HostPort: "49153" }, { HostIp: "::", HostPort: "49153" }],
      "9000/tcp": null,
    })).toEqual({ 8080: 49153, 9000: undefined });
  });

  it("tolerates missing port maps", () => {
    expect(parsePorts(null)).toEqual({});
  });
});

describe("statusOf", () => {
  it("reads the engine status code", () => {
    expect(statusOf(Object.assign(new Error("no such container"), { statusCode: 404 }))).toBe(404);
    expect(statusOf(new Error("plain"))).toBeNull();
    expect(statusOf("text")).toBeNull();
  });
});

describe("docker runtime", () => {
  const runtime = createDockerRuntime({ timeoutMs: 1000 });

  beforeEach(() => {
    engine.stop.mockReset().mockResolvedValue(undefined);
    engine.remove.mockReset().mockResolvedValue(undefined);
    engine.inspect.mockReset();
    engine.getContainer.mockReset();
  });

  it("stops with the grace period, then force-removes", async () => {
    await runtime.stop("abc123", 7);
    expect(engine.getContainer).toHaveBeenCalledWith("abc123");
    expect(engine.stop).toHaveBeenCalledWith({ t: 7 });
    expect(engine.remove).toHaveBeenCalledWith({ force: true });
  });

  it.each([304, 404])("treats stop answering %i as already stopped", async (status) => {
    engine.stop.mockRejectedValue(engineError(status));
    await expect(runtime.stop("abc123", 1)).resolves.toBeUndefined();
    expect(engine.remove).toHaveBeenCalledTimes(1);
  });

  it.each([404, 409])("treats remove answering %i as already removed", async (status) => {
    engine.remove.mockRejectedValue(engineError(status));
    await expect(runtime.stop("abc123", 1)).resolves.toBeUndefined();
  });

  it("surfaces other stop failures without removing", async () => {
    engine.stop.mockRejectedValue(engineError(500));
    await expect(runtime.stop("abc123", 1)).rejects.toThrow("engine answered 500");
    expect(engine.remove).not.toHaveBeenCalled();
  });

  it("surfaces other remove failures", async () => {
    engine.remove.mockRejectedValue(engineError(500));
    await expect(runtime.stop("abc123", 1)).rejects.toThrow("engine answered 500");
  });

  it("inspect maps engine state and published ports", async () => {
    engine.inspect.mockResolvedValue({
      State: { Running: true, ExitCode: 0 },
      NetworkSettings: { Ports: { "8080/tcp": [{ HostIp: "0.0.0.0", HostPort: "49160" }] } },
    });
    expect(await runtime.inspect("abc123")).toEqual({ running: true, exitCode: null, ports: { 8080: 49160 } });
  });

  it("inspect of a vanished container is null", async () => {
    engine.inspect.mockRejectedValue(engineError(404));
    expect(await runtime.inspect("abc123")).toBeNull();
  });

  it("inspect surfaces other engine errors", async () => {
    engine.inspect.mockRejectedValue(engineError(500));
    await expect(runtime.inspect("abc123")).rejects.toThrow("engine answered 500");
  });
});
