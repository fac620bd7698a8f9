import { afterEach, describe, it, expect } from "vitest";
import { createChatProxy, normalizeTimestamp } from "../src/manager/chat-proxy.js";
import { AgentTimeoutError, UnreachableError, UpstreamError } from "../src/lib/errors.js";
import { startFakeAgent, type FakeAgent, type FakeAgentOpts } from "./helpers/fake-agent.js";

const agents: FakeAgent[] = [];

async function agent(opts: FakeAgentOpts = {}): Promise<FakeAgent> {
  const a = await startFakeAgent(opts);
  agents.push(a);
  return a;
}

afterEach(async () => {
  await Promise.all(agents.splice(0).map((a) => a.close()));
});

const proxy = createChatProxy({ timeoutMs: 200 });

describe("chat proxy", () => {
  it("forwards message and user id and normalizes the reply", async () => {
    const a = await agent();
    const reply = await proxy.send(a.url, "hi", "u1");
    expect(a.chatCalls).toEqual([{ message: "hi", userId: "u1" }]);
    expect(reply).toEqual({
      response: "echo: hi",
      backend: "azure_openai",
      model: "gpt-4o-mini",
      deployment: "test-deployment",
      timestamp: "2023-11-14T22:13:20.000Z",
      usage: { promptTokens: 12, completionTokens: 4, totalTokens: 16 },
    });
  });

  it("fills absent optional fields with null", async () => {
    const a = await agent({ chat: () => ({ status: 200, body: { response: "plain" } }) });
    const reply = await proxy.send(a.url, "hi", "u1");
    expect(reply.backend).toBeNull();
    expect(reply.usage).toBeNull();
    expect(reply.response).toBe("plain");
  });

  it("relays a non-2xx answer as UpstreamError with its status", async () => {
    const a = await agent({ chat: () => ({ status: 500, body: { error: "backend down" } }) });
    const err = await proxy.send(a.url, "hi", "u1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toHaveProperty("upstreamStatus", 500);
    expect(err).toHaveProperty("message", "Agent returned HTTP 500: backend down");
  });

  it("treats a 2xx carrying an error as UpstreamError", async () => {
    const a = await agent({ chat: () => ({ status: 200, body: { error: "quota exceeded" } }) });
    const err = await proxy.send(a.url, "hi", "u1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toHaveProperty("message", "Agent reported an error: quota exceeded");
  });

  it("rejects a payload without a response", async () => {
    const a = await agent({ chat: () => ({ status: 200, body: { answer: 42 } }) });
    await expect(proxy.send(a.url, "hi", "u1")).rejects.toThrow("Agent returned a malformed chat payload");
  });

  it("reports a closed port as UnreachableError", async () => {
    const a = await agent();
    await a.close();
    await expect(proxy.send(a.url, "hi", "u1")).rejects.toThrow(UnreachableError);
  });

  it("gives up after the timeout", async () => {
    const a = await agent({ hangChat: true });
    const err = await proxy.send(a.url, "hi", "u1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AgentTimeoutError);
    expect(err).toHaveProperty("message", "Agent did not answer within 200ms");
  });
});

describe("normalizeTimestamp", () => {
  it("reads epoch seconds and milliseconds", () => {
    expect(normalizeTimestamp(1_700_000_000)).toBe("2023-11-14T22:13:20.000Z");
    expect(normalizeTimestamp(1_700_000_000_000)).toBe("2023-11-14T22:13:20.000Z");
  });

  it("normalizes ISO strings", () => {
    expect(normalizeTimestamp("2026-03-01T10:00:00Z")).toBe("2026-03-01T10:00:00.000Z");
  });
});
