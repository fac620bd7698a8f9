/**
 * Chat Proxy — forwards one message to an agent's POST /chat and normalizes
 * the reply. Never retried: a chat turn is not idempotent.
 */

import { AgentTimeoutError, UnreachableError, UpstreamError, errorMessage } from "../lib/errors.js";
import { isRecord, parseJson } from "../lib/json.js";
import { isTimeout } from "./health.js";
import type { ChatReply, TokenUsage } from "../types/index.js";

export interface ChatProxy {
  send(baseUrl: string, message: string, userId: string): Promise<ChatReply>;
}

function optString(value: unknown): string | null {
  return typeof value === "string" && value !== "" ? value : null;
}

/** Epoch seconds, epoch milliseconds or an ISO string → ISO string. */
export function normalizeTimestamp(value: unknown): string {
  if (typeof value === "number" && Number.isFinite(value)) {
    const ms = value < 1e12 ? value * 1000 : value;
    return new Date(ms).toISOString();
  }
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) return new Date(parsed).toISOString();
  }
  return new Date().toISOString();
}

function normalizeUsage(value: unknown): TokenUsage | null {
  if (!isRecord(value)) return null;
  const num = (key: string): number => {
    const v = value[key];
    return typeof v === "number" && Number.isFinite(v) ? v : 0;
  };
  return {
    promptTokens: num("prompt_tokens"),
    completionTokens: num("completion_tokens"),
    totalTokens: num("total_tokens"),
  };
}

export function normalizeReply(body: Record<string, unknown>): ChatReply | null {
  const response = body["response"];
  if (typeof response !== "string") return null;
  return {
    response,
    backend: optString(body["ai_backend"]),
    model: optString(body["model"]),
    deployment: optString(body["deployment"]),
    timestamp: normalizeTimestamp(body["timestamp"]),
    usage: normalizeUsage(body["usage"]),
  };
}

export function createChatProxy(opts: { timeoutMs: number }): ChatProxy {
  return {
    async send(baseUrl, message, userId) {
      let status: number;
      let text: string;
      try {
        const res = await fetch(`${baseUrl}/chat`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ message, user_id: userId }),
          signal: AbortSignal.timeout(opts.timeoutMs),
        });
        status = res.status;
        text = await res.text();
      } catch (err) {
        if (isTimeout(err)) {
          throw new AgentTimeoutError(`Agent did not answer within ${opts.timeoutMs}ms`, { cause: err });
        }
        throw new UnreachableError(`Agent unreachable at ${baseUrl}: ${errorMessage(err)}`, { cause: err });
      }

      const body = parseJson(text);
      const upstreamError = isRecord(body) ? optString(body["error"]) : null;

      if (status < 200 || status >= 300) {
        throw new UpstreamError(
          `Agent returned HTTP ${status}${upstreamError ? `: ${upstreamError}` : ""}`,
          status,
        );
      }
      if (upstreamError) {
        throw new UpstreamError(`Agent reported an error: ${upstreamError}`, status);
      }
      const reply = isRecord(body) ? normalizeReply(body) : null;
      if (!reply) {
        throw new UpstreamError("Agent returned a malformed chat payload", status);
      }
      return reply;
    },
  };
}
