/**
 * Health Prober — one bounded GET /health per probe, no retries.
 * `waitUntilHealthy` is the startup budget built on top of it.
 */

import { errorMessage } from "../lib/errors.js";
import { isRecord, parseJson } from "../lib/json.js";
import { sleep } from "../lib/retry.js";
import type { ProbeResult } from "../types/index.js";

const HEALTHY_STATUSES = new Set(["healthy", "ok"]);

export interface HealthProber {
  probe(baseUrl: string): Promise<ProbeResult>;
  waitUntilHealthy(baseUrl: string, budget: StartupBudget): Promise<ProbeResult>;
}

export interface StartupBudget {
  attempts: number;
  intervalMs: number;
  /** Checked between probes; polling stops early once it returns true */
  isCancelled?: () => boolean;
}

export function isTimeout(err: unknown): boolean {
  const name = isRecord(err) ? err["name"] : undefined;
  return name === "TimeoutError" || name === "AbortError";
}

export function createHealthProber(opts: { timeoutMs: number }): HealthProber {
  async function probe(baseUrl: string): Promise<ProbeResult> {
    const started = Date.now();
    const done = (result: Omit<ProbeResult, "checkedAt" | "latencyMs">): ProbeResult => ({
      ...result,
      checkedAt: new Date().toISOString(),
      latencyMs: Date.now() - started,
    });

    let status: number;
    let text: string;
    try {
      const res = await fetch(`${baseUrl}/health`, { signal: AbortSignal.timeout(opts.timeoutMs) });
      status = res.status;
      text = await res.text();
    } catch (err) {
      return done({
        state: "unreachable",
        detail: isTimeout(err) ? `timed out after ${opts.timeoutMs}ms` : errorMessage(err),
      });
    }

    if (status < 200 || status >= 300) {
      return done({ state: "degraded", detail: `HTTP ${status}` });
    }

    const body = parseJson(text);
    if (!isRecord(body)) {
      return done({ state: "degraded", detail: "malformed health payload" });
    }
    const reported = body["status"];
    if (typeof reported !== "string" || !HEALTHY_STATUSES.has(reported)) {
      return done({ state: "degraded", detail: `reported status: ${String(reported)}` });
    }
    return done({ state: "healthy", payload: body });
  }

  return {
    probe,

    async waitUntilHealthy(baseUrl, budget) {
      const attempts = Math.max(1, budget.attempts);
      const cancelled = budget.isCancelled ?? (() => false);
      let last = await probe(baseUrl);
      for (let i = 1; i < attempts && last.state !== "healthy" && !cancelled(); i++) {
        await sleep(budget.intervalMs);
        if (cancelled()) break;
        last = await probe(baseUrl);
      }
      return last;
    },
  };
}
