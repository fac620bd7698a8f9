/**
 * Terminal walkthrough of one agent's lifecycle against a running manager:
 * health → templates → create → chat → health → delete.
 *
 * Usage:
 *   tsx src/demo.ts                          # full walkthrough
 *   tsx src/demo.ts --health                 # just check the manager
 *   tsx src/demo.ts --template senior_fullstack --message "Review my API design"
 *   tsx src/demo.ts --type analyzer --keep   # leave the agent running afterwards
 */

import { config } from "./config/env.js";
import { errorMessage } from "./lib/errors.js";
import { isRecord, parseJson } from "./lib/json.js";

const args = process.argv.slice(2);

function flag(name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx !== -1 ? args[idx + 1] : undefined;
}

const baseUrl    = flag("--url") ?? `http://localhost:${config.server.port}`;
const agentType  = flag("--type") ?? "coder";
const template   = flag("--template");
const message    = flag("--message") ?? "Write a function that checks whether a string is a palindrome.";
const healthOnly = args.includes("--health");
const keep       = args.includes("--keep");

// ─── Styling ──────────────────────────────────────────────────────────────────

type ColorName = "reset" | "bold" | "dim" | "cyan" | "green" | "yellow" | "red" | "blue";

const C: Record<ColorName, string> = {
  reset:  "\x1b[0m",
  bold:   "\x1b[1m",
  dim:    "\x1b[2m",
  cyan:   "\x1b[36m",
  green:  "\x1b[32m",
  yellow: "\x1b[33m",
  red:    "\x1b[31m",
  blue:   "\x1b[34m",
};

const c   = (color: ColorName, s: string): string => `${C[color]}${s}${C.reset}`;
const b   = (s: string): string => `${C.bold}${s}${C.reset}`;
const dim = (s: string): string => `${C.dim}${s}${C.reset}`;

function step(emoji: string, label: string, detail = ""): void {
  console.log(`\n  ${emoji}  ${b(label)}${detail ? "  " + dim(detail) : ""}`);
  divider();
}

function divider(char = "─", len = 72): void {
  console.log(dim(char.repeat(len)));
}

function field(body: Record<string, unknown>, key: string): string {
  const v = body[key];
  return typeof v === "string" || typeof v === "number" || typeof v === "boolean" ? String(v) : "";
}

// ─── HTTP ─────────────────────────────────────────────────────────────────────

interface ApiResult {
  status: number;
  body: Record<string, unknown>;
}

async function call(method: string, path: string, payload?: Record<string, unknown>): Promise<ApiResult> {
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers: payload ? { "Content-Type": "application/json" } : undefined,
    body: payload ? JSON.stringify(payload) : undefined,
    signal: AbortSignal.timeout(config.chat.timeoutMs + 5000),
  });
  const parsed = parseJson(await res.text());
  return { status: res.status, body: isRecord(parsed) ? parsed : {} };
}

function fail(label: string, result: ApiResult): never {
  console.log(`  ${c("red", "✗")} ${label}: HTTP ${result.status} ${field(result.body, "code")} ${field(result.body, "error")}\n`);
  process.exit(1);
}

// ─── Walkthrough ──────────────────────────────────────────────────────────────

async function run(): Promise<void> {
  step("🏥", "Manager health", baseUrl);
  let health: ApiResult;
  try {
    health = await call("GET", "/health");
  } catch (err) {
    console.log(`  ${c("red", "●")}  manager offline: ${errorMessage(err)}`);
    console.log(`  Start it first:\n    ${c("cyan", "npm start")}\n`);
    process.exit(1);
  }
  const backendOk = health.body["backendConfigured"] === true;
  console.log(`  ${c("green", "●")}  ${field(health.body, "service")}  agents: ${field(health.body, "agents")}`);
  console.log(`  ${dim("AI backend:")} ${backendOk ? c("green", "configured") : c("yellow", "not configured")}`);
  if (healthOnly) return;

  step("📚", "Templates");
  const templates = await call("GET", "/templates");
  const listing = templates.body["templates"];
  const grouped = isRecord(listing) ? listing["categories"] : undefined;
  const categories = isRecord(grouped) ? grouped : {};
  for (const [category, names] of Object.entries(categories)) {
    console.log(`  ${c("cyan", category.padEnd(22))} ${Array.isArray(names) ? names.join(", ") : ""}`);
  }

  step("🚀", "Creating agent", template ? `template: ${template}` : `type: ${agentType}`);
  const created = await call("POST", "/agents", { type: agentType, ...(template ? { template } : {}) });
  const agent = created.body["agent"];
  if (created.status !== 201 || !isRecord(agent)) fail("create failed", created);
  const agentId = field(agent, "id");
  const location = agent["endpoint"];
  const endpoint = isRecord(location) ? field(location, "url") : "";
  console.log(`  ${c("green", "✓")} ${b(field(agent, "name"))}  ${dim(agentId)}`);
  console.log(`     ${dim("endpoint:")} ${endpoint}   ${dim("model:")} ${field(agent, "model")}   ${dim("status:")} ${field(agent, "status")}`);

  try {
    step("💬", "Chat", `"${message}"`);
    const chat = await call("POST", `/agents/${agentId}/chat`, { message, user_id: "demo_user" });
    const reply = chat.body["reply"];
    if (chat.status !== 200 || !isRecord(reply)) {
      console.log(`  ${c("red", "✗")} HTTP ${chat.status} ${field(chat.body, "code")} ${field(chat.body, "error")}`);
    } else {
      console.log(`\n${field(reply, "response")}\n`);
      console.log(`  ${dim("backend:")} ${field(reply, "backend")}  ${dim("deployment:")} ${field(reply, "deployment")}`);
    }

    step("🩺", "Agent health");
    const probe = await call("GET", `/agents/${agentId}/health`);
    const result = probe.body["health"];
    const report = isRecord(result) ? result : {};
    const healthy = field(report, "state") === "healthy";
    console.log(`  ${healthy ? c("green", "●") : c("yellow", "●")}  ${field(probe.body, "status")}  ${dim(`${field(report, "latencyMs")}ms`)}`);
  } finally {
    if (keep) {
      console.log(`\n  ${c("blue", "→")} leaving ${agentId} running (--keep)\n`);
    } else {
      step("🧹", "Deleting agent");
      const deleted = await call("DELETE", `/agents/${agentId}`);
      console.log(`  ${deleted.status === 200 ? c("green", "✓") : c("red", "✗")} ${field(deleted.body, "message") || field(deleted.body, "error")}\n`);
    }
  }
}

run().catch((err: unknown) => {
  console.error(`\n  ${c("red", "Demo failed:")} ${errorMessage(err)}\n`);
  process.exit(1);
});
