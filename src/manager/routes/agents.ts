import type { Application } from "express";
import { createLogger } from "../../lib/logger.js";
import { sendError } from "../../lib/respond.js";
import { validateString } from "../../lib/validate.js";
import { DEFAULT_USER_ID, type AgentManager } from "../lifecycle.js";

const log = createLogger("agents-api");

const LABEL = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const MAX_PROMPT_LEN = 20_000;
const MAX_MESSAGE_LEN = 32_000;

export function registerAgentRoutes(app: Application, manager: AgentManager): void {
  app.post("/agents", async (req, res) => {
    const type = validateString(req, res, "type", { aliases: ["agent_type"], maxLen: 64, pattern: LABEL });
    if (type === null) return;
    const model = validateString(req, res, "model", { aliases: ["model_name"], maxLen: 128, pattern: LABEL });
    if (model === null) return;
    const deployment = validateString(req, res, "deployment", { aliases: ["deployment_name"], maxLen: 128, pattern: LABEL });
    if (deployment === null) return;
    const systemPrompt = validateString(req, res, "system_prompt", { aliases: ["systemPrompt"], maxLen: MAX_PROMPT_LEN });
    if (systemPrompt === null) return;
    const template = validateString(req, res, "template", { maxLen: 64, pattern: LABEL });
    if (template === null) return;

    try {
      const agent = await manager.createAgent({ type, model, deployment, systemPrompt, template });
      res.status(201).json({ success: true, message: "Agent created successfully", agent });
    } catch (err) {
      sendError(res, err, log);
    }
  });

  app.get("/agents", (_req, res) => {
    const agents = manager.listAgents();
    res.json({ success: true, agents, count: agents.length });
  });

  app.get("/agents/:id", (req, res) => {
    try {
      res.json({ success: true, agent: manager.getAgent(req.params["id"] ?? "") });
    } catch (err) {
      sendError(res, err, log);
    }
  });

  app.delete("/agents/:id", async (req, res) => {
    const id = req.params["id"] ?? "";
    try {
      const agent = await manager.deleteAgent(id);
      res.json({ success: true, message: `Agent ${id} deleted successfully`, agent });
    } catch (err) {
      sendError(res, err, log);
    }
  });

  app.post("/agents/:id/chat", async (req, res) => {
    const message = validateString(req, res, "message", { required: true, raw: true, maxLen: MAX_MESSAGE_LEN });
    if (message === null) return;
    const userId = validateString(req, res, "user_id", { aliases: ["userId"], maxLen: 128, defaultVal: DEFAULT_USER_ID });
    if (userId === null) return;

    try {
      const result = await manager.chat(req.params["id"] ?? "", message, userId);
      res.json({ success: true, ...result });
    } catch (err) {
      sendError(res, err, log);
    }
  });

  app.get("/agents/:id/health", async (req, res) => {
    try {
      const report = await manager.checkHealth(req.params["id"] ?? "");
      res.json({ success: true, ...report });
    } catch (err) {
      sendError(res, err, log);
    }
  });
}
