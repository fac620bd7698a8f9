import type { Application } from "express";
import type { PromptCatalog } from "../../config/prompts.js";

export function registerTemplateRoutes(app: Application, prompts: PromptCatalog): void {
  app.get("/templates", (_req, res) => {
    res.json({ success: true, templates: prompts.listTemplates() });
  });

  app.get("/templates/:name", (req, res) => {
    const name = req.params["name"] ?? "";
    const systemPrompt = prompts.getTemplate(name);
    if (systemPrompt === null) {
      res.status(404).json({ success: false, error: `Template '${name}' not found`, code: "NOT_FOUND" });
      return;
    }
    res.json({ success: true, templateName: name, systemPrompt });
  });
}
