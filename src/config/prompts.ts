/**
 * System prompt catalog: per-type defaults plus named templates grouped by category.
 *
 * Templates are read once from data/templates.json; a malformed file fails at load time.
 */

import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { ValidationError } from "../lib/errors.js";
import { isRecord } from "../lib/json.js";
import type { AgentSpec, BuiltinAgentType, TemplateCatalog, TemplateListing } from "../types/index.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const TEMPLATES_PATH = join(__dirname, "../../data/templates.json");

// ─── Type defaults ──────────────────────────────────────────────────────────

export const DEFAULT_PROMPTS: Readonly<Record<BuiltinAgentType, string>> = Object.freeze({
  general: "You are a helpful AI assistant powered by Azure OpenAI. Provide clear, accurate, and helpful responses.",
  coder: "You are an expert software developer using Azure OpenAI. Help with coding questions, debugging, and best practices. Always provide working code examples.",
  analyzer: "You are a data analyst powered by Azure OpenAI. Help analyze information, create summaries, and extract actionable insights.",
  creative: "You are a creative writer using Azure OpenAI. Help with storytelling, creative writing, and imaginative content creation.",
});

function isBuiltinType(type: string): type is BuiltinAgentType {
  return Object.hasOwn(DEFAULT_PROMPTS, type);
}

/** Custom type labels fall back to the general prompt. */
export function defaultPromptFor(type: string): string {
  return isBuiltinType(type) ? DEFAULT_PROMPTS[type] : DEFAULT_PROMPTS.general;
}

// ─── Templates ──────────────────────────────────────────────────────────────

export function parseTemplateCatalog(raw: unknown): TemplateCatalog {
  if (!isRecord(raw)) throw new Error("template catalog must be an object of categories");

  const catalog: Record<string, Readonly<Record<string, string>>> = {};
  const seen = new Set<string>();

  for (const [category, entries] of Object.entries(raw)) {
    if (!isRecord(entries)) throw new Error(`template category '${category}' must be an object`);
    const templates: Record<string, string> = {};
    for (const [name, text] of Object.entries(entries)) {
      if (typeof text !== "string" || !text.trim()) {
        throw new Error(`template '${category}.${name}' must be a non-empty string`);
      }
      if (seen.has(name)) throw new Error(`duplicate template name '${name}'`);
      seen.add(name);
      templates[name] = text;
    }
    catalog[category] = Object.freeze(templates);
  }

  return Object.freeze(catalog);
}

export function loadTemplates(path: string = TEMPLATES_PATH): TemplateCatalog {
  const text = readFileSync(path, "utf-8");
  return parseTemplateCatalog(JSON.parse(text));
}

export interface PromptCatalog {
  listTemplates(): TemplateListing;
  /** Template text by name, or null when unknown */
  getTemplate(name: string): string | null;
  /** Template > custom prompt > type default */
  resolveSystemPrompt(spec: { type: string; systemPrompt?: string; template?: string }): string;
}

export function createPromptCatalog(catalog: TemplateCatalog = loadTemplates()): PromptCatalog {
  const byName = new Map<string, string>();
  for (const entries of Object.values(catalog)) {
    for (const [name, text] of Object.entries(entries)) byName.set(name, text);
  }

  return {
    listTemplates() {
      const categories: Record<string, string[]> = {};
      for (const [category, entries] of Object.entries(catalog)) {
        categories[category] = Object.keys(entries);
      }
      return { categories, all: [...byName.keys()] };
    },

    getTemplate(name) {
      return byName.get(name) ?? null;
    },

    resolveSystemPrompt(spec) {
      if (spec.template) {
        const text = byName.get(spec.template);
        if (text === undefined) {
          throw new ValidationError(
            `Unknown template '${spec.template}'. Available: ${[...byName.keys()].join(", ")}`,
          );
        }
        return text;
      }
      if (spec.systemPrompt) return spec.systemPrompt;
      return defaultPromptFor(spec.type);
    },
  };
}

/** Empty strings count as absent. */
export function normalizeSpec(spec: AgentSpec): AgentSpec {
  const out: AgentSpec = {};
  for (const key of ["type", "model", "deployment", "systemPrompt", "template"] as const) {
    const v = spec[key]?.trim();
    if (v) out[key] = v;
  }
  return out;
}
