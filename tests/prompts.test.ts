import { describe, it, expect } from "vitest";
import {
  DEFAULT_PROMPTS,
  createPromptCatalog,
  defaultPromptFor,
  normalizeSpec,
  parseTemplateCatalog,
} from "../src/config/prompts.js";
import { ValidationError } from "../src/lib/errors.js";

const catalog = createPromptCatalog();

describe("prompt catalog", () => {
  it("lists templates by category", () => {
    const listing = catalog.listTemplates();
    expect(Object.keys(listing.categories)).toEqual([
      "software_development",
      "business_analysis",
      "creative_content",
      "specialized_domain",
    ]);
    expect(listing.categories["software_development"]).toEqual([
      "senior_fullstack",
      "frontend_specialist",
      "backend_architect",
      "devops_engineer",
    ]);
    expect(listing.all).toHaveLength(13);
  });

  it("looks up a template by name", () => {
    expect(catalog.getTemplate("senior_fullstack")).toMatch(
      /^You are a senior full-stack developer with 10\+ years of experience in modern web technologies\./,
    );
    expect(catalog.getTemplate("nope")).toBeNull();
  });

  it("prefers a template over a custom prompt", () => {
    const prompt = catalog.resolveSystemPrompt({ type: "coder", systemPrompt: "X", template: "senior_fullstack" });
    expect(prompt).toBe(catalog.getTemplate("senior_fullstack"));
  });

  it("prefers a custom prompt over the type default", () => {
    expect(catalog.resolveSystemPrompt({ type: "coder", systemPrompt: "Be terse." })).toBe("Be terse.");
  });

  it("falls back to the type default", () => {
    expect(catalog.resolveSystemPrompt({ type: "analyzer" })).toBe(DEFAULT_PROMPTS.analyzer);
  });

  it("uses the general prompt for custom types", () => {
    expect(defaultPromptFor("translator")).toBe(DEFAULT_PROMPTS.general);
  });

  it("rejects an unknown template and names the available ones", () => {
    const attempt = () => catalog.resolveSystemPrompt({ type: "coder", template: "wizard" });
    expect(attempt).toThrow(ValidationError);
    expect(attempt).toThrow(/^Unknown template 'wizard'\. Available: senior_fullstack, frontend_specialist/);
  });
});

describe("parseTemplateCatalog", () => {
  it("rejects a non-object catalog", () => {
    expect(() => parseTemplateCatalog([])).toThrow("template catalog must be an object of categories");
  });

  it("rejects empty template text", () => {
    expect(() => parseTemplateCatalog({ dev: { blank: "  " } })).toThrow("template 'dev.blank' must be a non-empty string");
  });

  it("rejects a name used in two categories", () => {
    expect(() => parseTemplateCatalog({ a: { x: "one" }, b: { x: "two" } })).toThrow("duplicate template name 'x'");
  });
});

describe("normalizeSpec", () => {
  it("drops empty and blank fields", () => {
    expect(normalizeSpec({ type: " ", model: "", deployment: "d1", template: " senior_fullstack " })).toEqual({
      deployment: "d1",
      template: "senior_fullstack",
    });
  });
});
