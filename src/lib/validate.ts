/**
 * Input validation helpers for Express routes.
 * Each returns the validated value, or null if validation failed (response already sent).
 */

import type { Request, Response } from "express";
import { ValidationError } from "./errors.js";
import { isRecord } from "./json.js";

interface StringOpts {
  required?: boolean;
  maxLen?: number;
  defaultVal?: string;
  /** Other body keys accepted for the same field, checked in order after `field` */
  aliases?: string[];
  pattern?: RegExp;
  /** Keep surrounding whitespace (prompts and messages) */
  raw?: boolean;
}

function reject(res: Response, message: string): null {
  const err = new ValidationError(message);
  res.status(err.status).json(err.toJSON());
  return null;
}

export function validateString(
  req: Request,
  res: Response,
  field: string,
  opts: StringOpts = {},
): string | null {
  const body: unknown = req.body;
  const record = isRecord(body) ? body : {};
  const key = [field, ...(opts.aliases ?? [])].find((k) => record[k] !== undefined && record[k] !== null);
  let input: string | undefined;
  if (key !== undefined) {
    const v = record[key];
    if (typeof v !== "string") return reject(res, `Field '${key}' must be a string`);
    input = v;
  }

  const val = opts.raw ? input : input?.trim();

  if (!val?.trim() && opts.required) {
    return reject(res, `Missing required field '${field}'`);
  }

  const result = val && val.trim() ? val : (opts.defaultVal ?? "");

  if (opts.maxLen && result.length > opts.maxLen) {
    return reject(res, `Field '${key ?? field}' exceeds max length ${opts.maxLen}`);
  }
  if (result && opts.pattern && !opts.pattern.test(result)) {
    return reject(res, `Field '${key ?? field}' has an invalid format`);
  }

  return result;
}
