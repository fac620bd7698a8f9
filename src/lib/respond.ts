import type { Response } from "express";
import { ManagerError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

/** Maps a thrown error to `{ success: false, error, code }` with the status its class carries. */
export function sendError(res: Response, err: unknown, log: Logger): void {
  if (err instanceof ManagerError) {
    if (err.status >= 500) log.warn(err.message, { code: err.code });
    res.status(err.status).json(err.toJSON());
    return;
  }
  log.error(`unexpected error: ${errorMessage(err)}`, { stack: err instanceof Error ? err.stack : undefined });
  res.status(500).json({ success: false, error: "Internal server error", code: "INTERNAL_ERROR" });
}
