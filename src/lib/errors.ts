/**
 * Error taxonomy for the agent manager.
 *
 * Every failure the core reports is a `ManagerError` carrying a stable `code`
 * and the HTTP `status` the boundary layer answers with, so routes never need
 * to inspect message text.
 */

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "LAUNCH_ERROR"
  | "PORT_ALLOCATION_ERROR"
  | "STARTUP_TIMEOUT"
  | "UNREACHABLE"
  | "TIMEOUT"
  | "UPSTREAM_ERROR";

export abstract class ManagerError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON(): { success: false; error: string; code: ErrorCode } {
    return { success: false, error: this.message, code: this.code };
  }
}

/** Upstream AI backend endpoint or credential missing. Fatal for create only. */
export class ConfigurationError extends ManagerError {
  readonly code = "CONFIGURATION_ERROR";
  readonly status = 503;
}

export class ValidationError extends ManagerError {
  readonly code = "VALIDATION_ERROR";
  readonly status = 400;
}

export class NotFoundError extends ManagerError {
  readonly code = "NOT_FOUND";
  readonly status = 404;

  constructor(readonly agentId: string) {
    super(`Agent not found: ${agentId}`);
  }
}

export class ConflictError extends ManagerError {
  readonly code = "CONFLICT";
  readonly status = 409;
}

export class LaunchError extends ManagerError {
  readonly code = "LAUNCH_ERROR";
  readonly status = 502;
}

export class PortAllocationError extends ManagerError {
  readonly code = "PORT_ALLOCATION_ERROR";
  readonly status = 502;
}

export class StartupTimeoutError extends ManagerError {
  readonly code = "STARTUP_TIMEOUT";
  readonly status = 504;
}

/** Connection-level failure talking to a registered agent. */
export class UnreachableError extends ManagerError {
  readonly code = "UNREACHABLE";
  readonly status = 502;
}

export class AgentTimeoutError extends ManagerError {
  readonly code = "TIMEOUT";
  readonly status = 504;
}

/** The agent answered, but with an error (usually relayed from the AI backend). */
export class UpstreamError extends ManagerError {
  readonly code = "UPSTREAM_ERROR";
  readonly status = 502;

  constructor(message: string, readonly upstreamStatus: number | null, options?: ErrorOptions) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
