/**
 * Error taxonomy for the gateway, pool and supervisor
 */

import type { WorkerId } from "./types.js";

export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

/** A worker failed to start (fork error, exit before ready, ready timeout) */
export class LaunchError extends GatewayError {
  constructor(
    public readonly workerId: WorkerId,
    cause: unknown,
  ) {
    super(`Worker ${workerId} failed to launch: ${describeCause(cause)}`, "LAUNCH_FAILED", cause);
    this.name = "LaunchError";
  }
}

/** A worker exited while Starting or Ready without being asked to */
export class CrashError extends GatewayError {
  constructor(
    public readonly workerId: WorkerId,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
  ) {
    super(`Worker ${workerId} exited unexpectedly (${describeExit(exitCode, signal)})`, "WORKER_CRASHED");
    this.name = "CrashError";
  }
}

/** Restart budget exhausted for a slot */
export class PoolDegradedError extends GatewayError {
  constructor(
    public readonly workerId: WorkerId,
    public readonly restarts: number,
    public readonly windowMs: number,
  ) {
    super(
      `Worker ${workerId} crashed after ${restarts} restarts within ${windowMs}ms; pool degraded`,
      "POOL_DEGRADED",
    );
    this.name = "PoolDegradedError";
  }
}

/** The gateway could not reach any worker for one connection */
export class UpstreamUnavailableError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, "UPSTREAM_UNAVAILABLE", cause);
    this.name = "UpstreamUnavailableError";
  }
}

export type EndpointErrorCode = "ADDRESS_IN_USE" | "PERMISSION_DENIED" | "NOT_A_SOCKET" | "ENDPOINT_FAILED";

/** Socket endpoint creation or permission failure */
export class EndpointError extends GatewayError {
  constructor(
    message: string,
    public override readonly code: EndpointErrorCode,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, code, cause);
    this.name = "EndpointError";
  }
}

export class ConfigError extends GatewayError {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(`Invalid ${variable}: ${message}`, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/** Fatal supervisor condition (startup failure or degraded pool) */
export class SupervisorError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, "SUPERVISOR_FATAL", cause);
    this.name = "SupervisorError";
  }
}

export function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  if (signal) return `signal ${signal}`;
  return typeof code === "number" ? `code ${code}` : "unknown";
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Narrow a Node system error code (ECONNREFUSED, ENOENT, ...) */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
