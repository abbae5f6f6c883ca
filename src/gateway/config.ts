/**
 * Gateway configuration from environment variables (and CLI overrides,
 * which use the same variable names and win over the environment).
 */

import { tmpdir } from "node:os";
import { join } from "node:path";

import { ConfigError } from "../workers/errors.js";
import { DEFAULT_WORKER_ENTRY } from "../workers/launcher.js";
import { DEFAULT_WORKER_POOL_CONFIG, type RestartMode, type RestartPolicy, type WorkerSpec } from "../workers/types.js";
import type { ListenAddress } from "./reverse-proxy.js";

/** Environment variables read by resolveConfig */
export const ENV = {
  listen: "SOCKGATE_LISTEN",
  socketPath: "SOCKGATE_SOCKET_PATH",
  socketMode: "SOCKGATE_SOCKET_MODE",
  socketGroup: "SOCKGATE_SOCKET_GROUP",
  socketBacklog: "SOCKGATE_SOCKET_BACKLOG",
  poolSize: "SOCKGATE_POOL_SIZE",
  restartPolicy: "SOCKGATE_RESTART_POLICY",
  backoff: "SOCKGATE_BACKOFF",
  maxRestarts: "SOCKGATE_MAX_RESTARTS",
  restartWindow: "SOCKGATE_RESTART_WINDOW_MS",
  stabilityWindow: "SOCKGATE_STABILITY_WINDOW_MS",
  readyTimeout: "SOCKGATE_READY_TIMEOUT_MS",
  idleTimeout: "SOCKGATE_IDLE_TIMEOUT_MS",
  reloadGrace: "SOCKGATE_RELOAD_GRACE_MS",
  workerEntry: "SOCKGATE_WORKER_ENTRY",
  appModule: "SOCKGATE_APP_MODULE",
  workerCwd: "SOCKGATE_WORKER_CWD",
  statusPort: "SOCKGATE_STATUS_PORT",
  pidFile: "SOCKGATE_PID_FILE",
} as const;

export type ConfigVariable = (typeof ENV)[keyof typeof ENV];

export type ConfigSource = Partial<Record<string, string | undefined>>;

export interface WorkerLaunchConfig {
  entrypoint: string;
  /** Application module served by the bundled worker runtime */
  appModule?: string;
  cwd: string;
}

export interface GatewayConfig {
  listen: ListenAddress;
  socketPath: string;
  socketMode: number;
  socketGroup?: number;
  socketBacklog: number;
  poolSize: number;
  restartPolicy: RestartPolicy;
  readyTimeoutMs: number;
  idleTimeoutMs: number;
  reloadGracePeriodMs: number;
  worker: WorkerLaunchConfig;
  /** Loopback status server port (0 = disabled) */
  statusPort: number;
  pidFile: string;
}

const RESTART_MODES: readonly RestartMode[] = ["always", "on-failure", "never"];

export const DEFAULT_LISTEN = "0.0.0.0:80";
export const DEFAULT_SOCKET_MODE = 0o660;
export const DEFAULT_SOCKET_BACKLOG = 511;
export const DEFAULT_POOL_SIZE = 2;
export const DEFAULT_IDLE_TIMEOUT_MS = 30_000;
export const DEFAULT_STATUS_HOST = "127.0.0.1";

export function defaultSocketPath(): string {
  return join(tmpdir(), "sockgate.sock");
}

export function defaultPidFile(): string {
  return join(tmpdir(), "sockgate.pid");
}

/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

function parseInteger(variable: string, value: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(variable, `expected a non-negative integer, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min) {
    throw new ConfigError(variable, `must be at least ${min}, got ${parsed}`);
  }
  if (parsed > max) {
    throw new ConfigError(variable, `must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

/** Parse "host:port", "[ipv6]:port" or a bare port */
export function parseListenAddress(value: string, variable: string = ENV.listen): ListenAddress {
  const trimmed = value.trim();
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d+)$/.exec(trimmed);
  if (match) {
    const host = match[1] ?? match[2];
    const port = parseInteger(variable, match[3], 0);
    if (port > 65_535) {
      throw new ConfigError(variable, `port out of range: ${port}`);
    }
    return { host: host || "0.0.0.0", port };
  }
  if (/^\d+$/.test(trimmed)) {
    return parseListenAddress(`0.0.0.0:${trimmed}`, variable);
  }
  throw new ConfigError(variable, `expected host:port, got "${value}"`);
}

/** Parse octal permission bits such as "660" or "0o660" */
export function parseMode(value: string, variable: string = ENV.socketMode): number {
  const digits = value.trim().replace(/^0o/i, "");
  if (!/^[0-7]{1,4}$/.test(digits)) {
    throw new ConfigError(variable, `expected octal permission bits, got "${value}"`);
  }
  return Number.parseInt(digits, 8);
}

/** Parse a comma-separated list of delays in ms */
export function parseBackoff(value: string, variable: string = ENV.backoff): number[] {
  const parts = value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw new ConfigError(variable, "backoff schedule is empty");
  }
  return parts.map((part) => parseInteger(variable, part, 0, MAX_TIMER_MS));
}

function parseRestartMode(value: string): RestartMode {
  const mode = RESTART_MODES.find((candidate) => candidate === value.trim());
  if (!mode) {
    throw new ConfigError(ENV.restartPolicy, `expected one of ${RESTART_MODES.join(", ")}, got "${value}"`);
  }
  return mode;
}

/**
 * Resolve the configuration: overrides > environment > defaults.
 */
export function resolveConfig(env: ConfigSource = process.env, overrides: ConfigSource = {}): GatewayConfig {
  const source: ConfigSource = { ...env };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      source[key] = value;
    }
  }
  const read = (variable: ConfigVariable): string | undefined => {
    const value = source[variable];
    return value === undefined || value.trim() === "" ? undefined : value;
  };

  const defaults = DEFAULT_WORKER_POOL_CONFIG;
  const int = (variable: ConfigVariable, fallback: number, min = 0): number => {
    const value = read(variable);
    return value === undefined ? fallback : parseInteger(variable, value, min);
  };
  const ms = (variable: ConfigVariable, fallback: number, min = 0): number => {
    const value = read(variable);
    return value === undefined ? fallback : parseInteger(variable, value, min, MAX_TIMER_MS);
  };

  const group = read(ENV.socketGroup);
  const appModule = read(ENV.appModule);
  const mode = read(ENV.restartPolicy);
  const backoff = read(ENV.backoff);
  const maxRestarts = read(ENV.maxRestarts);
  const socketMode = read(ENV.socketMode);

  return {
    listen: parseListenAddress(read(ENV.listen) ?? DEFAULT_LISTEN),
    socketPath: read(ENV.socketPath) ?? defaultSocketPath(),
    socketMode: socketMode === undefined ? DEFAULT_SOCKET_MODE : parseMode(socketMode),
    ...(group !== undefined ? { socketGroup: parseInteger(ENV.socketGroup, group, 0) } : {}),
    socketBacklog: int(ENV.socketBacklog, DEFAULT_SOCKET_BACKLOG, 1),
    poolSize: int(ENV.poolSize, DEFAULT_POOL_SIZE, 1),
    restartPolicy: {
      mode: mode === undefined ? defaults.restartPolicy.mode : parseRestartMode(mode),
      backoffSchedule: backoff === undefined ? [...defaults.restartPolicy.backoffSchedule] : parseBackoff(backoff),
      maxRestartsPerWindow:
        maxRestarts === undefined
          ? defaults.restartPolicy.maxRestartsPerWindow
          : parseInteger(ENV.maxRestarts, maxRestarts, 1),
      restartWindowMs: ms(ENV.restartWindow, defaults.restartPolicy.restartWindowMs, 1),
      stabilityWindowMs: ms(ENV.stabilityWindow, defaults.restartPolicy.stabilityWindowMs, 1),
    },
    readyTimeoutMs: ms(ENV.readyTimeout, defaults.readyTimeoutMs, 1),
    idleTimeoutMs: ms(ENV.idleTimeout, DEFAULT_IDLE_TIMEOUT_MS, 1),
    reloadGracePeriodMs: ms(ENV.reloadGrace, defaults.reloadGracePeriodMs, 0),
    worker: {
      entrypoint: read(ENV.workerEntry) ?? DEFAULT_WORKER_ENTRY,
      ...(appModule !== undefined ? { appModule } : {}),
      cwd: read(ENV.workerCwd) ?? process.cwd(),
    },
    statusPort: int(ENV.statusPort, 0, 0),
    pidFile: read(ENV.pidFile) ?? defaultPidFile(),
  };
}

/** One spec per slot, numbered from 1 */
export function buildWorkerSpecs(config: GatewayConfig): WorkerSpec[] {
  return Array.from({ length: config.poolSize }, (_, index) => {
    const id = index + 1;
    const env: Record<string, string> = {
      SOCKGATE_WORKER_ID: String(id),
      [ENV.socketPath]: config.socketPath,
    };
    if (config.worker.appModule !== undefined) {
      env[ENV.appModule] = config.worker.appModule;
    }
    return {
      id,
      entrypoint: config.worker.entrypoint,
      args: [],
      cwd: config.worker.cwd,
      env,
    };
  });
}
