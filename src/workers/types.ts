/**
 * Worker pool types for the shared-socket gateway
 */

import type { Server } from "node:net";

/** Slot identifier of a worker (stable across restarts and reloads) */
export type WorkerId = number;

/** Worker process state */
export enum WorkerState {
  /** Worker process launched, not yet accepting */
  Starting = "starting",
  /** Worker is accepting connections on the shared socket */
  Ready = "ready",
  /** Worker exited unexpectedly */
  Crashed = "crashed",
  /** Worker was asked to stop and is draining */
  Stopping = "stopping",
  /** Worker process is gone */
  Stopped = "stopped",
}

/** Launch description of one worker. Immutable once handed to the pool. */
export interface WorkerSpec {
  id: WorkerId;
  /** Script forked for this worker */
  entrypoint: string;
  args: string[];
  /** Working directory of the worker process */
  cwd: string;
  /** Extra environment on top of the supervisor's own */
  env: Record<string, string>;
}

export type RestartMode = "always" | "on-failure" | "never";

export interface RestartPolicy {
  mode: RestartMode;
  /** Delays (ms) indexed by restart count; the last entry repeats */
  backoffSchedule: number[];
  /** Restarts allowed inside `restartWindowMs` before the pool is degraded */
  maxRestartsPerWindow?: number;
  restartWindowMs: number;
  /** Ready duration after which a worker's restart count resets */
  stabilityWindowMs: number;
}

/** Shared listening socket the workers accept on */
export interface SocketEndpoint {
  path: string;
  mode: number;
  backlog: number;
  createdAt: number;
  server: Server;
}

/** Worker pool configuration */
export interface WorkerPoolConfig {
  restartPolicy: RestartPolicy;
  /** Time a launched worker has to report ready (ms) */
  readyTimeoutMs: number;
  /** Grace period given to old workers during a rolling reload (ms) */
  reloadGracePeriodMs: number;
  /** Wait after SIGKILL before a worker is written off (ms) */
  killTimeoutMs: number;
}

export enum PoolEventType {
  /** A worker changed state */
  Transition = "transition",
  /** Restart budget exhausted */
  Degraded = "degraded",
}

/** Emitted on every worker state transition */
export interface WorkerTransitionEvent {
  type: PoolEventType.Transition;
  workerId: WorkerId;
  /** Launch generation of the slot; a reload or restart bumps it */
  instance: number;
  from: WorkerState;
  to: WorkerState;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  pid?: number;
  restartCount: number;
  timestamp: number;
}

export interface PoolDegradedEvent {
  type: PoolEventType.Degraded;
  workerId: WorkerId;
  restarts: number;
  windowMs: number;
  timestamp: number;
}

export type PoolEvent = WorkerTransitionEvent | PoolDegradedEvent;

/** Default worker pool configuration */
export const DEFAULT_WORKER_POOL_CONFIG: WorkerPoolConfig = {
  restartPolicy: {
    mode: "always",
    backoffSchedule: [100, 500, 1_000, 5_000],
    maxRestartsPerWindow: 5,
    restartWindowMs: 60_000, // 1 minute
    stabilityWindowMs: 30_000,
  },
  readyTimeoutMs: 10_000,
  reloadGracePeriodMs: 5_000,
  killTimeoutMs: 1_000,
};
