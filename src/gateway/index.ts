/**
 * sockgate - reverse-proxy gateway in front of a supervised worker pool
 *
 * ```
 *   clients ──TCP──▶ ReverseProxy ──unix──▶ SocketEndpoint (one path)
 *                                               │ shared listening handle
 *                                  ┌────────────┼────────────┐
 *                                  ▼            ▼            ▼
 *                              worker 1     worker 2     worker N
 *                                  ▲            ▲            ▲
 *                                  └──── WorkerPool (restart, reload) ◀── Supervisor
 * ```
 *
 * Usage:
 * ```ts
 * import { Supervisor, resolveConfig } from "sockgate";
 *
 * const supervisor = new Supervisor({ config: resolveConfig() });
 * supervisor.installSignalHandlers();
 * process.exitCode = await supervisor.run();
 * ```
 */

// Types
export {
  type WorkerId,
  type WorkerSpec,
  type RestartMode,
  type RestartPolicy,
  type SocketEndpoint,
  type WorkerPoolConfig,
  type WorkerTransitionEvent,
  type PoolDegradedEvent,
  type PoolEvent,
  WorkerState,
  PoolEventType,
  DEFAULT_WORKER_POOL_CONFIG,
} from "../workers/types.js";

// Errors
export {
  GatewayError,
  LaunchError,
  CrashError,
  PoolDegradedError,
  UpstreamUnavailableError,
  EndpointError,
  ConfigError,
  SupervisorError,
} from "../workers/errors.js";

// Worker Pool
export { WorkerPool, type WorkerPoolEvents, type WorkerPoolOptions, type PoolStartReport } from "../workers/worker-pool.js";
export { forkLauncher, type WorkerChild, type WorkerLauncher, DEFAULT_WORKER_ENTRY } from "../workers/launcher.js";
export { WorkerRuntime, type WorkerRuntimeOptions, startWorker, resolveRequestHandler } from "../workers/worker-process.js";

// Gateway
export { createSocketEndpoint, destroySocketEndpoint, type SocketEndpointOptions } from "./socket-endpoint.js";
export { ReverseProxy, type ReverseProxyOptions, type ListenAddress, type RelayTimeout } from "./reverse-proxy.js";
export { PoolMonitor, type PoolStatus, type WorkerStatus } from "./pool-monitor.js";
export { Supervisor, SupervisorState, type SupervisorOptions, type SupervisorStatus } from "./supervisor.js";
export { createStatusServer } from "./status-server.js";
export { resolveConfig, buildWorkerSpecs, type GatewayConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
