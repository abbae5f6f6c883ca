/**
 * Supervisor - lifecycle owner of the socket endpoint, the worker pool and
 * the gateway.
 *
 *   Initializing -> Running -> ReloadingConfig -> Running
 *                          \-> Stopping -> Stopped
 *
 * Startup failures abort at Initializing and are never retried here; a
 * degraded pool stops the supervisor with exit code 1 so the service manager
 * above restarts the whole service.
 */

import { EventEmitter } from "node:events";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { rm, writeFile } from "node:fs/promises";

import { PoolDegradedError, SupervisorError, describeCause } from "../workers/errors.js";
import type { WorkerLauncher } from "../workers/launcher.js";
import type { SocketEndpoint, WorkerSpec } from "../workers/types.js";
import { WorkerPool } from "../workers/worker-pool.js";
import { type GatewayConfig, DEFAULT_STATUS_HOST, buildWorkerSpecs } from "./config.js";
import { createLogger } from "./logger.js";
import { PoolMonitor, type PoolStatus } from "./pool-monitor.js";
import { ReverseProxy } from "./reverse-proxy.js";
import { createSocketEndpoint, destroySocketEndpoint } from "./socket-endpoint.js";
import { createStatusServer } from "./status-server.js";

const log = createLogger("Supervisor");

export enum SupervisorState {
  Initializing = "initializing",
  Running = "running",
  ReloadingConfig = "reloading-config",
  Stopping = "stopping",
  Stopped = "stopped",
}

const ALLOWED_TRANSITIONS: Record<SupervisorState, readonly SupervisorState[]> = {
  [SupervisorState.Initializing]: [SupervisorState.Running, SupervisorState.Stopping, SupervisorState.Stopped],
  [SupervisorState.Running]: [SupervisorState.ReloadingConfig, SupervisorState.Stopping],
  [SupervisorState.ReloadingConfig]: [SupervisorState.Running, SupervisorState.Stopping],
  [SupervisorState.Stopping]: [SupervisorState.Stopped],
  [SupervisorState.Stopped]: [],
};

export interface SupervisorStatus extends PoolStatus {
  state: SupervisorState;
  pid: number;
  gateway: { host: string; port: number } | null;
  socketPath: string;
  upstreamErrors: number;
  relayTimeouts: number;
}

export interface SupervisorOptions {
  config: GatewayConfig;
  /** Worker specs for start and for every reload; defaults to buildWorkerSpecs(config) */
  loadSpecs?: () => WorkerSpec[] | Promise<WorkerSpec[]>;
  launcher?: WorkerLauncher;
}

/** Supervisor events */
export interface SupervisorEvents {
  state: (from: SupervisorState, to: SupervisorState) => void;
  fatal: (error: SupervisorError) => void;
}

export class Supervisor extends EventEmitter {
  private config: GatewayConfig;
  private loadSpecs: () => WorkerSpec[] | Promise<WorkerSpec[]>;
  private pool: WorkerPool;
  private proxy: ReverseProxy;
  private monitor: PoolMonitor;
  private watchAbort = new AbortController();
  private endpoint: SocketEndpoint | null = null;
  private statusServer: Server | null = null;
  private gatewayAddress: AddressInfo | null = null;
  private currentState = SupervisorState.Initializing;
  private startPromise: Promise<void> | null = null;
  private stopPromise: Promise<void> | null = null;
  private pidFileWritten = false;
  private exitCode = 0;
  private upstreamErrors = 0;
  private relayTimeouts = 0;
  private resolveDone: (code: number) => void = () => undefined;
  private done: Promise<number>;

  constructor(options: SupervisorOptions) {
    super();
    this.config = options.config;
    this.loadSpecs = options.loadSpecs ?? (() => buildWorkerSpecs(this.config));
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });

    this.pool = new WorkerPool({
      restartPolicy: this.config.restartPolicy,
      readyTimeoutMs: this.config.readyTimeoutMs,
      reloadGracePeriodMs: this.config.reloadGracePeriodMs,
      ...(options.launcher ? { launcher: options.launcher } : {}),
    });
    this.proxy = new ReverseProxy({
      socketPath: this.config.socketPath,
      idleTimeoutMs: this.config.idleTimeoutMs,
    });
    this.monitor = new PoolMonitor(this.config.poolSize);

    this.pool.on("pool:degraded", (_event, error) => this.handleDegraded(error));
    this.proxy.on("upstream:error", () => {
      this.upstreamErrors++;
    });
    this.proxy.on("relay:timeout", () => {
      this.relayTimeouts++;
    });
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  /**
   * Create the endpoint, launch the pool and open the gateway
   */
  start(): Promise<void> {
    if (!this.startPromise) {
      this.startPromise = this.initialize();
    }
    return this.startPromise;
  }

  /**
   * Start and wait until the supervisor has stopped. Resolves with the
   * process exit code.
   */
  async run(): Promise<number> {
    await this.start();
    return this.done;
  }

  getStatus(): SupervisorStatus {
    return {
      state: this.currentState,
      pid: process.pid,
      gateway: this.gatewayAddress ? { host: this.gatewayAddress.address, port: this.gatewayAddress.port } : null,
      socketPath: this.config.socketPath,
      upstreamErrors: this.upstreamErrors,
      relayTimeouts: this.relayTimeouts,
      ...this.monitor.snapshot(),
    };
  }

  /**
   * Rolling reload of every worker with freshly loaded specs
   */
  async reload(): Promise<void> {
    if (this.currentState !== SupervisorState.Running) {
      log.warn("reload ignored", { state: this.currentState });
      return;
    }

    this.setState(SupervisorState.ReloadingConfig);
    try {
      const specs = await this.loadSpecs();
      await this.pool.reload(specs);
    } catch (error) {
      log.error("reload failed, previous workers keep serving", { error });
    } finally {
      if (this.state === SupervisorState.ReloadingConfig) {
        this.setState(SupervisorState.Running);
      }
    }
  }

  /**
   * Stop gateway, pool and endpoint. Calling it again returns the same promise.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  /**
   * Map service-manager signals: SIGHUP reloads, SIGTERM and SIGINT stop.
   * Returns a function that removes the handlers.
   */
  installSignalHandlers(): () => void {
    const onReload = () => {
      log.info("signal received", { signal: "SIGHUP" });
      this.reload().catch((error: unknown) => log.error("reload failed", { error }));
    };
    const onStop = (signal: NodeJS.Signals) => {
      log.info("signal received", { signal });
      this.stop().catch((error: unknown) => log.error("stop failed", { error }));
    };

    process.on("SIGHUP", onReload);
    process.on("SIGTERM", onStop);
    process.on("SIGINT", onStop);

    return () => {
      process.off("SIGHUP", onReload);
      process.off("SIGTERM", onStop);
      process.off("SIGINT", onStop);
    };
  }

  private async initialize(): Promise<void> {
    const { config } = this;
    log.info("initializing", { socket: config.socketPath, poolSize: config.poolSize });

    // subscribe before anything starts so the first transitions are seen
    this.monitor
      .follow(this.pool.watch(this.watchAbort.signal))
      .catch((error: unknown) => log.error("pool monitor failed", { error }));

    try {
      this.endpoint = await createSocketEndpoint({
        path: config.socketPath,
        mode: config.socketMode,
        backlog: config.socketBacklog,
        ...(config.socketGroup !== undefined ? { group: config.socketGroup } : {}),
        onConnection: (socket) => this.pool.handoff(socket),
      });
    } catch (error) {
      throw await this.abortStartup(`Cannot create socket endpoint ${config.socketPath}`, error);
    }

    let specs: WorkerSpec[];
    try {
      specs = await this.loadSpecs();
    } catch (error) {
      throw await this.abortStartup("Cannot load worker specs", error);
    }

    const report = await this.pool.start(specs, this.endpoint);
    if (report.ready.length === 0) {
      const causes = report.failures.map((failure) => failure.message).join("; ");
      throw await this.abortStartup(`No worker could be launched (${causes})`);
    }
    if (report.failures.length > 0) {
      log.warn("pool started with failed slots", {
        ready: report.ready,
        failed: report.failures.map((failure) => failure.workerId),
      });
    }

    try {
      this.gatewayAddress = await this.proxy.listen(config.listen);
    } catch (error) {
      throw await this.abortStartup(`Cannot listen on ${config.listen.host}:${config.listen.port}`, error);
    }

    if (config.statusPort > 0) {
      try {
        await this.listenStatus(config.statusPort);
      } catch (error) {
        throw await this.abortStartup(`Cannot open status server on port ${config.statusPort}`, error);
      }
    }

    try {
      await writeFile(config.pidFile, `${process.pid}\n`);
      this.pidFileWritten = true;
    } catch (error) {
      log.warn("cannot write pid file", { pidFile: config.pidFile, error });
    }

    this.setState(SupervisorState.Running);
  }

  private listenStatus(port: number): Promise<void> {
    const server = createStatusServer(() => this.getStatus());
    this.statusServer = server;
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, DEFAULT_STATUS_HOST, () => {
        server.off("error", reject);
        log.info("status server listening", { host: DEFAULT_STATUS_HOST, port });
        resolve();
      });
    });
  }

  /** Undo a partial startup and build the fatal error to throw */
  private async abortStartup(message: string, cause?: unknown): Promise<SupervisorError> {
    const error = new SupervisorError(cause === undefined ? message : `${message}: ${describeCause(cause)}`, cause);
    log.error("startup failed", { error });

    await this.releaseResources();
    this.exitCode = 1;
    this.setState(SupervisorState.Stopped);
    this.resolveDone(this.exitCode);
    this.emit("fatal", error);
    return error;
  }

  private handleDegraded(cause: PoolDegradedError): void {
    if (this.currentState === SupervisorState.Stopping || this.currentState === SupervisorState.Stopped) {
      return;
    }
    const error = new SupervisorError(`Worker pool degraded: ${cause.message}`, cause);
    log.error("fatal pool condition, stopping", { error });
    this.exitCode = 1;
    this.emit("fatal", error);
    this.stop().catch((stopError: unknown) => log.error("stop failed", { error: stopError }));
  }

  private async shutdown(): Promise<void> {
    if (this.startPromise && this.currentState === SupervisorState.Initializing) {
      await this.startPromise.catch((error: unknown) => log.debug("stop after failed start", { error }));
    }
    if (this.currentState === SupervisorState.Stopped) {
      return;
    }

    this.setState(SupervisorState.Stopping);
    await this.releaseResources();
    this.setState(SupervisorState.Stopped);
    this.resolveDone(this.exitCode);
  }

  /** Gateway first, then the pool, then the endpoint the pool accepted on */
  private async releaseResources(): Promise<void> {
    await this.proxy.close();
    await this.pool.stop(this.config.reloadGracePeriodMs);

    if (this.endpoint) {
      await destroySocketEndpoint(this.endpoint);
      this.endpoint = null;
    }

    const statusServer = this.statusServer;
    if (statusServer) {
      this.statusServer = null;
      statusServer.closeAllConnections();
      await new Promise<void>((resolve) => statusServer.close(() => resolve()));
    }

    if (this.pidFileWritten) {
      await rm(this.config.pidFile, { force: true });
      this.pidFileWritten = false;
    }

    this.watchAbort.abort();
  }

  private setState(to: SupervisorState): void {
    const from = this.currentState;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal supervisor transition ${from} -> ${to}`);
    }
    this.currentState = to;
    log.info("state transition", { from, to });
    this.emit("state", from, to);
  }
}

// Type augmentation for EventEmitter
export interface Supervisor {
  on<K extends keyof SupervisorEvents>(event: K, listener: SupervisorEvents[K]): this;
  once<K extends keyof SupervisorEvents>(event: K, listener: SupervisorEvents[K]): this;
  off<K extends keyof SupervisorEvents>(event: K, listener: SupervisorEvents[K]): this;
  emit<K extends keyof SupervisorEvents>(event: K, ...args: Parameters<SupervisorEvents[K]>): boolean;
}
