/**
 * Worker Pool Manager - Owns the worker processes behind the shared socket
 *
 * Responsibilities:
 * - Launch one process per WorkerSpec and hand it the shared listening socket
 * - Track every worker through a single transition function
 * - Restart crashed workers with bounded backoff, and report a degraded pool
 *   once the restart budget is spent
 * - Rolling reload and bounded graceful stop
 */

import { EventEmitter, on } from "node:events";
import type { Socket } from "node:net";

import { createLogger } from "../gateway/logger.js";
import { CrashError, LaunchError, PoolDegradedError, describeCause } from "./errors.js";
import {
  SupervisorToWorkerMessageType,
  WorkerToSupervisorMessageType,
  createSupervisorMessage,
  isWorkerMessage,
} from "./ipc-protocol.js";
import { forkLauncher, type WorkerChild, type WorkerLauncher } from "./launcher.js";
import {
  DEFAULT_WORKER_POOL_CONFIG,
  type PoolDegradedEvent,
  type PoolEvent,
  PoolEventType,
  type SocketEndpoint,
  type WorkerId,
  type WorkerPoolConfig,
  type WorkerSpec,
  WorkerState,
  type WorkerTransitionEvent,
} from "./types.js";

const log = createLogger("WorkerPool");

/** Transitions a worker may take; anything else is a bug in the pool */
const ALLOWED_TRANSITIONS: Record<WorkerState, readonly WorkerState[]> = {
  [WorkerState.Stopped]: [WorkerState.Starting],
  [WorkerState.Starting]: [WorkerState.Ready, WorkerState.Crashed, WorkerState.Stopping],
  [WorkerState.Ready]: [WorkerState.Crashed, WorkerState.Stopping, WorkerState.Stopped],
  [WorkerState.Crashed]: [WorkerState.Starting, WorkerState.Stopped],
  [WorkerState.Stopping]: [WorkerState.Stopped],
};

/** Worker instance state, owned by the pool */
interface WorkerHandle {
  spec: WorkerSpec;
  instance: number;
  child: WorkerChild | null;
  pid?: number;
  state: WorkerState;
  restartCount: number;
  /** Restart timestamps inside the current window */
  restartTimes: number[];
  lastStartTime: number | null;
  lastRestartTime: number | null;
  /** True once the worker has been Ready; crashes after that go through the restart policy */
  supervised: boolean;
  /** Older instance of the slot this handle replaces once Ready */
  replaces: WorkerHandle | null;
  /** Resolves when the replaced instance has stopped */
  retirement: Promise<void> | null;
  pendingStart: { resolve: () => void; reject: (error: LaunchError) => void } | null;
  exitWaiters: Array<() => void>;
  readyTimer: NodeJS.Timeout | null;
  stabilityTimer: NodeJS.Timeout | null;
  restartTimer: NodeJS.Timeout | null;
}

/** Outcome of start(): launch failures never abort their siblings */
export interface PoolStartReport {
  ready: WorkerId[];
  failures: LaunchError[];
}

export interface WorkerPoolOptions extends Partial<WorkerPoolConfig> {
  launcher?: WorkerLauncher;
}

/** Worker pool events */
export interface WorkerPoolEvents {
  "worker:transition": (event: WorkerTransitionEvent) => void;
  "worker:crash": (error: CrashError) => void;
  "worker:restart": (workerId: WorkerId, attempt: number, delayMs: number) => void;
  "pool:degraded": (event: PoolDegradedEvent, error: PoolDegradedError) => void;
  /** Every transition and degraded event, in emission order */
  "pool:event": (event: PoolEvent) => void;
}

function isPoolEvent(value: unknown): value is PoolEvent {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    (value.type === PoolEventType.Transition || value.type === PoolEventType.Degraded)
  );
}

/**
 * Worker Pool Manager
 */
export class WorkerPool extends EventEmitter {
  private config: WorkerPoolConfig;
  private launcher: WorkerLauncher;
  private endpoint: SocketEndpoint | null = null;
  /** Current handle of each slot */
  private slots: Map<WorkerId, WorkerHandle> = new Map();
  /** Every handle that is not Stopped, including replacements and retiring instances */
  private live: Set<WorkerHandle> = new Set();
  private nextInstance = 1;
  private handoffCursor = 0;
  private reloading = false;
  private stopping = false;
  private stopPromise: Promise<void> | null = null;

  constructor(options: WorkerPoolOptions = {}) {
    super();
    const { launcher, ...config } = options;
    this.config = { ...DEFAULT_WORKER_POOL_CONFIG, ...config };
    this.launcher = launcher ?? forkLauncher;
  }

  /** Number of slots */
  get size(): number {
    return this.slots.size;
  }

  /**
   * Launch one worker per spec on the shared endpoint. Resolves once every
   * launch has either reached Ready or failed.
   */
  async start(specs: WorkerSpec[], endpoint: SocketEndpoint): Promise<PoolStartReport> {
    if (this.endpoint) {
      throw new Error("Worker pool already started");
    }

    this.endpoint = endpoint;
    this.stopping = false;
    log.info("starting", { workers: specs.length, socket: endpoint.path });

    const handles = specs.map((spec) => {
      const handle = this.createHandle(spec, null);
      this.slots.set(spec.id, handle);
      return handle;
    });

    const results = await Promise.allSettled(handles.map((handle) => this.spawn(handle)));

    const report: PoolStartReport = { ready: [], failures: [] };
    results.forEach((result, index) => {
      const id = handles[index].spec.id;
      if (result.status === "fulfilled") {
        report.ready.push(id);
      } else {
        const error = result.reason instanceof LaunchError ? result.reason : new LaunchError(id, result.reason);
        log.error("launch failed", { workerId: id, error });
        report.failures.push(error);
      }
    });

    log.info("started", { ready: report.ready.length, failed: report.failures.length });
    return report;
  }

  /**
   * Unbounded stream of pool events. Each call subscribes independently from
   * the moment it is made; the stream ends when `signal` aborts.
   */
  watch(signal?: AbortSignal): AsyncIterableIterator<PoolEvent> {
    const source = on(this, "pool:event", { signal });

    async function* stream(): AsyncGenerator<PoolEvent, void, undefined> {
      try {
        for await (const [event] of source) {
          if (isPoolEvent(event)) {
            yield event;
          }
        }
      } catch (error) {
        if (signal?.aborted) return;
        throw error;
      }
    }

    return stream();
  }

  /**
   * Rolling reload: replace the slots one at a time. The old instance is
   * moved to Stopping at the moment its replacement turns Ready.
   */
  async reload(specs: WorkerSpec[]): Promise<void> {
    if (!this.endpoint || this.stopping) {
      throw new Error("Worker pool not running");
    }
    if (this.reloading) {
      throw new Error("Reload already in progress");
    }
    if (specs.length !== this.slots.size || specs.some((spec) => !this.slots.has(spec.id))) {
      throw new Error(`Reload needs exactly one spec per slot (${[...this.slots.keys()].join(", ")})`);
    }

    this.reloading = true;
    log.info("reload started", { workers: specs.length });
    try {
      for (const spec of specs) {
        if (this.stopping) {
          log.warn("reload interrupted by stop", { workerId: spec.id });
          return;
        }

        const replacement = this.createHandle(spec, this.slots.get(spec.id) ?? null);
        await this.spawn(replacement);
        await replacement.retirement;
      }
      log.info("reload complete");
    } finally {
      this.reloading = false;
    }
  }

  /**
   * Stop all workers: graceful shutdown, SIGKILL after the grace period,
   * written off after the kill timeout. Always resolves.
   */
  stop(gracePeriodMs = this.config.reloadGracePeriodMs): Promise<void> {
    if (this.stopPromise) {
      return this.stopPromise;
    }
    if (!this.endpoint) {
      return Promise.resolve();
    }

    this.stopping = true;
    log.info("stopping", { gracePeriodMs, live: this.live.size });

    this.stopPromise = Promise.all([...this.live].map((handle) => this.stopWorker(handle, gracePeriodMs))).then(
      () => {
        this.slots.clear();
        this.endpoint = null;
        this.stopping = false;
        this.stopPromise = null;
        log.info("stopped");
      },
    );
    return this.stopPromise;
  }

  /**
   * Hand a connection accepted by the supervisor process to a Ready worker,
   * rotating over the slots. Without a Ready worker the connection is closed,
   * which the gateway reports as upstream unavailable.
   */
  handoff(socket: Socket): void {
    const candidates: WorkerChild[] = [];
    for (const handle of this.slots.values()) {
      if (handle.state === WorkerState.Ready && handle.child) {
        candidates.push(handle.child);
      }
    }

    if (candidates.length === 0) {
      log.warn("no ready worker for handed-off connection");
      socket.destroy();
      return;
    }

    const child = candidates[this.handoffCursor % candidates.length];
    this.handoffCursor++;
    child.send(createSupervisorMessage({ type: SupervisorToWorkerMessageType.Connection }), socket, (error) => {
      if (error) {
        log.warn("handoff failed", { pid: child.pid, error });
        socket.destroy();
      }
    });
  }

  private createHandle(spec: WorkerSpec, replaces: WorkerHandle | null): WorkerHandle {
    return {
      spec,
      instance: 0,
      child: null,
      state: WorkerState.Stopped,
      restartCount: 0,
      restartTimes: [],
      lastStartTime: null,
      lastRestartTime: null,
      supervised: false,
      replaces,
      retirement: null,
      pendingStart: null,
      exitWaiters: [],
      readyTimer: null,
      stabilityTimer: null,
      restartTimer: null,
    };
  }

  /**
   * Launch a process for the handle and wait for its ready message
   */
  private spawn(handle: WorkerHandle): Promise<void> {
    const endpoint = this.endpoint;
    if (!endpoint) {
      return Promise.reject(new LaunchError(handle.spec.id, new Error("Worker pool not started")));
    }

    handle.instance = this.nextInstance++;
    handle.lastStartTime = Date.now();
    handle.pid = undefined;
    this.live.add(handle);
    this.transition(handle, WorkerState.Starting);

    return new Promise<void>((resolve, reject) => {
      handle.pendingStart = { resolve, reject };

      let child: WorkerChild;
      try {
        child = this.launcher(handle.spec);
      } catch (error) {
        this.failStart(handle, error);
        this.handleWorkerGone(handle, null, null);
        return;
      }

      handle.child = child;
      handle.pid = child.pid;

      child.on("message", (msg) => this.handleWorkerMessage(handle, child, msg));
      child.on("exit", (code, signal) => {
        if (handle.child !== child) return;
        this.handleWorkerGone(handle, code, signal);
      });
      child.on("error", (error) => {
        log.error("worker process error", { workerId: handle.spec.id, error });
        if (handle.child === child && child.pid === undefined) {
          // never spawned, no exit event will follow
          this.failStart(handle, error);
          this.handleWorkerGone(handle, null, null);
        }
      });

      handle.readyTimer = setTimeout(() => {
        handle.readyTimer = null;
        this.failStart(handle, new Error(`not ready after ${this.config.readyTimeoutMs}ms`));
        child.kill("SIGKILL");
      }, this.config.readyTimeoutMs);

      child.send(
        createSupervisorMessage({
          type: SupervisorToWorkerMessageType.Init,
          workerId: handle.spec.id,
          instance: handle.instance,
        }),
        endpoint.server,
      );
    });
  }

  private failStart(handle: WorkerHandle, cause: unknown): void {
    this.clearTimer(handle, "readyTimer");
    const pending = handle.pendingStart;
    handle.pendingStart = null;
    pending?.reject(cause instanceof LaunchError ? cause : new LaunchError(handle.spec.id, cause));
  }

  /**
   * Handle message from worker
   */
  private handleWorkerMessage(handle: WorkerHandle, child: WorkerChild, msg: unknown): void {
    if (!isWorkerMessage(msg)) {
      log.debug("ignoring unknown message", { workerId: handle.spec.id });
      return;
    }

    switch (msg.type) {
      case WorkerToSupervisorMessageType.Ready:
        if (handle.child !== child || handle.state !== WorkerState.Starting) {
          log.debug("late ready message", { workerId: handle.spec.id, state: handle.state });
          return;
        }
        this.handleReady(handle, msg.pid);
        break;

      case WorkerToSupervisorMessageType.Error:
        log.error("worker reported error", {
          workerId: handle.spec.id,
          error: msg.error,
          code: msg.code,
          fatal: msg.fatal ?? false,
        });
        break;

      case WorkerToSupervisorMessageType.Stopped:
        log.debug("worker drained", { workerId: handle.spec.id });
        break;
    }
  }

  private handleReady(handle: WorkerHandle, pid: number): void {
    this.clearTimer(handle, "readyTimer");
    handle.pid = pid;
    handle.supervised = true;

    // Retire the old instance first so Ready never exceeds the pool size
    const old = handle.replaces;
    if (old) {
      handle.replaces = null;
      handle.retirement = this.stopWorker(old, this.config.reloadGracePeriodMs);
    }
    this.slots.set(handle.spec.id, handle);

    this.transition(handle, WorkerState.Ready);

    handle.stabilityTimer = setTimeout(() => {
      handle.stabilityTimer = null;
      if (handle.state === WorkerState.Ready && handle.restartCount > 0) {
        log.info("worker stable, restart backoff reset", { workerId: handle.spec.id });
        handle.restartCount = 0;
      }
    }, this.config.restartPolicy.stabilityWindowMs);

    const pending = handle.pendingStart;
    handle.pendingStart = null;
    pending?.resolve();
  }

  /**
   * Handle worker exit (or a launch that never produced a process)
   */
  private handleWorkerGone(handle: WorkerHandle, code: number | null, signal: NodeJS.Signals | null): void {
    handle.child = null;
    this.clearTimer(handle, "readyTimer");
    this.clearTimer(handle, "stabilityTimer");

    try {
      switch (handle.state) {
        case WorkerState.Stopping:
          this.transition(handle, WorkerState.Stopped, { code, signal });
          return;

        case WorkerState.Stopped:
        case WorkerState.Crashed:
          return;

        case WorkerState.Starting:
          if (!handle.supervised) {
            // first launch or reload replacement: reported to the caller, not restarted
            this.failStart(handle, new CrashError(handle.spec.id, code, signal));
            this.transition(handle, WorkerState.Crashed, { code, signal });
            this.transition(handle, WorkerState.Stopped);
            return;
          }
          this.failStart(handle, new CrashError(handle.spec.id, code, signal));
          this.handleCrash(handle, code, signal);
          return;

        case WorkerState.Ready:
          this.handleCrash(handle, code, signal);
          return;
      }
    } finally {
      this.flushExitWaiters(handle);
    }
  }

  /**
   * Apply the restart policy to an unexpected exit
   */
  private handleCrash(handle: WorkerHandle, code: number | null, signal: NodeJS.Signals | null): void {
    const policy = this.config.restartPolicy;
    const workerId = handle.spec.id;
    const clean = code === 0 && signal === null;
    const permitted = policy.mode === "always" || (policy.mode === "on-failure" && !clean);

    if (clean && !permitted && handle.state === WorkerState.Ready) {
      log.info("worker exited cleanly, not restarting", { workerId, mode: policy.mode });
      this.transition(handle, WorkerState.Stopped, { code, signal });
      return;
    }

    const crash = new CrashError(workerId, code, signal);
    log.error("worker crashed", { workerId, error: crash, restartCount: handle.restartCount });
    this.transition(handle, WorkerState.Crashed, { code, signal });
    this.emit("worker:crash", crash);

    if (this.stopping || !permitted) {
      this.transition(handle, WorkerState.Stopped);
      return;
    }

    const now = Date.now();
    handle.restartTimes = handle.restartTimes.filter((t) => now - t < policy.restartWindowMs);

    if (policy.maxRestartsPerWindow !== undefined && handle.restartTimes.length >= policy.maxRestartsPerWindow) {
      const error = new PoolDegradedError(workerId, handle.restartTimes.length, policy.restartWindowMs);
      log.error("restart budget exhausted", { workerId, error });
      this.transition(handle, WorkerState.Stopped);

      const event: PoolDegradedEvent = {
        type: PoolEventType.Degraded,
        workerId,
        restarts: handle.restartTimes.length,
        windowMs: policy.restartWindowMs,
        timestamp: now,
      };
      this.emit("pool:degraded", event, error);
      this.emit("pool:event", event);
      return;
    }

    this.scheduleRestart(handle, now);
  }

  private scheduleRestart(handle: WorkerHandle, now: number): void {
    const schedule = this.config.restartPolicy.backoffSchedule;
    const delay = schedule.length === 0 ? 0 : schedule[Math.min(handle.restartCount, schedule.length - 1)];

    handle.restartCount++;
    handle.restartTimes.push(now);
    const attempt = handle.restartCount;

    log.info("restart scheduled", { workerId: handle.spec.id, attempt, delayMs: delay });
    this.emit("worker:restart", handle.spec.id, attempt, delay);

    handle.restartTimer = setTimeout(() => {
      handle.restartTimer = null;
      if (this.stopping || handle.state !== WorkerState.Crashed) {
        return;
      }
      handle.lastRestartTime = Date.now();
      this.spawn(handle).catch((error: unknown) => {
        log.warn("restart attempt failed", { workerId: handle.spec.id, attempt, error: describeCause(error) });
      });
    }, delay);
  }

  /**
   * Stop one worker: shutdown message, SIGKILL after the grace period,
   * written off after the kill timeout.
   */
  private stopWorker(handle: WorkerHandle, gracePeriodMs: number): Promise<void> {
    this.clearTimer(handle, "restartTimer");
    this.clearTimer(handle, "stabilityTimer");

    if (handle.state === WorkerState.Stopped) {
      return Promise.resolve();
    }
    if (handle.state === WorkerState.Crashed) {
      this.transition(handle, WorkerState.Stopped);
      return Promise.resolve();
    }

    if (handle.state !== WorkerState.Stopping) {
      this.failStart(handle, new Error("stopped before ready"));
      this.transition(handle, WorkerState.Stopping);
    }

    const child = handle.child;
    if (!child) {
      this.transition(handle, WorkerState.Stopped);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        log.warn("grace period elapsed, killing worker", { workerId: handle.spec.id, pid: handle.pid });
        child.kill("SIGKILL");
      }, gracePeriodMs);

      const giveUpTimer = setTimeout(() => {
        if (handle.child === child) {
          log.error("worker did not exit after SIGKILL, writing it off", { workerId: handle.spec.id });
          handle.child = null;
          this.transition(handle, WorkerState.Stopped);
        }
        this.flushExitWaiters(handle);
      }, gracePeriodMs + this.config.killTimeoutMs);

      handle.exitWaiters.push(() => {
        clearTimeout(killTimer);
        clearTimeout(giveUpTimer);
        resolve();
      });

      child.send(
        createSupervisorMessage({ type: SupervisorToWorkerMessageType.Shutdown, gracePeriod: gracePeriodMs }),
      );
    });
  }

  private flushExitWaiters(handle: WorkerHandle): void {
    const waiters = handle.exitWaiters;
    handle.exitWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  private clearTimer(handle: WorkerHandle, key: "readyTimer" | "stabilityTimer" | "restartTimer"): void {
    const timer = handle[key];
    if (timer) {
      clearTimeout(timer);
      handle[key] = null;
    }
  }

  /**
   * Single mutation path for worker state
   */
  private transition(
    handle: WorkerHandle,
    to: WorkerState,
    exit?: { code: number | null; signal: NodeJS.Signals | null },
  ): void {
    const from = handle.state;
    if (!ALLOWED_TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal transition ${from} -> ${to} for worker ${handle.spec.id}`);
    }

    handle.state = to;
    if (to === WorkerState.Stopped) {
      this.live.delete(handle);
    }

    const event: WorkerTransitionEvent = {
      type: PoolEventType.Transition,
      workerId: handle.spec.id,
      instance: handle.instance,
      from,
      to,
      restartCount: handle.restartCount,
      timestamp: Date.now(),
      ...(handle.pid !== undefined ? { pid: handle.pid } : {}),
      ...(exit ? { exitCode: exit.code, signal: exit.signal } : {}),
    };

    log.info("worker transition", {
      workerId: event.workerId,
      instance: event.instance,
      from,
      to,
      pid: event.pid,
      exitCode: event.exitCode,
      signal: event.signal,
    });
    this.emit("worker:transition", event);
    this.emit("pool:event", event);
  }
}

// Type augmentation for EventEmitter
export interface WorkerPool {
  on<K extends keyof WorkerPoolEvents>(event: K, listener: WorkerPoolEvents[K]): this;
  once<K extends keyof WorkerPoolEvents>(event: K, listener: WorkerPoolEvents[K]): this;
  off<K extends keyof WorkerPoolEvents>(event: K, listener: WorkerPoolEvents[K]): this;
  emit<K extends keyof WorkerPoolEvents>(event: K, ...args: Parameters<WorkerPoolEvents[K]>): boolean;
}
