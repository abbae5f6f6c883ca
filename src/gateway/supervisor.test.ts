import { EventEmitter } from "node:events";
import { lstat, mkdtemp, readFile, rm } from "node:fs/promises";
import type { Server, Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  type SupervisorToWorkerMessage,
  SupervisorToWorkerMessageType,
  WorkerToSupervisorMessageType,
  createWorkerMessage,
} from "../workers/ipc-protocol.js";
import type { WorkerChild, WorkerLauncher } from "../workers/launcher.js";
import { WorkerState, type WorkerSpec } from "../workers/types.js";
import { ENV, resolveConfig } from "./config.js";
import { SupervisorError, Supervisor, SupervisorState } from "./index.js";

let nextPid = 7000;

/** Child that reports ready on init and exits when told to shut down */
class ScriptedChild extends EventEmitter implements WorkerChild {
  readonly pid = nextPid++;

  constructor(
    readonly spec: WorkerSpec,
    private failOnInit: boolean,
  ) {
    super();
  }

  send(message: SupervisorToWorkerMessage, _handle?: Server | Socket): boolean {
    if (message.type === SupervisorToWorkerMessageType.Init) {
      queueMicrotask(() => {
        if (this.failOnInit) {
          this.emit("exit", 1, null);
        } else {
          this.emit(
            "message",
            createWorkerMessage({ type: WorkerToSupervisorMessageType.Ready, workerId: this.spec.id, pid: this.pid }),
          );
        }
      });
    }
    if (message.type === SupervisorToWorkerMessageType.Shutdown) {
      queueMicrotask(() => this.emit("exit", 0, null));
    }
    return true;
  }

  kill(signal?: NodeJS.Signals): boolean {
    queueMicrotask(() => this.emit("exit", null, signal ?? "SIGTERM"));
    return true;
  }

  crash(): void {
    this.emit("exit", 1, null);
  }
}

describe("Supervisor", () => {
  let dir: string;
  let children: ScriptedChild[];
  let failingSlots: Set<number>;
  const launcher: WorkerLauncher = (spec) => {
    const child = new ScriptedChild(spec, failingSlots.has(spec.id));
    children.push(child);
    return child;
  };

  function createSupervisor(env: Record<string, string> = {}, loadSpecs?: () => WorkerSpec[]): Supervisor {
    const config = resolveConfig({
      [ENV.listen]: "127.0.0.1:0",
      [ENV.socketPath]: join(dir, "workers.sock"),
      [ENV.pidFile]: join(dir, "sockgate.pid"),
      [ENV.poolSize]: "2",
      [ENV.backoff]: "10",
      [ENV.reloadGrace]: "200",
      [ENV.workerEntry]: "/srv/worker.js",
      ...env,
    });
    return new Supervisor({ config, launcher, ...(loadSpecs ? { loadSpecs } : {}) });
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), "sockgate-supervisor-"));
    children = [];
    failingSlots = new Set();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("should start the pool and gateway, then release everything on stop", async () => {
    const supervisor = createSupervisor();
    const running = supervisor.run();

    await vi.waitFor(() => expect(supervisor.state).toBe(SupervisorState.Running));
    await vi.waitFor(() => expect(supervisor.getStatus().ready).toBe(2));

    const status = supervisor.getStatus();
    expect(status.poolSize).toBe(2);
    expect(status.pid).toBe(process.pid);
    expect(status.gateway?.host).toBe("127.0.0.1");
    expect(status.gateway?.port).toBeGreaterThan(0);
    expect(status.workers.map((worker) => [worker.id, worker.state])).toEqual([
      [1, WorkerState.Ready],
      [2, WorkerState.Ready],
    ]);
    expect(await readFile(join(dir, "sockgate.pid"), "utf8")).toBe(`${process.pid}\n`);
    expect((await lstat(join(dir, "workers.sock"))).isSocket()).toBe(true);

    await supervisor.stop();

    expect(await running).toBe(0);
    expect(supervisor.state).toBe(SupervisorState.Stopped);
    await expect(lstat(join(dir, "sockgate.pid"))).rejects.toMatchObject({ code: "ENOENT" });
    await expect(lstat(join(dir, "workers.sock"))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("should fail startup when no worker becomes ready", async () => {
    failingSlots = new Set([1, 2]);
    const supervisor = createSupervisor();
    const fatal = vi.fn();
    supervisor.on("fatal", fatal);

    const error = await supervisor.start().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(SupervisorError);
    expect(error).toMatchObject({ code: "SUPERVISOR_FATAL" });
    expect(fatal).toHaveBeenCalledTimes(1);
    expect(supervisor.state).toBe(SupervisorState.Stopped);
    await expect(lstat(join(dir, "workers.sock"))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("should keep running when only some workers start", async () => {
    failingSlots = new Set([2]);
    const supervisor = createSupervisor();

    await supervisor.start();
    await vi.waitFor(() => expect(supervisor.getStatus().ready).toBe(1));

    expect(supervisor.state).toBe(SupervisorState.Running);
    expect(supervisor.getStatus().workers.find((worker) => worker.id === 2)?.state).toBe(WorkerState.Stopped);
    await supervisor.stop();
  });

  it("should stop with exit code 1 once the pool degrades", async () => {
    const supervisor = createSupervisor({ [ENV.maxRestarts]: "1", [ENV.poolSize]: "1" });
    const running = supervisor.run();
    await vi.waitFor(() => expect(supervisor.state).toBe(SupervisorState.Running));

    children[0].crash();
    await vi.waitFor(() => expect(children).toHaveLength(2));
    await vi.waitFor(() => expect(supervisor.getStatus().ready).toBe(1));
    children[1].crash();

    expect(await running).toBe(1);
    expect(supervisor.state).toBe(SupervisorState.Stopped);
    expect(supervisor.getStatus().degraded).toBe(true);
  });

  it("should replace every worker on reload and return to running", async () => {
    const supervisor = createSupervisor();
    await supervisor.start();
    const states: string[] = [];
    supervisor.on("state", (from, to) => states.push(`${from}->${to}`));

    await supervisor.reload();

    expect(states).toEqual(["running->reloading-config", "reloading-config->running"]);
    expect(children).toHaveLength(4);
    await vi.waitFor(() =>
      expect(supervisor.getStatus().workers.map((worker) => [worker.id, worker.instance, worker.state])).toEqual([
        [1, 3, WorkerState.Ready],
        [2, 4, WorkerState.Ready],
      ]),
    );
    await supervisor.stop();
  });

  it("should keep serving when a reload cannot load specs", async () => {
    let loads = 0;
    const supervisor = createSupervisor({}, () => {
      loads++;
      if (loads > 1) {
        throw new Error("bad app module");
      }
      return [1, 2].map((id) => ({ id, entrypoint: "/srv/worker.js", args: [], cwd: dir, env: {} }));
    });
    await supervisor.start();

    await supervisor.reload();

    expect(supervisor.state).toBe(SupervisorState.Running);
    expect(children).toHaveLength(2);
    await supervisor.stop();
  });

  it("should ignore reload outside the running state", async () => {
    const supervisor = createSupervisor();

    await supervisor.reload();

    expect(supervisor.state).toBe(SupervisorState.Initializing);
    expect(children).toHaveLength(0);
  });

  it("should return the same promise from repeated stops", async () => {
    const supervisor = createSupervisor();
    await supervisor.start();

    const first = supervisor.stop();
    expect(supervisor.stop()).toBe(first);
    await first;
    expect(supervisor.state).toBe(SupervisorState.Stopped);
  });

  it("should map SIGHUP to reload and SIGTERM to stop until uninstalled", () => {
    const supervisor = createSupervisor();
    const reload = vi.spyOn(supervisor, "reload").mockResolvedValue(undefined);
    const stop = vi.spyOn(supervisor, "stop").mockResolvedValue(undefined);
    const before = process.listenerCount("SIGTERM");

    const uninstall = supervisor.installSignalHandlers();
    // invoke only the handlers just installed; the runner has its own
    process.listeners("SIGHUP").at(-1)?.("SIGHUP");
    process.listeners("SIGTERM").at(-1)?.("SIGTERM");
    uninstall();

    expect(reload).toHaveBeenCalledTimes(1);
    expect(stop).toHaveBeenCalledTimes(1);
    expect(process.listenerCount("SIGTERM")).toBe(before);
  });
});
