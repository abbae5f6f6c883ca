/**
 * Gateway CLI - start the supervisor in the foreground and control a running one
 */

import { readFile } from "node:fs/promises";
import type { Command } from "commander";

import { ENV, type ConfigSource, resolveConfig } from "../gateway/config.js";
import { Supervisor, type SupervisorStatus } from "../gateway/supervisor.js";
import { ConfigError, errnoCode } from "../workers/errors.js";
import { WorkerState } from "../workers/types.js";

interface StartOptions {
  listen?: string;
  socket?: string;
  poolSize?: string;
  statusPort?: string;
  pidFile?: string;
  app?: string;
}

interface ControlOptions {
  pidFile?: string;
}

interface StatusOptions {
  port?: string;
  json: boolean;
}

/** Format duration to human readable */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  if (ms < 3600000) return `${(ms / 60000).toFixed(1)}m`;
  return `${(ms / 3600000).toFixed(1)}h`;
}

/** Format worker state with color */
function formatState(state: string): string {
  switch (state) {
    case WorkerState.Ready:
      return "\x1b[32mready\x1b[0m"; // green
    case WorkerState.Starting:
      return "\x1b[36mstarting\x1b[0m"; // cyan
    case WorkerState.Stopping:
      return "\x1b[33mstopping\x1b[0m"; // yellow
    case WorkerState.Stopped:
      return "\x1b[90mstopped\x1b[0m"; // gray
    case WorkerState.Crashed:
      return "\x1b[31mcrashed\x1b[0m"; // red
    default:
      return state;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isNullableNumber(value: unknown): value is number | null {
  return value === null || typeof value === "number";
}

/** Shape check for a /status response body */
export function isSupervisorStatus(value: unknown): value is SupervisorStatus {
  if (!isRecord(value)) return false;
  if (
    typeof value.state !== "string" ||
    typeof value.pid !== "number" ||
    typeof value.poolSize !== "number" ||
    typeof value.ready !== "number" ||
    typeof value.crashed !== "number" ||
    typeof value.degraded !== "boolean" ||
    !Array.isArray(value.workers)
  ) {
    return false;
  }
  return value.workers.every(
    (worker: unknown) =>
      isRecord(worker) &&
      typeof worker.id === "number" &&
      typeof worker.state === "string" &&
      typeof worker.restartCount === "number" &&
      isNullableNumber(worker.pid) &&
      isNullableNumber(worker.lastStartTime) &&
      isNullableNumber(worker.lastRestartTime),
  );
}

/** Render the status table printed by `sockgate status` */
export function renderStatus(status: SupervisorStatus, now: number = Date.now()): string[] {
  const lines: string[] = [];
  lines.push("", "\x1b[1mGateway Status\x1b[0m", "─".repeat(50));
  lines.push(`Supervisor:       ${status.state} (pid ${status.pid})`);
  lines.push(`Pool size:        ${status.poolSize}`);
  lines.push(`Ready workers:    ${status.ready}`);
  lines.push(`Crashed workers:  ${status.crashed}`);
  if (status.degraded) {
    lines.push("Degraded:         \x1b[31myes\x1b[0m");
  }
  lines.push("");

  lines.push("\x1b[1mWorkers\x1b[0m", "─".repeat(50));
  lines.push("ID    State      PID     Restarts   Uptime     Last restart");
  for (const worker of status.workers) {
    const id = String(worker.id).padEnd(5);
    const state = formatState(worker.state).padEnd(18); // Extra padding for ANSI codes
    const pid = (worker.pid?.toString() ?? "-").padStart(7);
    const restarts = String(worker.restartCount).padStart(10);
    const uptime = (
      worker.state === WorkerState.Ready && worker.lastStartTime !== null
        ? formatDuration(Math.max(0, now - worker.lastStartTime))
        : "-"
    ).padStart(10);
    const lastRestart =
      worker.lastRestartTime !== null ? `${formatDuration(Math.max(0, now - worker.lastRestartTime))} ago` : "-";
    lines.push(`${id} ${state} ${pid} ${restarts} ${uptime}     ${lastRestart}`);
  }
  lines.push("");
  return lines;
}

async function readPid(pidFile: string): Promise<number> {
  let content: string;
  try {
    content = await readFile(pidFile, "utf8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      throw new Error(`No pid file at ${pidFile}; is the gateway running?`);
    }
    throw error;
  }
  const pid = Number.parseInt(content.trim(), 10);
  if (!Number.isInteger(pid) || pid <= 0) {
    throw new Error(`Pid file ${pidFile} does not hold a pid`);
  }
  return pid;
}

async function signalGateway(opts: ControlOptions, signal: NodeJS.Signals): Promise<void> {
  const { pidFile } = resolveConfig(process.env, { [ENV.pidFile]: opts.pidFile });
  const pid = await readPid(pidFile);
  try {
    process.kill(pid, signal);
  } catch (error) {
    if (errnoCode(error) === "ESRCH") {
      throw new Error(`Gateway process ${pid} is not running (stale pid file ${pidFile})`);
    }
    throw error;
  }
  console.log(`Sent ${signal} to gateway (pid ${pid})`);
}

async function fetchStatus(port: number): Promise<SupervisorStatus> {
  const response = await fetch(`http://127.0.0.1:${port}/status`);
  if (!response.ok) {
    throw new Error(`Status server answered ${response.status}`);
  }
  const body: unknown = await response.json();
  if (!isSupervisorStatus(body)) {
    throw new Error("Status server returned an unexpected payload");
  }
  return body;
}

async function runStart(opts: StartOptions): Promise<number> {
  const overrides: ConfigSource = {
    [ENV.listen]: opts.listen,
    [ENV.socketPath]: opts.socket,
    [ENV.poolSize]: opts.poolSize,
    [ENV.statusPort]: opts.statusPort,
    [ENV.pidFile]: opts.pidFile,
    [ENV.appModule]: opts.app,
  };
  const config = resolveConfig(process.env, overrides);

  console.log("\x1b[1mStarting gateway\x1b[0m");
  console.log(`Listen:  ${config.listen.host}:${config.listen.port}`);
  console.log(`Socket:  ${config.socketPath}`);
  console.log(`Workers: ${config.poolSize}`);
  if (config.statusPort > 0) {
    console.log(`Status:  http://127.0.0.1:${config.statusPort}/status`);
  }
  console.log("");

  const supervisor = new Supervisor({ config });
  const removeSignalHandlers = supervisor.installSignalHandlers();
  try {
    return await supervisor.run();
  } finally {
    removeSignalHandlers();
  }
}

/** Report a failed command and set the exit code */
function fail(error: unknown): void {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
    process.exitCode = 2;
    return;
  }
  console.error("Error:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

/**
 * Register gateway CLI commands
 */
export function registerGatewayCli(program: Command): void {
  program
    .command("start")
    .description("Run the gateway and its worker pool in the foreground")
    .option("-l, --listen <address>", "Gateway listen address (host:port)")
    .option("-s, --socket <path>", "Unix socket path shared by the workers")
    .option("-w, --pool-size <count>", "Number of workers")
    .option("-p, --status-port <port>", "Loopback status server port (0 = disabled)")
    .option("--pid-file <path>", "Pid file written while running")
    .option("--app <module>", "Application module served by each worker")
    .action(async (opts: StartOptions) => {
      try {
        process.exitCode = await runStart(opts);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("stop")
    .description("Stop a running gateway (SIGTERM)")
    .option("--pid-file <path>", "Pid file of the running gateway")
    .action(async (opts: ControlOptions) => {
      try {
        await signalGateway(opts, "SIGTERM");
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("reload")
    .description("Rolling restart of every worker (SIGHUP)")
    .option("--pid-file <path>", "Pid file of the running gateway")
    .action(async (opts: ControlOptions) => {
      try {
        await signalGateway(opts, "SIGHUP");
      } catch (error) {
        fail(error);
      }
    });

  program
    .command("status")
    .description("Show supervisor and worker pool status")
    .option("-p, --port <port>", "Status server port")
    .option("--json", "Output as JSON", false)
    .action(async (opts: StatusOptions) => {
      try {
        const { statusPort } = resolveConfig(process.env, { [ENV.statusPort]: opts.port });
        if (statusPort === 0) {
          throw new Error(`Status server disabled; set ${ENV.statusPort} or pass --port`);
        }
        const status = await fetchStatus(statusPort);
        if (opts.json) {
          console.log(JSON.stringify(status, null, 2));
          return;
        }
        for (const line of renderStatus(status)) {
          console.log(line);
        }
      } catch (error) {
        fail(error);
      }
    });
}
