/**
 * Worker launcher - forks one process per WorkerSpec
 */

import { fork } from "node:child_process";
import type { Server, Socket } from "node:net";
import { dirname, extname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { SupervisorToWorkerMessage } from "./ipc-protocol.js";
import type { WorkerSpec } from "./types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Bundled worker runtime, resolved next to this module (.ts from source, .js when built) */
export const DEFAULT_WORKER_ENTRY = join(__dirname, `worker-process${extname(__filename)}`);

/** The part of a child process the pool talks to */
export interface WorkerChild {
  readonly pid?: number;
  send(
    message: SupervisorToWorkerMessage,
    handle?: Server | Socket,
    callback?: (error: Error | null) => void,
  ): boolean;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: "message", listener: (message: unknown) => void): unknown;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type WorkerLauncher = (spec: WorkerSpec) => WorkerChild;

/** Prefix every line of a worker's output with its slot */
function relayOutput(id: number, chunk: Buffer, write: (line: string) => void): void {
  for (const line of chunk.toString().split("\n")) {
    if (line.trim()) {
      write(`[worker-${id}] ${line}`);
    }
  }
}

/**
 * Fork the spec's entrypoint with an IPC channel. The supervisor's execArgv
 * is inherited so a TypeScript loader active in the parent applies to the
 * worker as well.
 */
export const forkLauncher: WorkerLauncher = (spec) => {
  const child = fork(spec.entrypoint, spec.args, {
    cwd: spec.cwd,
    env: { ...process.env, ...spec.env },
    execArgv: process.execArgv,
    stdio: ["ignore", "pipe", "pipe", "ipc"],
  });

  child.stdout?.on("data", (chunk: Buffer) => relayOutput(spec.id, chunk, (line) => console.log(line)));
  child.stderr?.on("data", (chunk: Buffer) => relayOutput(spec.id, chunk, (line) => console.error(line)));

  return child;
};
