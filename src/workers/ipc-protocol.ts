/**
 * IPC protocol for supervisor-worker communication
 *
 * Uses structured messages over the Node.js IPC channel (process.send/on('message')).
 * The shared listening socket and handed-off connections travel as the
 * message's send handle, never inside the payload.
 */

import type { WorkerId } from "./types.js";

/** IPC message types from supervisor to worker */
export enum SupervisorToWorkerMessageType {
  /** Initialize worker; carries the shared listening socket as handle */
  Init = "init",
  /** A connection accepted by the supervisor; carries the socket as handle */
  Connection = "connection",
  /** Graceful shutdown */
  Shutdown = "shutdown",
}

/** IPC message types from worker to supervisor */
export enum WorkerToSupervisorMessageType {
  /** Worker is accepting on the shared socket */
  Ready = "ready",
  /** Worker error */
  Error = "error",
  /** Worker finished draining and is about to exit */
  Stopped = "stopped",
}

/** Base IPC message structure */
export interface IPCMessageBase {
  /** Message type */
  type: string;
  /** Timestamp */
  ts: number;
}

// Supervisor -> Worker messages

export interface InitMessage extends IPCMessageBase {
  type: SupervisorToWorkerMessageType.Init;
  workerId: WorkerId;
  instance: number;
}

export interface ConnectionMessage extends IPCMessageBase {
  type: SupervisorToWorkerMessageType.Connection;
}

export interface ShutdownMessage extends IPCMessageBase {
  type: SupervisorToWorkerMessageType.Shutdown;
  /** Grace period in milliseconds */
  gracePeriod: number;
}

export type SupervisorToWorkerMessage = InitMessage | ConnectionMessage | ShutdownMessage;

/** Helper type to distribute Omit over union members */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type SupervisorToWorkerMessageInput = DistributiveOmit<SupervisorToWorkerMessage, "ts">;

// Worker -> Supervisor messages

export interface ReadyMessage extends IPCMessageBase {
  type: WorkerToSupervisorMessageType.Ready;
  workerId: WorkerId;
  pid: number;
}

export interface ErrorMessage extends IPCMessageBase {
  type: WorkerToSupervisorMessageType.Error;
  error: string;
  code?: string;
  fatal?: boolean;
}

export interface StoppedMessage extends IPCMessageBase {
  type: WorkerToSupervisorMessageType.Stopped;
  workerId: WorkerId;
}

export type WorkerToSupervisorMessage = ReadyMessage | ErrorMessage | StoppedMessage;

export type WorkerToSupervisorMessageInput = DistributiveOmit<WorkerToSupervisorMessage, "ts">;

/** Create a supervisor->worker message */
export function createSupervisorMessage(
  message: SupervisorToWorkerMessageInput,
): SupervisorToWorkerMessage {
  return { ...message, ts: Date.now() };
}

/** Create a worker->supervisor message */
export function createWorkerMessage(message: WorkerToSupervisorMessageInput): WorkerToSupervisorMessage {
  return { ...message, ts: Date.now() };
}

function hasStringType(msg: unknown): msg is { type: string } {
  return typeof msg === "object" && msg !== null && "type" in msg && typeof msg.type === "string";
}

const SUPERVISOR_TYPES: ReadonlySet<string> = new Set(Object.values(SupervisorToWorkerMessageType));
const WORKER_TYPES: ReadonlySet<string> = new Set(Object.values(WorkerToSupervisorMessageType));

/** Type guard for supervisor messages */
export function isSupervisorMessage(msg: unknown): msg is SupervisorToWorkerMessage {
  return hasStringType(msg) && SUPERVISOR_TYPES.has(msg.type);
}

/** Type guard for worker messages */
export function isWorkerMessage(msg: unknown): msg is WorkerToSupervisorMessage {
  return hasStringType(msg) && WORKER_TYPES.has(msg.type);
}
