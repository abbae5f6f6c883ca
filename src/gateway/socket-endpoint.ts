/**
 * Socket Endpoint - the Unix stream socket every worker accepts on
 *
 * The supervisor creates the endpoint before any worker starts, shares its
 * listening handle with the workers over IPC and destroys it once the pool
 * and the gateway are down. A stale socket file left behind by a crashed
 * process is removed only after a connection attempt proves nobody is
 * listening on it.
 */

import { rmSync } from "node:fs";
import { chmod, chown, lstat, rm } from "node:fs/promises";
import { createConnection, createServer, type Socket } from "node:net";

import { EndpointError, errnoCode } from "../workers/errors.js";
import type { SocketEndpoint } from "../workers/types.js";
import { createLogger } from "./logger.js";

const log = createLogger("SocketEndpoint");

/** How long a connection probe may take before the socket counts as live */
const PROBE_TIMEOUT_MS = 500;

export interface SocketEndpointOptions {
  path: string;
  /** Permission bits applied to the socket file, e.g. 0o660 */
  mode: number;
  backlog: number;
  /** Group id given ownership of the socket file */
  group?: number;
  /** Receives connections accepted by this process (opened paused) */
  onConnection?: (socket: Socket) => void;
}

/** Exit hooks of the endpoints this process currently holds, by path */
const exitHooks = new Map<string, () => void>();

type ProbeResult = "live" | "stale";

/** Connect to an existing socket file to find out whether anyone listens on it */
export function probeSocket(path: string): Promise<ProbeResult> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(path);
    const timer = setTimeout(() => {
      socket.destroy();
      resolve("live");
    }, PROBE_TIMEOUT_MS);

    socket.once("connect", () => {
      clearTimeout(timer);
      socket.destroy();
      resolve("live");
    });

    socket.once("error", (error) => {
      clearTimeout(timer);
      socket.destroy();
      const code = errnoCode(error);
      if (code === "ECONNREFUSED" || code === "ENOENT") {
        resolve("stale");
      } else if (code === "EACCES" || code === "EPERM") {
        reject(new EndpointError(`Cannot probe socket ${path}`, "PERMISSION_DENIED", path, error));
      } else {
        // EAGAIN and friends: a listener exists, its backlog is just full
        resolve("live");
      }
    });
  });
}

async function removeStaleSocket(path: string): Promise<void> {
  let isSocket: boolean;
  try {
    isSocket = (await lstat(path)).isSocket();
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return;
    throw new EndpointError(`Cannot inspect ${path}`, "PERMISSION_DENIED", path, error);
  }

  if (!isSocket) {
    throw new EndpointError(`${path} exists and is not a socket`, "NOT_A_SOCKET", path);
  }

  if ((await probeSocket(path)) === "live") {
    throw new EndpointError(`Socket ${path} is in use by a live process`, "ADDRESS_IN_USE", path);
  }

  try {
    await rm(path, { force: true });
    log.warn("removed stale socket", { path });
  } catch (error) {
    throw new EndpointError(`Cannot remove stale socket ${path}`, "PERMISSION_DENIED", path, error);
  }
}

function listenError(path: string, error: unknown): EndpointError {
  switch (errnoCode(error)) {
    case "EADDRINUSE":
      return new EndpointError(`Socket ${path} is already bound`, "ADDRESS_IN_USE", path, error);
    case "EACCES":
    case "EPERM":
      return new EndpointError(`No permission to bind ${path}`, "PERMISSION_DENIED", path, error);
    default:
      return new EndpointError(`Cannot bind ${path}`, "ENDPOINT_FAILED", path, error);
  }
}

/**
 * Create the endpoint: clear a stale socket file, bind and listen, apply
 * permission bits, and register an exit hook that unlinks the path.
 */
export async function createSocketEndpoint(options: SocketEndpointOptions): Promise<SocketEndpoint> {
  const { path, mode, backlog, group } = options;

  if (exitHooks.has(path)) {
    throw new EndpointError(`Socket ${path} is already held by this process`, "ADDRESS_IN_USE", path);
  }

  await removeStaleSocket(path);

  const onConnection =
    options.onConnection ??
    ((socket: Socket) => {
      socket.destroy();
    });
  const server = createServer({ pauseOnConnect: true }, onConnection);

  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => reject(listenError(path, error));
    server.once("error", onError);
    server.listen({ path, backlog }, () => {
      server.off("error", onError);
      resolve();
    });
  });

  server.on("error", (error) => {
    log.error("endpoint server error", { path, error });
  });

  const hook = () => {
    rmSync(path, { force: true });
  };
  exitHooks.set(path, hook);
  process.on("exit", hook);

  const endpoint: SocketEndpoint = { path, mode, backlog, createdAt: Date.now(), server };

  try {
    await chmod(path, mode);
    if (group !== undefined) {
      await chown(path, -1, group);
    }
  } catch (error) {
    await destroySocketEndpoint(endpoint);
    throw new EndpointError(`Cannot set permissions on ${path}`, "PERMISSION_DENIED", path, error);
  }

  log.info("endpoint created", { path, mode: mode.toString(8), backlog, group });
  return endpoint;
}

/** Close the listener and unlink the path. Destroying twice is not an error. */
export async function destroySocketEndpoint(endpoint: SocketEndpoint): Promise<void> {
  const hook = exitHooks.get(endpoint.path);
  if (hook) {
    process.off("exit", hook);
    exitHooks.delete(endpoint.path);
  }

  if (endpoint.server.listening) {
    endpoint.server.close((error) => {
      if (error) {
        log.warn("endpoint close failed", { path: endpoint.path, error });
      }
    });
    log.info("endpoint destroyed", { path: endpoint.path });
  }

  await rm(endpoint.path, { force: true });
}

/** Whether this process currently holds an endpoint on `path` */
export function isEndpointHeld(path: string): boolean {
  return exitHooks.has(path);
}
