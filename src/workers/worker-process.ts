/**
 * Worker Process - Runs in a child process and serves the application
 *
 * This is the default entry point for worker child processes. It receives
 * the shared listening socket with the init message, feeds the connections it
 * accepts (and the ones the supervisor hands over) to a node:http server
 * running the application module, and drains on shutdown.
 */

import {
  createServer,
  type IncomingMessage,
  type RequestListener,
  type Server as HttpServer,
  type ServerResponse,
} from "node:http";
import { Server as NetServer, Socket } from "node:net";
import { dirname, extname, join, resolve } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";

import {
  type InitMessage,
  SupervisorToWorkerMessageType,
  type WorkerToSupervisorMessageInput,
  WorkerToSupervisorMessageType,
  createWorkerMessage,
  isSupervisorMessage,
} from "./ipc-protocol.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_APP_MODULE = join(__dirname, "..", "app", `default-app${extname(__filename)}`);

/** Grace period used when the worker is signalled directly */
const SIGNAL_GRACE_MS = 5_000;

/**
 * Pick the request listener out of an imported application module: its
 * default export, or a named `handler` export.
 */
export function resolveRequestHandler(mod: unknown): RequestListener {
  if (typeof mod !== "object" || mod === null) {
    throw new Error("Application module did not load");
  }

  const candidate =
    "default" in mod && typeof mod.default === "function"
      ? mod.default
      : "handler" in mod && typeof mod.handler === "function"
        ? mod.handler
        : null;

  if (!candidate) {
    throw new Error("Application module must export a request handler as default or `handler`");
  }

  return (req, res) => {
    const result: unknown = Reflect.apply(candidate, undefined, [req, res]);
    if (result instanceof Promise) {
      result.catch((error: unknown) => {
        console.error(`[Worker ${process.env.SOCKGATE_WORKER_ID ?? process.pid}] Request handler failed:`, error);
        if (!res.headersSent) {
          res.writeHead(500, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "internal_error" }));
        } else {
          res.destroy();
        }
      });
    }
  };
}

async function loadApplication(modulePath: string): Promise<RequestListener> {
  const mod: unknown = await import(pathToFileURL(resolve(modulePath)).href);
  return resolveRequestHandler(mod);
}

/** Process-level effects of the runtime, replaced in tests */
export interface WorkerRuntimeOptions {
  /** Resolve the application's request listener */
  loadApp: () => Promise<RequestListener>;
  send: (message: WorkerToSupervisorMessageInput) => void;
  exit: (code: number) => void;
}

/**
 * Serves connections from the shared listening socket and the supervisor's
 * handoffs, and drains them on shutdown.
 */
export class WorkerRuntime {
  private workerId: number | null = null;
  /** Shared listening socket received from the supervisor */
  private listener: NetServer | null = null;
  private server: HttpServer | null = null;
  /** Open connections and their unfinished responses */
  private connections: Map<Socket, Set<ServerResponse>> = new Map();
  /** Connections accepted before the application finished loading */
  private pending: Socket[] = [];
  private shutdownRequested = false;
  private drainTimer: NodeJS.Timeout | null = null;
  private exiting = false;

  constructor(private options: WorkerRuntimeOptions) {}

  get tag(): string {
    return `[Worker ${this.workerId ?? "?"}]`;
  }

  /** Open connections, queued ones included */
  get openConnections(): number {
    return this.connections.size + this.pending.length;
  }

  handleMessage(msg: unknown, handle: unknown): void {
    if (!isSupervisorMessage(msg)) {
      console.warn(`${this.tag} Unknown message ignored`);
      return;
    }

    switch (msg.type) {
      case SupervisorToWorkerMessageType.Init:
        if (!(handle instanceof NetServer)) {
          this.fail(new Error("Init message arrived without the shared listening socket"));
          return;
        }
        this.init(msg, handle).catch((error: unknown) => this.fail(error));
        break;

      case SupervisorToWorkerMessageType.Connection:
        this.handoff(handle);
        break;

      case SupervisorToWorkerMessageType.Shutdown:
        this.shutdown(msg.gracePeriod);
        break;
    }
  }

  /** Serve the app on the shared listening socket */
  async init(msg: InitMessage, listener: NetServer): Promise<void> {
    this.workerId = msg.workerId;
    this.listener = listener;
    // connections arriving while the application loads are queued by serve()
    listener.on("connection", (socket: Socket) => this.serve(socket));
    listener.on("error", (error) => console.error(`${this.tag} Listener error:`, error));

    const app = await this.options.loadApp();

    const server = createServer();
    server.on("request", (req: IncomingMessage, res: ServerResponse) => this.trackRequest(req, res));
    server.on("request", app);
    server.on("clientError", (error, socket) => {
      console.warn(`${this.tag} Client error: ${error.message}`);
      socket.destroy();
    });
    this.server = server;

    const queued = this.pending;
    this.pending = [];
    for (const socket of queued) {
      this.serve(socket);
    }

    this.options.send({ type: WorkerToSupervisorMessageType.Ready, workerId: msg.workerId, pid: process.pid });
    console.log(`${this.tag} Ready (pid: ${process.pid}, instance: ${msg.instance})`);
  }

  /** Serve a connection the supervisor accepted and passed on */
  handoff(handle: unknown): void {
    if (!(handle instanceof Socket)) {
      console.warn(`${this.tag} Connection message without a socket`);
      return;
    }
    this.serve(handle);
    handle.resume();
  }

  /** Stop accepting, drain in-flight requests up to the grace period */
  shutdown(gracePeriod: number): void {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;
    console.log(`${this.tag} Shutting down (grace: ${gracePeriod}ms, open connections: ${this.connections.size})`);

    this.listener?.close();
    for (const socket of this.pending) {
      socket.destroy();
    }
    this.pending = [];

    // idle keep-alive connections go now, busy ones after their last response
    for (const [socket, responses] of this.connections) {
      if (responses.size === 0) {
        socket.end();
        continue;
      }
      for (const res of responses) {
        if (!res.headersSent) {
          res.setHeader("Connection", "close");
        }
      }
    }

    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      console.warn(`${this.tag} Grace period elapsed, closing ${this.connections.size} connection(s)`);
      for (const socket of this.connections.keys()) {
        socket.destroy();
      }
      this.exitAfterReport(0);
    }, gracePeriod);

    this.exitIfDrained();
  }

  /** Report a fatal error to the supervisor and exit 1 */
  fail(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`${this.tag} Fatal:`, message);
    this.options.send({
      type: WorkerToSupervisorMessageType.Error,
      error: message,
      code: error instanceof Error ? error.name : "UNKNOWN_ERROR",
      fatal: true,
    });
    this.options.exit(1);
  }

  /** Hand a connection to the HTTP server and track its responses */
  private serve(socket: Socket): void {
    if (this.shutdownRequested) {
      socket.destroy();
      return;
    }
    const server = this.server;
    if (!server) {
      this.pending.push(socket);
      return;
    }

    this.connections.set(socket, new Set());
    socket.once("close", () => {
      this.connections.delete(socket);
      this.exitIfDrained();
    });
    server.emit("connection", socket);
  }

  private trackRequest(req: IncomingMessage, res: ServerResponse): void {
    const socket = req.socket;
    const responses = this.connections.get(socket);
    responses?.add(res);
    if (this.shutdownRequested && !res.headersSent) {
      res.setHeader("Connection", "close");
    }

    res.once("close", () => {
      responses?.delete(res);
      if (this.shutdownRequested && (responses?.size ?? 0) === 0) {
        socket.end();
      }
    });
  }

  private exitIfDrained(): void {
    if (this.shutdownRequested && this.connections.size === 0) {
      this.exitAfterReport(0);
    }
  }

  private exitAfterReport(code: number): void {
    if (this.exiting) return;
    this.exiting = true;
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
    if (this.workerId !== null) {
      this.options.send({ type: WorkerToSupervisorMessageType.Stopped, workerId: this.workerId });
    }
    this.options.exit(code);
  }
}

/** Set up process handlers */
function setup(): void {
  const runtime = new WorkerRuntime({
    loadApp: () => loadApplication(process.env.SOCKGATE_APP_MODULE ?? DEFAULT_APP_MODULE),
    send: (message) => {
      if (process.send) {
        process.send(createWorkerMessage(message));
      }
    },
    // Exit after a short delay to ensure the last message is sent
    exit: (code) => {
      setTimeout(() => process.exit(code), 100);
    },
  });

  process.on("message", (msg: unknown, handle: unknown) => runtime.handleMessage(msg, handle));

  // Supervisor gone: nothing will ever ask us to stop
  process.on("disconnect", () => runtime.shutdown(SIGNAL_GRACE_MS));

  process.on("uncaughtException", (error) => {
    console.error(`${runtime.tag} Uncaught exception:`, error);
    runtime.fail(error);
  });

  process.on("unhandledRejection", (reason) => {
    console.error(`${runtime.tag} Unhandled rejection:`, reason);
    if (process.send) {
      process.send(
        createWorkerMessage({
          type: WorkerToSupervisorMessageType.Error,
          error: reason instanceof Error ? reason.message : String(reason),
          fatal: false,
        }),
      );
    }
  });

  process.on("SIGTERM", () => runtime.shutdown(SIGNAL_GRACE_MS));
  process.on("SIGINT", () => runtime.shutdown(1_000));

  console.log(`[Worker] Process started (pid: ${process.pid})`);
}

// Start worker if running as main module
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  setup();
}

export { setup as startWorker };
