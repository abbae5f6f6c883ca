/**
 * Reverse Proxy Gateway - relays every inbound TCP connection to the worker
 * socket.
 *
 * One relay per client connection. Bytes are piped in both directions with
 * backpressure and half-close, so a client may finish sending while the
 * response is still streaming. A client only ever sees a synthesized
 * response when the backend produced no byte at all:
 *
 * - 502 when the socket cannot be reached or the worker went away first
 * - 504 when the connection sat idle past the idle timeout
 */

import { EventEmitter } from "node:events";
import { type AddressInfo, createConnection, createServer, type Server, type Socket } from "node:net";

import { UpstreamUnavailableError, errnoCode } from "../workers/errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("Gateway");

function plainResponse(status: number, reason: string, body: string): string {
  return [
    `HTTP/1.1 ${status} ${reason}`,
    "Content-Type: text/plain; charset=utf-8",
    `Content-Length: ${Buffer.byteLength(body)}`,
    "Connection: close",
    "",
    body,
  ].join("\r\n");
}

export const UPSTREAM_UNAVAILABLE_RESPONSE = plainResponse(502, "Bad Gateway", "upstream unavailable\n");
export const UPSTREAM_TIMEOUT_RESPONSE = plainResponse(504, "Gateway Timeout", "upstream timed out\n");

export interface ReverseProxyOptions {
  /** Unix socket path of the worker endpoint */
  socketPath: string;
  /** Close a relay after this long without a byte in either direction (ms) */
  idleTimeoutMs: number;
}

export interface ListenAddress {
  host: string;
  port: number;
}

export interface RelayTimeout {
  connectionId: number;
  responseStarted: boolean;
  idleTimeoutMs: number;
}

/** Reverse proxy events */
export interface ReverseProxyEvents {
  "upstream:error": (error: UpstreamUnavailableError) => void;
  "relay:timeout": (timeout: RelayTimeout) => void;
}

/** Per-connection streaming context */
interface Relay {
  id: number;
  client: Socket;
  backend: Socket;
  connected: boolean;
  responseStarted: boolean;
  /** Outcome decided; later events on either socket are ignored */
  settled: boolean;
}

export class ReverseProxy extends EventEmitter {
  private options: ReverseProxyOptions;
  private server: Server | null = null;
  private relays: Set<Relay> = new Set();
  private nextId = 1;

  constructor(options: ReverseProxyOptions) {
    super();
    this.options = options;
  }

  /** Number of client connections currently open */
  get activeConnections(): number {
    return this.relays.size;
  }

  /**
   * Start accepting client connections
   */
  listen(address: ListenAddress): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error("Gateway already listening"));
    }

    const server = createServer({ pauseOnConnect: true, allowHalfOpen: true }, (client) =>
      this.handleConnection(client),
    );
    this.server = server;

    return new Promise((resolve, reject) => {
      const onListenError = (error: Error): void => {
        this.server = null;
        reject(error);
      };
      server.once("error", onListenError);
      server.listen({ host: address.host, port: address.port }, () => {
        server.off("error", onListenError);
        server.on("error", (error) => log.error("listener error", { error }));
        const bound = server.address();
        if (bound === null || typeof bound === "string") {
          reject(new Error("Gateway bound to an unexpected address"));
          return;
        }
        log.info("listening", { host: bound.address, port: bound.port, socket: this.options.socketPath });
        resolve(bound);
      });
    });
  }

  /**
   * Stop accepting. Relays still waiting on the backend are answered with
   * 502; relays already streaming a response are cut.
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          log.warn("listener close failed", { error });
        }
        resolve();
      });
    });

    for (const relay of [...this.relays]) {
      if (!relay.settled && !relay.responseStarted) {
        this.unavailable(relay, "gateway stopping");
      } else {
        this.abort(relay);
      }
    }

    await closed;
    log.info("closed");
  }

  private handleConnection(client: Socket): void {
    const relay: Relay = {
      id: this.nextId++,
      client,
      backend: createConnection({ path: this.options.socketPath, allowHalfOpen: true }),
      connected: false,
      responseStarted: false,
      settled: false,
    };
    this.relays.add(relay);
    const { backend } = relay;

    log.debug("client connected", { connectionId: relay.id, remote: client.remoteAddress });
    client.setTimeout(this.options.idleTimeoutMs);

    backend.once("connect", () => {
      relay.connected = true;
      backend.once("data", () => {
        relay.responseStarted = true;
      });
      client.pipe(backend);
      backend.pipe(client);
    });

    backend.on("error", (error) => {
      if (relay.settled) return;
      if (!relay.connected) {
        this.unavailable(relay, `connect failed (${errnoCode(error) ?? error.message})`, error);
      } else if (!relay.responseStarted) {
        this.unavailable(relay, "backend failed before responding", error);
      } else {
        log.warn("backend failed mid-response", { connectionId: relay.id, error });
        this.abort(relay);
      }
    });

    backend.on("end", () => {
      if (relay.settled || relay.responseStarted) return;
      this.unavailable(relay, "backend closed before responding");
    });

    backend.on("close", () => {
      if (relay.settled) return;
      if (!relay.responseStarted) {
        this.unavailable(relay, "backend closed before responding");
      } else {
        // response complete from the backend's side; the client side drains on its own
        client.end();
      }
    });

    client.on("timeout", () => {
      if (relay.settled) {
        // synthesized response already written, client never hung up
        this.abort(relay);
        return;
      }

      const timeout: RelayTimeout = {
        connectionId: relay.id,
        responseStarted: relay.responseStarted,
        idleTimeoutMs: this.options.idleTimeoutMs,
      };
      log.warn("relay idle timeout", { ...timeout });
      this.emit("relay:timeout", timeout);

      if (relay.responseStarted) {
        this.abort(relay);
      } else {
        this.respond(relay, UPSTREAM_TIMEOUT_RESPONSE);
      }
    });

    client.on("error", (error) => {
      log.debug("client error", { connectionId: relay.id, error });
      this.abort(relay);
    });

    client.on("close", () => {
      this.relays.delete(relay);
      relay.settled = true;
      backend.destroy();
      log.debug("client closed", { connectionId: relay.id });
    });
  }

  /** Report an unreachable upstream and answer the client with 502 */
  private unavailable(relay: Relay, reason: string, cause?: unknown): void {
    const error = new UpstreamUnavailableError(`Connection ${relay.id}: ${reason}`, cause);
    log.warn("upstream unavailable", { connectionId: relay.id, reason, socket: this.options.socketPath });
    this.emit("upstream:error", error);
    this.respond(relay, UPSTREAM_UNAVAILABLE_RESPONSE);
  }

  /**
   * Write a synthesized response and half-close. Pending request bytes are
   * read and discarded so the close does not turn into a reset.
   */
  private respond(relay: Relay, response: string): void {
    relay.settled = true;
    const { client, backend } = relay;
    client.unpipe(backend);
    backend.unpipe(client);
    backend.destroy();

    if (client.destroyed || !client.writable) {
      client.destroy();
      return;
    }
    client.on("data", () => undefined);
    client.resume();
    client.end(response);
  }

  private abort(relay: Relay): void {
    relay.settled = true;
    relay.client.destroy();
    relay.backend.destroy();
  }
}

// Type augmentation for EventEmitter
export interface ReverseProxy {
  on<K extends keyof ReverseProxyEvents>(event: K, listener: ReverseProxyEvents[K]): this;
  once<K extends keyof ReverseProxyEvents>(event: K, listener: ReverseProxyEvents[K]): this;
  off<K extends keyof ReverseProxyEvents>(event: K, listener: ReverseProxyEvents[K]): this;
  emit<K extends keyof ReverseProxyEvents>(event: K, ...args: Parameters<ReverseProxyEvents[K]>): boolean;
}
