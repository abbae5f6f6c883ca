import { mkdtemp, rm } from "node:fs/promises";
import {
  Agent,
  type IncomingHttpHeaders,
  type RequestListener,
  type Server,
  type ServerResponse,
  createServer,
  request,
} from "node:http";
import { type Server as NetServer, createServer as createNetServer } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  SupervisorToWorkerMessageType,
  type WorkerToSupervisorMessageInput,
  WorkerToSupervisorMessageType,
  createSupervisorMessage,
} from "./ipc-protocol.js";
import { DEFAULT_APP_MODULE, WorkerRuntime, resolveRequestHandler } from "./worker-process.js";

async function serve(listener: RequestListener): Promise<{ server: Server; url: string }> {
  const server = createServer(listener);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return { server, url: `http://127.0.0.1:${address.port}` };
}

describe("worker process", () => {
  let server: Server | null = null;

  afterEach(async () => {
    const running = server;
    server = null;
    if (running) {
      running.closeAllConnections();
      await new Promise<void>((resolve) => running.close(() => resolve()));
    }
    vi.restoreAllMocks();
  });

  describe("resolveRequestHandler", () => {
    it("should use the default export", async () => {
      const started = await serve(
        resolveRequestHandler({
          default: (_req: unknown, res: { end(body: string): void }) => res.end("from default"),
          handler: () => undefined,
        }),
      );
      server = started.server;

      const response = await fetch(`${started.url}/`);

      expect(await response.text()).toBe("from default");
    });

    it("should fall back to a named handler export", async () => {
      const started = await serve(
        resolveRequestHandler({ handler: (_req: unknown, res: { end(body: string): void }) => res.end("named") }),
      );
      server = started.server;

      const response = await fetch(`${started.url}/`);

      expect(await response.text()).toBe("named");
    });

    it("should answer 500 when an async handler rejects", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      const started = await serve(
        resolveRequestHandler({
          default: async () => {
            throw new Error("boom");
          },
        }),
      );
      server = started.server;

      const response = await fetch(`${started.url}/`);

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: "internal_error" });
    });

    it("should reject modules without a handler", () => {
      expect(() => resolveRequestHandler({ default: "not a function" })).toThrow(
        "Application module must export a request handler as default or `handler`",
      );
      expect(() => resolveRequestHandler(undefined)).toThrow("Application module did not load");
    });
  });

  it("should default to the bundled application", () => {
    expect(DEFAULT_APP_MODULE).toMatch(/[\\/]app[\\/]default-app\.(ts|js)$/);
  });

  describe("WorkerRuntime", () => {
    let dir: string;
    let socketPath: string;
    let listener: NetServer;
    let runtime: WorkerRuntime;
    let sent: WorkerToSupervisorMessageInput[];
    let exits: number[];
    let held: ServerResponse[];

    const app: RequestListener = (req, res) => {
      if (req.url === "/slow") {
        held.push(res);
        return;
      }
      res.end(`hello from ${req.url ?? "?"}`);
    };

    function createRuntime(loadApp: () => Promise<RequestListener> = async () => app): WorkerRuntime {
      runtime = new WorkerRuntime({
        loadApp,
        send: (message) => sent.push(message),
        exit: (code) => exits.push(code),
      });
      return runtime;
    }

    function listenOn(server: NetServer, path: string): Promise<void> {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(path, () => resolve());
      });
    }

    function get(
      path: string,
      agent: Agent | false = false,
      via: string = socketPath,
    ): Promise<{ status: number; headers: IncomingHttpHeaders; body: string }> {
      return new Promise((resolve, reject) => {
        const req = request({ socketPath: via, path, agent }, (res) => {
          let body = "";
          res.setEncoding("utf8");
          res.on("data", (chunk: string) => {
            body += chunk;
          });
          res.on("error", reject);
          res.on("end", () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body }));
        });
        req.on("error", reject);
        req.end();
      });
    }

    function init(workerId = 3): void {
      runtime.handleMessage(
        createSupervisorMessage({ type: SupervisorToWorkerMessageType.Init, workerId, instance: 1 }),
        listener,
      );
    }

    function shutdown(gracePeriod: number): void {
      runtime.handleMessage(createSupervisorMessage({ type: SupervisorToWorkerMessageType.Shutdown, gracePeriod }), null);
    }

    beforeEach(async () => {
      vi.spyOn(console, "log").mockImplementation(() => undefined);
      vi.spyOn(console, "warn").mockImplementation(() => undefined);
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      dir = await mkdtemp(join(tmpdir(), "sockgate-worker-"));
      socketPath = join(dir, "workers.sock");
      listener = createNetServer();
      await listenOn(listener, socketPath);
      sent = [];
      exits = [];
      held = [];
    });

    afterEach(async () => {
      runtime.shutdown(0);
      for (const res of held) {
        res.destroy();
      }
      if (listener.listening) {
        await new Promise<void>((resolve) => listener.close(() => resolve()));
      }
      await rm(dir, { recursive: true, force: true });
    });

    it("should serve connections accepted while the app loads once it is ready", async () => {
      let finishLoading: (loaded: RequestListener) => void = () => undefined;
      createRuntime(
        () =>
          new Promise<RequestListener>((resolve) => {
            finishLoading = resolve;
          }),
      );
      init();

      const response = get("/early");
      await vi.waitFor(() => expect(runtime.openConnections).toBe(1));
      expect(sent).toEqual([]);

      finishLoading(app);

      expect(await response).toMatchObject({ status: 200, body: "hello from /early" });
      expect(sent).toEqual([{ type: WorkerToSupervisorMessageType.Ready, workerId: 3, pid: process.pid }]);
    });

    it("should serve a socket handed over by the supervisor", async () => {
      createRuntime();
      init();
      await vi.waitFor(() => expect(sent).toHaveLength(1));

      const handoffPath = join(dir, "handoff.sock");
      const acceptor = createNetServer({ pauseOnConnect: true }, (socket) =>
        runtime.handleMessage(createSupervisorMessage({ type: SupervisorToWorkerMessageType.Connection }), socket),
      );
      await listenOn(acceptor, handoffPath);
      try {
        const response = await get("/handed-over", false, handoffPath);

        expect(response).toMatchObject({ status: 200, body: "hello from /handed-over" });
      } finally {
        await new Promise<void>((resolve) => acceptor.close(() => resolve()));
      }
    });

    it("should finish in-flight responses with Connection: close and exit once drained", async () => {
      createRuntime();
      init(4);
      await vi.waitFor(() => expect(sent).toHaveLength(1));
      const agent = new Agent({ keepAlive: true });
      try {
        const idle = await get("/first", agent);
        expect(idle.body).toBe("hello from /first");

        const slow = get("/slow", agent);
        await vi.waitFor(() => expect(held).toHaveLength(1));

        shutdown(5_000);

        expect(listener.listening).toBe(false);
        expect(exits).toEqual([]);

        held[0].end("done");
        const response = await slow;

        expect(response.body).toBe("done");
        expect(response.headers.connection).toBe("close");
        await vi.waitFor(() => expect(exits).toEqual([0]));
        expect(sent.at(-1)).toEqual({ type: WorkerToSupervisorMessageType.Stopped, workerId: 4 });
      } finally {
        agent.destroy();
      }
    });

    it("should close connections left open when the grace period elapses", async () => {
      createRuntime();
      init();
      await vi.waitFor(() => expect(sent).toHaveLength(1));

      const slow = get("/slow").catch((error: unknown) => error);
      await vi.waitFor(() => expect(held).toHaveLength(1));

      shutdown(100);

      await vi.waitFor(() => expect(exits).toEqual([0]));
      expect(await slow).toBeInstanceOf(Error);
      expect(runtime.openConnections).toBe(0);
    });

    it("should exit right away when shut down with nothing open", async () => {
      createRuntime();
      init(2);
      await vi.waitFor(() => expect(sent).toHaveLength(1));

      shutdown(1_000);
      shutdown(1_000);

      expect(exits).toEqual([0]);
      expect(sent.at(-1)).toEqual({ type: WorkerToSupervisorMessageType.Stopped, workerId: 2 });
    });

    it("should report a fatal error when init arrives without the listening socket", () => {
      createRuntime();

      runtime.handleMessage(
        createSupervisorMessage({ type: SupervisorToWorkerMessageType.Init, workerId: 1, instance: 1 }),
        undefined,
      );

      expect(sent).toEqual([
        {
          type: WorkerToSupervisorMessageType.Error,
          error: "Init message arrived without the shared listening socket",
          code: "Error",
          fatal: true,
        },
      ]);
      expect(exits).toEqual([1]);
    });

    it("should report a fatal error when the app cannot load", async () => {
      createRuntime(async () => {
        throw new Error("app module missing");
      });
      init();

      await vi.waitFor(() => expect(exits).toEqual([1]));
      expect(sent).toEqual([
        { type: WorkerToSupervisorMessageType.Error, error: "app module missing", code: "Error", fatal: true },
      ]);
    });
  });
});
