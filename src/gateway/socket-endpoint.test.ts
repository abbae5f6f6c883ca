import { link, lstat, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { createConnection, createServer, type Server, type Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { EndpointError } from "../workers/errors.js";
import type { SocketEndpoint } from "../workers/types.js";
import { createSocketEndpoint, destroySocketEndpoint, isEndpointHeld, probeSocket } from "./socket-endpoint.js";

function listen(path: string): Promise<Server> {
  const server = createServer((socket) => socket.destroy());
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(path, () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe("socket endpoint", () => {
  let dir: string;
  let socketPath: string;
  const endpoints: SocketEndpoint[] = [];

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), "sockgate-endpoint-"));
    socketPath = join(dir, "app.sock");
  });

  afterEach(async () => {
    for (const endpoint of endpoints.splice(0)) {
      await destroySocketEndpoint(endpoint);
    }
    await rm(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  async function create(options: Partial<Parameters<typeof createSocketEndpoint>[0]> = {}): Promise<SocketEndpoint> {
    const endpoint = await createSocketEndpoint({ path: socketPath, mode: 0o660, backlog: 64, ...options });
    endpoints.push(endpoint);
    return endpoint;
  }

  it("should bind a socket file with the configured permission bits", async () => {
    const endpoint = await create({ mode: 0o600 });

    const info = await stat(socketPath);
    expect(info.isSocket()).toBe(true);
    expect(info.mode & 0o777).toBe(0o600);
    expect(endpoint.server.listening).toBe(true);
    expect(endpoint.backlog).toBe(64);
    expect(isEndpointHeld(socketPath)).toBe(true);
  });

  it("should remove a stale socket left by a dead process", async () => {
    const stalePath = join(dir, "stale.sock");
    const previous = await listen(stalePath);
    await link(stalePath, socketPath);
    await close(previous);
    expect(await probeSocket(socketPath)).toBe("stale");

    const endpoint = await create();

    expect(endpoint.server.listening).toBe(true);
    expect(await probeSocket(socketPath)).toBe("live");
  });

  it("should refuse a socket another process is listening on", async () => {
    const other = await listen(socketPath);
    try {
      const error = await create().catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(EndpointError);
      expect(error).toMatchObject({ code: "ADDRESS_IN_USE", path: socketPath });
      expect((await lstat(socketPath)).isSocket()).toBe(true);
    } finally {
      await close(other);
    }
  });

  it("should refuse a path held by a regular file and leave it alone", async () => {
    await writeFile(socketPath, "keep me");

    await expect(create()).rejects.toMatchObject({ code: "NOT_A_SOCKET" });
    expect(await readFile(socketPath, "utf8")).toBe("keep me");
  });

  it("should refuse a second endpoint on the same path in one process", async () => {
    await create();

    await expect(create()).rejects.toMatchObject({ code: "ADDRESS_IN_USE" });
  });

  it("should unlink the path on destroy and tolerate a second destroy", async () => {
    const endpoint = await createSocketEndpoint({ path: socketPath, mode: 0o660, backlog: 64 });

    await destroySocketEndpoint(endpoint);
    await destroySocketEndpoint(endpoint);

    await expect(lstat(socketPath)).rejects.toMatchObject({ code: "ENOENT" });
    expect(isEndpointHeld(socketPath)).toBe(false);
  });

  it("should pass connections it accepts to the handler, paused", async () => {
    const accepted: Socket[] = [];
    await create({ onConnection: (socket) => accepted.push(socket) });

    const client = createConnection(socketPath);
    await vi.waitFor(() => expect(accepted).toHaveLength(1));

    expect(accepted[0].isPaused()).toBe(true);
    client.destroy();
    accepted[0].destroy();
  });
});
