import { type Server, createServer } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import handler from "./default-app.js";

describe("default app", () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    server = createServer(handler);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    vi.unstubAllEnvs();
  });

  it("should report health with the worker id", async () => {
    vi.stubEnv("SOCKGATE_WORKER_ID", "3");

    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", workerId: 3, pid: process.pid });
  });

  it("should echo the request body and its content type", async () => {
    const response = await fetch(`${baseUrl}/echo`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"light":"on"}',
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("application/json");
    expect(await response.text()).toBe('{"light":"on"}');
  });

  it("should answer 404 with the unknown path", async () => {
    const response = await fetch(`${baseUrl}/devices?id=1`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "not_found", path: "/devices" });
  });

  it("should not echo on GET", async () => {
    const response = await fetch(`${baseUrl}/echo`);

    expect(response.status).toBe(404);
  });
});
