/**
 * Status server - loopback HTTP endpoints for health and pool status
 */

import { createServer, type Server, type ServerResponse } from "node:http";

import type { SupervisorStatus } from "./supervisor.js";

function sendJson(res: ServerResponse, status: number, body: unknown, pretty = false): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(pretty ? JSON.stringify(body, null, 2) : JSON.stringify(body));
}

/** Create the status HTTP server; `getStatus` is read on every request */
export function createStatusServer(getStatus: () => SupervisorStatus): Server {
  return createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");

    // Health check endpoint
    if (url.pathname === "/health" || url.pathname === "/healthz") {
      const status = getStatus();
      const healthy = status.ready > 0;
      sendJson(res, healthy ? 200 : 503, {
        ok: healthy,
        state: status.state,
        ready: status.ready,
        total: status.poolSize,
      });
      return;
    }

    // Ready check (all slots serving)
    if (url.pathname === "/ready" || url.pathname === "/readyz") {
      const status = getStatus();
      const ready = status.ready >= status.poolSize;
      sendJson(res, ready ? 200 : 503, { ready });
      return;
    }

    if (url.pathname === "/status") {
      sendJson(res, 200, getStatus(), true);
      return;
    }

    // Root shows available endpoints
    if (url.pathname === "/") {
      sendJson(res, 200, {
        endpoints: {
          "/health": "Health check (200 if any worker ready)",
          "/ready": "Readiness check (200 if all workers ready)",
          "/status": "Supervisor and worker pool status",
        },
      });
      return;
    }

    res.statusCode = 404;
    res.setHeader("Content-Type", "text/plain");
    res.end("Not Found");
  });
}
