/**
 * Default application served by the workers when no SOCKGATE_APP_MODULE is
 * configured. Device-control logic plugs in by exporting its own handler.
 */

import type { IncomingMessage, RequestListener, ServerResponse } from "node:http";

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

function workerId(): number | null {
  const raw = process.env.SOCKGATE_WORKER_ID;
  return raw === undefined ? null : Number.parseInt(raw, 10);
}

/** Streams the request body back unchanged */
function echo(req: IncomingMessage, res: ServerResponse): void {
  const headers: Record<string, string> = {
    "Content-Type": req.headers["content-type"] ?? "application/octet-stream",
  };
  const length = req.headers["content-length"];
  if (length !== undefined) {
    headers["Content-Length"] = length;
  }
  res.writeHead(200, headers);
  req.pipe(res);
}

const handler: RequestListener = (req, res) => {
  const url = new URL(req.url ?? "/", "http://localhost");

  if (req.method === "GET" && (url.pathname === "/health" || url.pathname === "/healthz")) {
    sendJson(res, 200, { status: "ok", workerId: workerId(), pid: process.pid });
    return;
  }

  if (req.method === "POST" && url.pathname === "/echo") {
    echo(req, res);
    return;
  }

  sendJson(res, 404, { error: "not_found", path: url.pathname });
};

export default handler;
