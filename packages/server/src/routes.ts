import type { IncomingMessage, RequestListener, ServerResponse } from "node:http";
import { describeError, type ReplicationServer } from "@starlane/replication";

export interface RouteContext {
  replication: ReplicationServer;
  /** Process start, in epoch milliseconds */
  startTime: number;
  /** Transports this process serves */
  transports: string[];
  now?: () => number;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

/**
 * HTTP API served next to Socket.IO. Socket.IO intercepts its own path before
 * requests reach this handler.
 */
export function createRequestHandler(context: RouteContext): RequestListener {
  const now = context.now ?? Date.now;

  return (req: IncomingMessage, res: ServerResponse) => {
    let pathname: string;
    try {
      pathname = new URL(req.url ?? "/", "http://localhost").pathname;
    } catch (error) {
      console.warn(`[Routes] Rejected request target ${req.url ?? ""}: ${describeError(error)}`);
      sendJson(res, 400, { error: "Bad request target" });
      return;
    }

    if (req.method !== "GET") {
      sendJson(res, 405, { error: `Method not allowed: ${req.method ?? "unknown"}` });
      return;
    }

    switch (pathname) {
      case "/api/health":
        sendJson(res, 200, {
          status: "ok",
          timestamp: new Date(now()).toISOString(),
          uptime: now() - context.startTime,
        });
        return;
      case "/api/info":
        sendJson(res, 200, {
          name: "Starlane Replication Server",
          version: "1.0.0",
          transports: context.transports,
        });
        return;
      case "/api/stats":
        sendJson(res, 200, {
          clients: context.replication.getClientCount(),
          entities: context.replication.entities.getEntityCount(),
          subscriptions: context.replication.context.subscriptions.size,
        });
        return;
      default:
        res.writeHead(404, { "content-type": "text/plain; charset=utf-8" });
        res.end(`Not Found: ${pathname}`);
    }
  };
}
