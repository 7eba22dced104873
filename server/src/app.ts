import http from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { handleHttpRpc, isRecord, type RpcBridgeServer, type ToolRegistry } from "relay-agent-backend";
import { ConductorService } from "./core/conductorService.js";
import { asString } from "./core/events.js";
import { logger } from "./core/logger.js";
import { StreamingChannel } from "./streamingChannel.js";

export const SERVICE_NAME = "relay-agent";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps {
  conductor: ConductorService;
  registry: ToolRegistry;
  bridge: RpcBridgeServer;
  providerName: string;
  maxEventBytes: number;
}

export interface RouteRequest {
  method: string;
  path: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface RouteResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

const JSON_HEADERS = { "Content-Type": "application/json" };

function json(statusCode: number, value: unknown): RouteResponse {
  return { statusCode, headers: JSON_HEADERS, body: JSON.stringify(value) };
}

export interface QueryBody {
  prompt: string;
  maxTurns?: number;
}

/** `{ "prompt": "...", "max_turns": 3 }`, with `query` accepted for `prompt`. */
export function parseQueryBody(body: string): { query?: QueryBody; error?: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return { error: "Body must be JSON with a 'prompt' string." };
  }

  if (!isRecord(parsed)) {
    return { error: "Body must be JSON with a 'prompt' string." };
  }

  const prompt = (asString(parsed.prompt) ?? asString(parsed.query) ?? "").trim();
  if (!prompt) {
    return { error: "Missing 'prompt'." };
  }

  const maxTurns = parsed.max_turns;
  if (maxTurns === undefined || maxTurns === null) {
    return { query: { prompt } };
  }
  if (typeof maxTurns !== "number" || !Number.isInteger(maxTurns) || maxTurns <= 0) {
    return { error: "'max_turns' must be a positive integer." };
  }
  return { query: { prompt, maxTurns } };
}

export async function routeRequest(deps: AppDeps, request: RouteRequest): Promise<RouteResponse> {
  const method = request.method.toUpperCase();

  if (request.path === "/rpc") {
    return handleHttpRpc(deps.bridge, {
      method,
      headers: request.headers,
      body: request.body,
    });
  }

  if (method === "GET" && request.path === "/") {
    return json(200, {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      provider: deps.providerName,
      endpoints: {
        "GET /status": "Liveness check",
        "POST /query": "Run one prompt and return the aggregate result",
        "WS /ws": "Run one prompt and stream its events",
        "POST /rpc": "Tool bridge (initialize, tools/list, tools/call)",
      },
      tools: deps.registry.list().map((tool) => tool.name),
    });
  }

  if (method === "GET" && request.path === "/status") {
    return json(200, { status: "ok" });
  }

  if (request.path === "/query") {
    if (method !== "POST") {
      return { statusCode: 405, headers: { ...JSON_HEADERS, "Allow": "POST" }, body: JSON.stringify({ error: "method_not_allowed" }) };
    }

    const parsed = parseQueryBody(request.body);
    if (!parsed.query) {
      return json(400, { success: false, error: parsed.error ?? "invalid_request" });
    }

    const result = await deps.conductor.query(parsed.query.prompt, { maxTurns: parsed.query.maxTurns });
    return json(200, result);
  }

  return json(404, { error: "not_found" });
}

export interface App {
  server: http.Server;
  wss: WebSocketServer;
}

/** HTTP routes plus the `/ws` upgrade; listening is left to the caller. */
export function createApp(deps: AppDeps): App {
  const server = http.createServer((req, res) => {
    handleHttp(deps, req, res).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : "unknown";
      logger.error(`request failed: ${message}`, { peer: req.url });
      if (!res.headersSent) {
        res.writeHead(500, JSON_HEADERS);
      }
      res.end(JSON.stringify({ error: "internal_error" }));
    });
  });

  const wss = new WebSocketServer({
    server,
    path: "/ws",
    maxPayload: deps.maxEventBytes,
  });

  wss.on("connection", (socket, request) => {
    logger.info("client connected", { peer: request.socket.remoteAddress ?? "unknown" });

    const channel = new StreamingChannel(deps.conductor, {
      get isOpen() {
        return socket.readyState === WebSocket.OPEN;
      },
      send: (data) => socket.send(data),
      close: (code, reason) => socket.close(code, reason),
    }, deps.maxEventBytes);

    socket.on("message", (raw) => {
      channel.receive(Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw));
    });

    socket.on("close", () => {
      channel.disconnected();
    });

    socket.on("error", (error) => {
      logger.warn(`socket error: ${error.message}`, { sessionId: channel.activeSessionId ?? undefined });
    });
  });

  return { server, wss };
}

/**
 * Collects a request body, decoding UTF-8 once at the end. Resolves to null
 * as soon as more than `maxBytes` bytes have arrived.
 */
export async function readBody(source: AsyncIterable<Buffer | string>, maxBytes: number): Promise<string | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of source) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    size += bytes.length;
    if (size > maxBytes) {
      return null;
    }
    chunks.push(bytes);
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function handleHttp(deps: AppDeps, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const path = new URL(req.url ?? "/", "http://localhost").pathname;

  const body = await readBody(req, deps.maxEventBytes);
  if (body === null) {
    res.writeHead(413, JSON_HEADERS);
    res.end(JSON.stringify({ success: false, error: "payload_too_large" }));
    return;
  }

  const response = await routeRequest(deps, {
    method: req.method ?? "GET",
    path,
    headers: req.headers,
    body,
  });

  res.writeHead(response.statusCode, response.headers);
  res.end(response.body);
}
