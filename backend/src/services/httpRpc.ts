/**
 * HTTP adapter for the RPC bridge.
 *
 * GET  → liveness check (no connection state)
 * POST → one JSON-RPC message; the connection id travels in `mcp-session-id`
 *        and is issued on `initialize` when the caller has none.
 */

import { CONNECTION_HEADER, RpcErrorCode, rpcError } from '../models/rpc';
import { logger } from '../utils/logger';
import { RpcBridgeServer } from './rpcServer';

export interface HttpRpcRequest {
  method: string;
  headers: Record<string, string | string[] | undefined>;
  body?: string | null;
}

export interface HttpRpcResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };

function headerValue(headers: HttpRpcRequest['headers'], name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    const first = Array.isArray(value) ? value[0] : value;
    return first && first.length > 0 ? first : undefined;
  }
  return undefined;
}

function isInitializeMessage(message: unknown): boolean {
  return typeof message === 'object' && message !== null && 'method' in message && message.method === 'initialize';
}

export async function handleHttpRpc(server: RpcBridgeServer, request: HttpRpcRequest): Promise<HttpRpcResponse> {
  const method = request.method.toUpperCase();

  if (method === 'GET') {
    return { statusCode: 200, headers: JSON_HEADERS, body: JSON.stringify(server.health()) };
  }

  if (method !== 'POST') {
    return {
      statusCode: 405,
      headers: { ...JSON_HEADERS, 'Allow': 'GET, POST' },
      body: JSON.stringify({ error: 'method_not_allowed' }),
    };
  }

  let message: unknown;
  try {
    message = JSON.parse(request.body || '');
  } catch {
    logger.warn('Invalid JSON in RPC body');
    return {
      statusCode: 200,
      headers: JSON_HEADERS,
      body: JSON.stringify(rpcError(null, RpcErrorCode.ParseError, 'Body is not valid JSON')),
    };
  }

  let connectionId = headerValue(request.headers, CONNECTION_HEADER);
  if (!connectionId && isInitializeMessage(message)) {
    connectionId = server.openConnection();
  }

  const response = await server.handle(connectionId ?? '', message);
  const headers: Record<string, string> = { ...JSON_HEADERS };
  if (connectionId) {
    headers[CONNECTION_HEADER] = connectionId;
  }

  if (response === null) {
    return { statusCode: 202, headers, body: '' };
  }
  return { statusCode: 200, headers, body: JSON.stringify(response) };
}
