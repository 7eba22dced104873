/**
 * Tool bridge protocol — JSON-RPC 2.0 messages.
 *
 * Method names and result shapes follow the Model Context Protocol
 * (`initialize`, `tools/list`, `tools/call`) so any compliant caller can use
 * the bridge.
 */

import { ToolErrorKind, ToolSummary, isRecord } from './tool';

export const JSONRPC_VERSION = '2.0';
export const PROTOCOL_VERSION = '2024-11-05';

/** Header carrying the bridge connection id over HTTP. */
export const CONNECTION_HEADER = 'mcp-session-id';

export const RpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  NotInitialized: -32002,
} as const;

// ─── Wire format ────────────────────────────────────────────────────────────

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  /** Absent on notifications; `null` is a request that is still answered. */
  id?: JsonRpcId | null;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId | null;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

// ─── Method payloads ────────────────────────────────────────────────────────

export interface ClientInfo {
  name: string;
  version: string;
}

export interface ServerCapabilities {
  protocolVersion: string;
  serverInfo: ClientInfo;
  capabilities: { tools: { listChanged: boolean } };
}

export interface ListToolsResult {
  tools: ToolSummary[];
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface CallToolResult {
  callId: string;
  content: TextContent[];
  isError: boolean;
  errorKind?: ToolErrorKind;
}

export interface HealthStatus {
  status: 'ok';
  service: string;
  tools: number;
}

// ─── Factories ──────────────────────────────────────────────────────────────

export function rpcResult(id: JsonRpcId | null, result: unknown): JsonRpcSuccess {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function rpcError(id: JsonRpcId | null, code: number, message: string, data?: unknown): JsonRpcFailure {
  const error: JsonRpcErrorObject = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

export function makeRequest(method: string, params: Record<string, unknown>, id?: JsonRpcId): JsonRpcRequest {
  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, method, params };
  if (id !== undefined) {
    request.id = id;
  }
  return request;
}

export function isRpcFailure(response: JsonRpcResponse): response is JsonRpcFailure {
  return 'error' in response;
}

// ─── Validation ─────────────────────────────────────────────────────────────

function isRpcId(value: unknown): value is JsonRpcId {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

export function validateRpcRequest(
  data: unknown,
): { valid: true; request: JsonRpcRequest } | { valid: false; id: JsonRpcId | null; error: string } {
  if (!isRecord(data)) {
    return { valid: false, id: null, error: 'Request must be a JSON object' };
  }

  const id = isRpcId(data.id) ? data.id : null;

  if (data.jsonrpc !== JSONRPC_VERSION) {
    return { valid: false, id, error: 'Request must declare "jsonrpc": "2.0"' };
  }

  if (data.id !== undefined && data.id !== null && !isRpcId(data.id)) {
    return { valid: false, id: null, error: 'Request "id" must be a string or number' };
  }

  if (typeof data.method !== 'string' || data.method.length === 0) {
    return { valid: false, id, error: 'Request must have a non-empty string "method"' };
  }

  if (data.params !== undefined && !isRecord(data.params)) {
    return { valid: false, id, error: 'Request "params" must be an object' };
  }

  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, method: data.method };
  if (data.id !== undefined) request.id = id;
  if (data.params !== undefined) request.params = data.params;

  return { valid: true, request };
}

export function validateRpcResponse(data: unknown): JsonRpcResponse | null {
  if (!isRecord(data) || data.jsonrpc !== JSONRPC_VERSION) {
    return null;
  }

  const id = isRpcId(data.id) ? data.id : null;

  if (isRecord(data.error)) {
    const { code, message } = data.error;
    if (typeof code !== 'number' || typeof message !== 'string') {
      return null;
    }
    return rpcError(id, code, message, data.error.data);
  }

  if (id === null || !('result' in data)) {
    return null;
  }
  return rpcResult(id, data.result);
}
