/**
 * RPC bridge client and its transports.
 *
 * The same client works against an RpcBridgeServer in the same process
 * (InProcessTransport) or behind an HTTP endpoint (HttpTransport); both
 * transports push messages through JSON so ordering and error semantics match.
 */

import { NotInitializedError, RpcError } from '../models/errors';
import {
  CONNECTION_HEADER,
  CallToolResult,
  ClientInfo,
  HealthStatus,
  JsonRpcRequest,
  JsonRpcResponse,
  RpcErrorCode,
  ServerCapabilities,
  isRpcFailure,
  makeRequest,
  validateRpcResponse,
} from '../models/rpc';
import {
  ToolCallResult,
  ToolErrorKind,
  ToolSummary,
  errorResult,
  fromInputSchema,
  isRecord,
  okResult,
  toInputSchema,
} from '../models/tool';
import { logger } from '../utils/logger';
import { RpcBridgeServer } from './rpcServer';

// ─── Transports ─────────────────────────────────────────────────────────────

export interface RpcTransport {
  /** Resolves to null for notifications. */
  request(message: JsonRpcRequest, signal?: AbortSignal): Promise<JsonRpcResponse | null>;
  health(signal?: AbortSignal): Promise<HealthStatus>;
  close(): Promise<void>;
}

export class InProcessTransport implements RpcTransport {
  private readonly server: RpcBridgeServer;
  private readonly connectionId: string;

  constructor(server: RpcBridgeServer) {
    this.server = server;
    this.connectionId = server.openConnection();
  }

  async request(message: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const response = await this.server.handle(this.connectionId, JSON.parse(JSON.stringify(message)));
    if (response === null) {
      return null;
    }
    return validateRpcResponse(JSON.parse(JSON.stringify(response)));
  }

  async health(): Promise<HealthStatus> {
    return this.server.health();
  }

  async close(): Promise<void> {
    await this.server.closeConnection(this.connectionId);
  }
}

export interface HttpTransportOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export class HttpTransport implements RpcTransport {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly extraHeaders: Record<string, string>;
  private connectionId: string | null = null;

  constructor(url: string, options: HttpTransportOptions = {}) {
    this.url = url;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.extraHeaders = options.headers ?? {};
  }

  async request(message: JsonRpcRequest, signal?: AbortSignal): Promise<JsonRpcResponse | null> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'Accept': 'application/json',
      ...this.extraHeaders,
    };
    if (this.connectionId) {
      headers[CONNECTION_HEADER] = this.connectionId;
    }

    const response = await fetch(this.url, {
      method: 'POST',
      headers,
      body: JSON.stringify(message),
      signal: this.requestSignal(signal),
    });

    const assigned = response.headers.get(CONNECTION_HEADER);
    if (assigned) {
      this.connectionId = assigned;
    }

    if (message.id === undefined) {
      return null;
    }

    if (!response.ok) {
      const bodyText = await response.text();
      throw new RpcError(RpcErrorCode.InternalError, `bridge_http_${response.status}:${bodyText.slice(0, 120)}`);
    }

    const parsed = validateRpcResponse(await response.json());
    if (!parsed) {
      throw new RpcError(RpcErrorCode.ParseError, 'Malformed JSON-RPC response from bridge');
    }
    return parsed;
  }

  async health(signal?: AbortSignal): Promise<HealthStatus> {
    const response = await fetch(this.url, {
      method: 'GET',
      headers: { 'Accept': 'application/json', ...this.extraHeaders },
      signal: this.requestSignal(signal),
    });

    if (!response.ok) {
      throw new RpcError(RpcErrorCode.InternalError, `bridge_health_${response.status}`);
    }

    const body: unknown = await response.json();
    if (!isRecord(body) || body.status !== 'ok') {
      throw new RpcError(RpcErrorCode.InternalError, 'Bridge health check did not report ok');
    }
    return {
      status: 'ok',
      service: typeof body.service === 'string' ? body.service : 'unknown',
      tools: typeof body.tools === 'number' ? body.tools : 0,
    };
  }

  async close(): Promise<void> {
    this.connectionId = null;
  }

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }
}

// ─── Client ─────────────────────────────────────────────────────────────────

const TOOL_ERROR_KINDS: ReadonlySet<string> = new Set(['ValidationError', 'UnknownToolError', 'ToolExecutionError']);

function isToolErrorKind(value: unknown): value is ToolErrorKind {
  return typeof value === 'string' && TOOL_ERROR_KINDS.has(value);
}

function parseCapabilities(result: unknown): ServerCapabilities {
  if (!isRecord(result) || typeof result.protocolVersion !== 'string' || !isRecord(result.serverInfo)) {
    throw new RpcError(RpcErrorCode.ParseError, 'Malformed initialize result');
  }
  const { name, version } = result.serverInfo;
  return {
    protocolVersion: result.protocolVersion,
    serverInfo: {
      name: typeof name === 'string' ? name : 'unknown',
      version: typeof version === 'string' ? version : '0.0.0',
    },
    capabilities: { tools: { listChanged: false } },
  };
}

function parseToolSummaries(result: unknown): ToolSummary[] {
  if (!isRecord(result) || !Array.isArray(result.tools)) {
    throw new RpcError(RpcErrorCode.ParseError, 'Malformed tools/list result');
  }

  const tools: ToolSummary[] = [];
  for (const entry of result.tools) {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      continue;
    }
    tools.push({
      name: entry.name,
      description: typeof entry.description === 'string' ? entry.description : '',
      inputSchema: toInputSchema(fromInputSchema(entry.inputSchema)),
    });
  }
  return tools;
}

function parseCallResult(result: unknown): Omit<CallToolResult, 'callId'> {
  if (!isRecord(result) || !Array.isArray(result.content)) {
    throw new RpcError(RpcErrorCode.ParseError, 'Malformed tools/call result');
  }

  const text = result.content
    .map((block) => (isRecord(block) && typeof block.text === 'string' ? block.text : ''))
    .join('\n');

  return {
    content: [{ type: 'text', text }],
    isError: result.isError === true,
    errorKind: isToolErrorKind(result.errorKind) ? result.errorKind : undefined,
  };
}

export interface CallToolOptions {
  callId: string;
  signal?: AbortSignal;
}

export class RpcBridgeClient {
  private readonly transport: RpcTransport;
  private readonly clientInfo: ClientInfo;
  private nextId = 1;
  private initialized = false;

  constructor(transport: RpcTransport, clientInfo: ClientInfo) {
    this.transport = transport;
    this.clientInfo = clientInfo;
  }

  async initialize(signal?: AbortSignal): Promise<ServerCapabilities> {
    const result = await this.call('initialize', {
      protocolVersion: '2024-11-05',
      clientInfo: this.clientInfo,
      capabilities: {},
    }, signal);
    await this.transport.request(makeRequest('notifications/initialized', {}), signal);
    this.initialized = true;
    return parseCapabilities(result);
  }

  async listTools(signal?: AbortSignal): Promise<ToolSummary[]> {
    return parseToolSummaries(await this.callInitialized('tools/list', {}, signal));
  }

  async callTool(name: string, args: Record<string, unknown>, options: CallToolOptions): Promise<ToolCallResult> {
    const result = parseCallResult(await this.callInitialized('tools/call', {
      name,
      arguments: args,
      callId: options.callId,
    }, options.signal));

    const text = result.content.map((block) => block.text).join('\n');
    if (result.isError) {
      return errorResult(options.callId, result.errorKind ?? 'ToolExecutionError', text);
    }
    return okResult(options.callId, text);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.callInitialized('ping', {}, signal);
  }

  health(signal?: AbortSignal): Promise<HealthStatus> {
    return this.transport.health(signal);
  }

  async close(): Promise<void> {
    this.initialized = false;
    await this.transport.close();
  }

  /** Re-runs the handshake once if the server has forgotten this connection. */
  private async callInitialized(method: string, params: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    try {
      return await this.call(method, params, signal);
    } catch (err) {
      if (!(err instanceof NotInitializedError) || !this.initialized) {
        throw err;
      }
      logger.info('Bridge connection expired; initializing again', {}, { method });
      await this.initialize(signal);
      return this.call(method, params, signal);
    }
  }

  private async call(method: string, params: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const id = this.nextId++;
    const response = await this.transport.request(makeRequest(method, params, id), signal);

    if (!response) {
      throw new RpcError(RpcErrorCode.InternalError, `No response to ${method}`);
    }

    if (isRpcFailure(response)) {
      logger.warn('Bridge call failed', { requestId: String(id) }, {
        method,
        code: response.error.code,
        error: response.error.message,
      });
      if (response.error.code === RpcErrorCode.NotInitialized) {
        throw new NotInitializedError(response.error.message);
      }
      throw new RpcError(response.error.code, response.error.message, response.error.data);
    }

    return response.result;
  }
}
