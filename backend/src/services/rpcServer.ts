/**
 * RPC bridge server — exposes a ToolRegistry over JSON-RPC.
 *
 * Transport-agnostic: callers hand it a connection id and a decoded message
 * and get back the response to deliver (or null for notifications). The
 * in-process transport, the HTTP adapter and the Lambda handler all go
 * through handle().
 */

import { randomUUID } from 'crypto';
import { ConnectionStore, InMemoryConnectionStore } from '../models/connection';
import {
  CallToolResult,
  ClientInfo,
  HealthStatus,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
  ListToolsResult,
  PROTOCOL_VERSION,
  RpcErrorCode,
  ServerCapabilities,
  rpcError,
  rpcResult,
  validateRpcRequest,
} from '../models/rpc';
import { isRecord, resultText } from '../models/tool';
import { logger } from '../utils/logger';
import { ToolRegistry } from './toolRegistry';

export interface RpcBridgeServerOptions {
  serverInfo: ClientInfo;
  connections?: ConnectionStore;
}

/** Methods that work before the initialize handshake. */
const PRE_INIT_METHODS: ReadonlySet<string> = new Set(['initialize', 'ping']);

export class RpcBridgeServer {
  private readonly registry: ToolRegistry;
  private readonly serverInfo: ClientInfo;
  private readonly connections: ConnectionStore;

  constructor(registry: ToolRegistry, options: RpcBridgeServerOptions) {
    this.registry = registry;
    this.serverInfo = options.serverInfo;
    this.connections = options.connections ?? new InMemoryConnectionStore();
  }

  capabilities(): ServerCapabilities {
    return {
      protocolVersion: PROTOCOL_VERSION,
      serverInfo: { ...this.serverInfo },
      capabilities: { tools: { listChanged: false } },
    };
  }

  /** Out-of-band liveness check; carries no connection state. */
  health(): HealthStatus {
    return { status: 'ok', service: this.serverInfo.name, tools: this.registry.list().length };
  }

  openConnection(): string {
    return randomUUID();
  }

  async closeConnection(connectionId: string): Promise<void> {
    await this.connections.remove(connectionId);
  }

  async handle(connectionId: string, message: unknown): Promise<JsonRpcResponse | null> {
    const validation = validateRpcRequest(message);
    if (!validation.valid) {
      logger.warn('Invalid RPC request', { connectionId }, { error: validation.error });
      return rpcError(validation.id, RpcErrorCode.InvalidRequest, validation.error);
    }

    const request = validation.request;
    if (request.id === undefined) {
      this.handleNotification(connectionId, request);
      return null;
    }

    const id = request.id;
    const ctx = { connectionId, requestId: String(id) };

    try {
      if (!PRE_INIT_METHODS.has(request.method) && !(await this.connections.isInitialized(connectionId))) {
        logger.warn('RPC call before initialize', ctx, { method: request.method });
        return rpcError(id, RpcErrorCode.NotInitialized, 'Connection not initialized; call initialize first', {
          kind: 'NotInitializedError',
        });
      }
      if (!PRE_INIT_METHODS.has(request.method)) {
        await this.connections.touch(connectionId);
      }

      switch (request.method) {
        case 'initialize':
          return rpcResult(id, await this.initialize(connectionId, request.params ?? {}));

        case 'ping':
          return rpcResult(id, {});

        case 'tools/list': {
          const result: ListToolsResult = { tools: this.registry.summaries() };
          return rpcResult(id, result);
        }

        case 'tools/call':
          return await this.callTool(id, connectionId, request.params ?? {});

        default:
          logger.warn('Unknown RPC method', ctx, { method: request.method });
          return rpcError(id, RpcErrorCode.MethodNotFound, `Method not found: ${request.method}`);
      }
    } catch (err) {
      const messageText = err instanceof Error ? err.message : 'Unknown bridge error';
      logger.error('RPC handler error', ctx, { method: request.method, error: messageText });
      return rpcError(id, RpcErrorCode.InternalError, messageText);
    }
  }

  private async initialize(connectionId: string, params: Record<string, unknown>): Promise<ServerCapabilities> {
    const info = isRecord(params.clientInfo) ? params.clientInfo : {};
    const client: ClientInfo = {
      name: typeof info.name === 'string' ? info.name : 'unknown',
      version: typeof info.version === 'string' ? info.version : '0.0.0',
    };

    await this.connections.markInitialized(connectionId, client);
    logger.info('Bridge connection initialized', { connectionId }, { client: client.name });
    return this.capabilities();
  }

  private async callTool(
    id: JsonRpcId | null,
    connectionId: string,
    params: Record<string, unknown>,
  ): Promise<JsonRpcResponse> {
    const name = params.name;
    if (typeof name !== 'string' || name.length === 0) {
      return rpcError(id, RpcErrorCode.InvalidParams, 'tools/call requires a string "name"');
    }

    const args = params.arguments ?? {};
    if (!isRecord(args)) {
      return rpcError(id, RpcErrorCode.InvalidParams, 'tools/call "arguments" must be an object');
    }

    const callId = typeof params.callId === 'string' && params.callId ? params.callId : randomUUID();

    logger.info('Bridge tool call', { connectionId, callId, tool: name });
    const result = await this.registry.invoke({ callId, toolName: name, arguments: args });

    const response: CallToolResult = result.status === 'error'
      ? {
        callId: result.callId,
        content: [{ type: 'text', text: result.error.message }],
        isError: true,
        errorKind: result.error.kind,
      }
      : { callId: result.callId, content: [{ type: 'text', text: resultText(result) }], isError: false };
    return rpcResult(id, response);
  }

  private handleNotification(connectionId: string, request: JsonRpcRequest): void {
    if (request.method === 'notifications/initialized') {
      logger.debug('Client acknowledged initialization', { connectionId });
      return;
    }
    logger.warn('Dropped RPC notification', { connectionId }, { method: request.method });
  }
}
