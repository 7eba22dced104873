/**
 * Tool bridge Lambda handler — serves the send_email tool over JSON-RPC.
 *
 * GET  /  → health check
 * POST /  → initialize | tools/list | tools/call
 *
 * Connection handshakes are kept in DynamoDB so they survive across
 * invocations.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { DynamoConnectionStore } from '../services/dynamodb';
import { buildEmailDelivery } from '../services/email';
import { handleHttpRpc } from '../services/httpRpc';
import { RpcBridgeServer } from '../services/rpcServer';
import { ToolRegistry } from '../services/toolRegistry';
import { createSendEmailTool } from '../tools/sendEmail';
import { logger } from '../utils/logger';

// API Gateway REST/HTTP proxy events; only the fields used here are declared.
interface BridgeHttpEvent {
  httpMethod?: string;
  requestContext: {
    requestId: string;
    http?: { method: string };
  };
  headers?: Record<string, string | undefined> | null;
  body?: string | null;
  isBase64Encoded?: boolean;
}

// ─── Initialize once (warm Lambda) ──────────────────────────────────────────

let server: RpcBridgeServer | null = null;

export function getBridgeServer(): RpcBridgeServer {
  if (server) return server;

  const registry = new ToolRegistry({
    extraArguments: process.env.EXTRA_ARGUMENTS === 'ignore' ? 'ignore' : 'reject',
  });
  registry.register(createSendEmailTool(buildEmailDelivery({
    delivery: process.env.EMAIL_DELIVERY === 'http' ? 'http' : 'ses',
    apiUrl: process.env.EMAIL_API_URL,
    region: process.env.AWS_REGION,
  })));
  registry.seal();

  server = new RpcBridgeServer(registry, {
    serverInfo: { name: 'email-tool-bridge', version: '1.0.0' },
    connections: new DynamoConnectionStore(),
  });
  return server;
}

/** For testing injection. */
export function setBridgeServer(instance: RpcBridgeServer | null): void {
  server = instance;
}

// ─── Handler ────────────────────────────────────────────────────────────────

export const handler = async (event: BridgeHttpEvent): Promise<APIGatewayProxyResult> => {
  const requestId = event.requestContext.requestId;
  const method = event.httpMethod ?? event.requestContext.http?.method ?? 'POST';
  const body = event.body && event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;

  logger.info('Bridge request received', { requestId }, { method });

  try {
    const response = await handleHttpRpc(getBridgeServer(), {
      method,
      headers: event.headers ?? {},
      body,
    });
    return response;
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    logger.error('Bridge handler error', { requestId }, { error: message });
    return {
      statusCode: 500,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ error: 'internal_error', message }),
    };
  }
};
