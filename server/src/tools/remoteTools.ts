import {
  HttpTransport,
  RpcBridgeClient,
  ToolError,
  fromInputSchema,
  type RpcTransport,
  type ToolDescriptor,
  type ToolRegistry,
  type ToolSummary,
} from "relay-agent-backend";
import type { ToolEndpoint } from "../core/config.js";
import { logger } from "../core/logger.js";

export interface RemoteToolOptions {
  createTransport?: (endpoint: ToolEndpoint) => RpcTransport;
  clientName?: string;
  clientVersion?: string;
}

export interface RemoteEndpointStatus {
  endpoint: string;
  tools: string[];
  error?: string;
}

/**
 * Discovers the tools behind each endpoint and registers a proxy for every one.
 * An endpoint that cannot be reached or listed is logged and skipped.
 */
export async function registerRemoteTools(
  registry: ToolRegistry,
  endpoints: ToolEndpoint[],
  options: RemoteToolOptions = {},
): Promise<RemoteEndpointStatus[]> {
  const createTransport = options.createTransport ?? ((endpoint: ToolEndpoint) => new HttpTransport(endpoint.url));
  const statuses: RemoteEndpointStatus[] = [];

  for (const endpoint of endpoints) {
    const client = new RpcBridgeClient(createTransport(endpoint), {
      name: options.clientName ?? "relay-agent",
      version: options.clientVersion ?? "1.0.0",
    });

    let summaries: ToolSummary[];
    try {
      await client.initialize();
      summaries = await client.listTools();
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown discovery error";
      logger.warn(`tool endpoint ${endpoint.name} skipped: ${message}`, { peer: endpoint.url });
      statuses.push({ endpoint: endpoint.name, tools: [], error: message });
      continue;
    }

    const registered: string[] = [];
    for (const summary of summaries) {
      if (registry.has(summary.name)) {
        logger.warn(`tool ${summary.name} from ${endpoint.name} shadows an existing tool; skipped`);
        continue;
      }
      registry.register(proxyTool(client, summary));
      registered.push(summary.name);
    }

    logger.info(`tool endpoint ${endpoint.name} registered ${registered.length} tool(s): ${registered.join(", ")}`);
    statuses.push({ endpoint: endpoint.name, tools: registered });
  }

  return statuses;
}

export function proxyTool(client: RpcBridgeClient, summary: ToolSummary): ToolDescriptor {
  return {
    name: summary.name,
    description: summary.description,
    parameters: fromInputSchema(summary.inputSchema),
    handler: async (args, context) => {
      const result = await client.callTool(summary.name, args, { callId: context.callId, signal: context.signal });
      if (result.status === "error") {
        throw new ToolError(result.error.kind, result.error.message);
      }
      return decodePayload(result.payload);
    },
  };
}

/** Remote results arrive as text; JSON text is handed on structured. */
function decodePayload(payload: unknown): unknown {
  if (typeof payload !== "string") {
    return payload;
  }
  try {
    return JSON.parse(payload);
  } catch {
    return payload;
  }
}
