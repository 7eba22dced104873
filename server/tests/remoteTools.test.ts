import {
  InProcessTransport,
  RpcBridgeServer,
  ToolRegistry,
  createSendEmailTool,
  type DeliveryReceipt,
  type EmailDelivery,
  type EmailMessage,
  type HealthStatus,
  type JsonRpcResponse,
  type RpcTransport,
} from "relay-agent-backend";
import { registerRemoteTools } from "../src/tools/remoteTools.js";

class RecordingDelivery implements EmailDelivery {
  readonly name = "fake";
  readonly sent: EmailMessage[] = [];

  async send(message: EmailMessage): Promise<DeliveryReceipt> {
    this.sent.push(message);
    return { messageId: `msg-${this.sent.length}`, backend: this.name };
  }
}

class UnreachableTransport implements RpcTransport {
  async request(): Promise<JsonRpcResponse | null> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:3001");
  }

  async health(): Promise<HealthStatus> {
    throw new Error("connect ECONNREFUSED 127.0.0.1:3001");
  }

  async close(): Promise<void> {}
}

function emailBridge(delivery: EmailDelivery): RpcBridgeServer {
  const registry = new ToolRegistry();
  registry.register(createSendEmailTool(delivery));
  registry.seal();
  return new RpcBridgeServer(registry, { serverInfo: { name: "email-bridge", version: "1.0.0" } });
}

const EMAIL_ARGS = { to: "a@example.com", from: "b@example.com", subject: "X", content: "Y" };

describe("registerRemoteTools", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("registers a proxy that calls through the bridge", async () => {
    const delivery = new RecordingDelivery();
    const bridge = emailBridge(delivery);
    const local = new ToolRegistry();

    const statuses = await registerRemoteTools(local, [{ name: "email", url: "http://email.test/rpc" }], {
      createTransport: () => new InProcessTransport(bridge),
    });
    const result = await local.invoke({ callId: "c1", toolName: "send_email", arguments: EMAIL_ARGS });

    expect(statuses).toEqual([{ endpoint: "email", tools: ["send_email"] }]);
    expect(local.summaries()).toEqual([
      {
        name: "send_email",
        description: createSendEmailTool(delivery).description,
        inputSchema: {
          type: "object",
          properties: {
            to: { type: "string", description: "Recipient email address" },
            from: { type: "string", description: "Sender email address (must be verified)" },
            subject: { type: "string", description: "Email subject line" },
            content: { type: "string", description: "Email body (HTML supported)" },
            cc: { type: "array", items: { type: "string" }, description: "CC recipients (optional)" },
          },
          required: ["to", "from", "subject", "content"],
        },
      },
    ]);
    expect(result).toEqual({
      callId: "c1",
      status: "ok",
      payload: { delivered: true, messageId: "msg-1", backend: "fake", to: "a@example.com", cc: [] },
    });
    expect(delivery.sent).toEqual([EMAIL_ARGS]);
  });

  test("remote failures keep their kind", async () => {
    const bridge = emailBridge(new RecordingDelivery());
    const local = new ToolRegistry();
    await registerRemoteTools(local, [{ name: "email", url: "http://email.test/rpc" }], {
      createTransport: () => new InProcessTransport(bridge),
    });

    const result = await local.invoke({ callId: "c2", toolName: "send_email", arguments: { ...EMAIL_ARGS, to: "nobody" } });

    expect(result).toEqual({
      callId: "c2",
      status: "error",
      error: { kind: "ToolExecutionError", message: "to is not a valid email address: nobody" },
    });
  });

  test("an unreachable endpoint is skipped and the rest still register", async () => {
    const bridge = emailBridge(new RecordingDelivery());
    const local = new ToolRegistry();

    const statuses = await registerRemoteTools(
      local,
      [
        { name: "down", url: "http://down.test/rpc" },
        { name: "email", url: "http://email.test/rpc" },
      ],
      {
        createTransport: (endpoint) =>
          endpoint.name === "down" ? new UnreachableTransport() : new InProcessTransport(bridge),
      },
    );

    expect(statuses).toEqual([
      { endpoint: "down", tools: [], error: "connect ECONNREFUSED 127.0.0.1:3001" },
      { endpoint: "email", tools: ["send_email"] },
    ]);
    expect(local.has("send_email")).toBe(true);
  });

  test("a tool already registered locally is not shadowed", async () => {
    const localDelivery = new RecordingDelivery();
    const remoteDelivery = new RecordingDelivery();
    const bridge = emailBridge(remoteDelivery);
    const local = new ToolRegistry();
    local.register(createSendEmailTool(localDelivery));

    const statuses = await registerRemoteTools(local, [{ name: "email", url: "http://email.test/rpc" }], {
      createTransport: () => new InProcessTransport(bridge),
    });
    await local.invoke({ callId: "c3", toolName: "send_email", arguments: EMAIL_ARGS });

    expect(statuses).toEqual([{ endpoint: "email", tools: [] }]);
    expect(localDelivery.sent).toHaveLength(1);
    expect(remoteDelivery.sent).toHaveLength(0);
  });
});
