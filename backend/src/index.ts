export * from './models/tool';
export * from './models/errors';
export * from './models/rpc';
export * from './models/connection';
export { validateArguments } from './services/argumentValidation';
export { ToolRegistry, type ToolRegistryOptions } from './services/toolRegistry';
export { RpcBridgeServer, type RpcBridgeServerOptions } from './services/rpcServer';
export {
  RpcBridgeClient,
  InProcessTransport,
  HttpTransport,
  type RpcTransport,
  type HttpTransportOptions,
  type CallToolOptions,
} from './services/rpcClient';
export { handleHttpRpc, type HttpRpcRequest, type HttpRpcResponse } from './services/httpRpc';
export {
  buildEmailDelivery,
  HttpEmailDelivery,
  SesEmailDelivery,
  type EmailDelivery,
  type EmailDeliveryConfig,
  type EmailMessage,
  type DeliveryReceipt,
} from './services/email';
export { createSendEmailTool, SEND_EMAIL_TOOL } from './tools/sendEmail';
