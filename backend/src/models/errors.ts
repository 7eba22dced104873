/**
 * Error types raised by the tool registry and the RPC bridge.
 * Each carries a stable `kind` so it survives serialisation.
 */

import { ToolErrorKind } from './tool';

export class ToolError extends Error {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

export class ValidationError extends ToolError {
  readonly issues: string[];

  constructor(toolName: string, issues: string[]) {
    super('ValidationError', `Invalid arguments for ${toolName}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class UnknownToolError extends ToolError {
  constructor(toolName: string) {
    super('UnknownToolError', `Unknown tool: ${toolName}`);
  }
}

export class ToolExecutionError extends ToolError {
  constructor(message: string) {
    super('ToolExecutionError', message);
  }
}

export class DuplicateToolError extends Error {
  readonly kind = 'DuplicateToolError';

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = 'DuplicateToolError';
  }
}

export class RegistrySealedError extends Error {
  readonly kind = 'RegistrySealedError';

  constructor(toolName: string) {
    super(`Cannot register ${toolName}: the tool registry is sealed`);
    this.name = 'RegistrySealedError';
  }
}

export class RpcError extends Error {
  readonly kind: string = 'RpcError';
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = 'RpcError';
    this.code = code;
    this.data = data;
  }
}

export class NotInitializedError extends RpcError {
  readonly kind = 'NotInitializedError';

  constructor(message = 'Connection not initialized; call initialize first') {
    super(-32002, message);
    this.name = 'NotInitializedError';
  }
}
