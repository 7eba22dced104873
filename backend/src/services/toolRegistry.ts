/**
 * Tool registry & invoker.
 *
 * Constructed once at start-up, filled with register(), then sealed.
 * invoke() never throws for tool-level problems: unknown names, bad arguments
 * and handler failures all come back as `status: 'error'` results so that one
 * failing tool cannot abort the session that asked for it.
 */

import { DuplicateToolError, RegistrySealedError, ToolError, UnknownToolError } from '../models/errors';
import {
  ExtraArgumentPolicy,
  ToolCallRequest,
  ToolCallResult,
  ToolDescriptor,
  ToolSummary,
  errorResult,
  okResult,
  toInputSchema,
} from '../models/tool';
import { logger } from '../utils/logger';
import { validateArguments } from './argumentValidation';

export interface ToolRegistryOptions {
  extraArguments?: ExtraArgumentPolicy;
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();
  private readonly extraArguments: ExtraArgumentPolicy;
  private sealed = false;

  constructor(options: ToolRegistryOptions = {}) {
    this.extraArguments = options.extraArguments ?? 'reject';
  }

  register(descriptor: ToolDescriptor): void {
    if (this.sealed) {
      throw new RegistrySealedError(descriptor.name);
    }
    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolError(descriptor.name);
    }
    this.tools.set(descriptor.name, descriptor);
    logger.debug('Tool registered', { tool: descriptor.name });
  }

  /** Freezes the descriptor set; later register() calls throw. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): readonly ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  summaries(): ToolSummary[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.parameters),
    }));
  }

  async invoke(request: ToolCallRequest, signal: AbortSignal = new AbortController().signal): Promise<ToolCallResult> {
    const ctx = { callId: request.callId, tool: request.toolName };

    try {
      const tool = this.tools.get(request.toolName);
      if (!tool) {
        throw new UnknownToolError(request.toolName);
      }

      const args = validateArguments(tool.name, tool.parameters, request.arguments, this.extraArguments);
      const payload = await tool.handler(args, { callId: request.callId, signal });

      logger.info('Tool call succeeded', ctx);
      return okResult(request.callId, payload);
    } catch (err) {
      if (err instanceof ToolError) {
        logger.warn('Tool call rejected', ctx, { kind: err.kind, error: err.message });
        return errorResult(request.callId, err.kind, err.message);
      }

      const message = err instanceof Error ? err.message : String(err);
      logger.error('Tool handler failed', ctx, { error: message });
      return errorResult(request.callId, 'ToolExecutionError', message);
    }
  }
}
