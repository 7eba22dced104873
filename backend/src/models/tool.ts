/**
 * Tool model — descriptors, call requests and call results.
 *
 * A ToolDescriptor is what gets registered; a ToolSummary is its JSON-schema
 * form as exposed to reasoning backends and over the RPC bridge.
 */

// ─── Parameter schema ───────────────────────────────────────────────────────

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ParameterSpec {
  type: ParameterType;
  required?: boolean;
  default?: unknown;
  description?: string;
  /** Element type for `array` parameters. */
  items?: ParameterType;
}

export type ParameterSchema = Record<string, ParameterSpec>;

/** What to do with argument keys the schema does not declare. */
export type ExtraArgumentPolicy = 'reject' | 'ignore';

// ─── Descriptors ────────────────────────────────────────────────────────────

export interface ToolContext {
  callId: string;
  signal: AbortSignal;
}

export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<unknown>;

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ParameterSchema;
  handler: ToolHandler;
}

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, Record<string, unknown>>;
  required: string[];
}

export interface ToolSummary {
  name: string;
  description: string;
  inputSchema: JsonSchemaObject;
}

// ─── Calls and results ──────────────────────────────────────────────────────

export interface ToolCallRequest {
  callId: string;
  toolName: string;
  arguments: Record<string, unknown>;
}

export type ToolErrorKind = 'ValidationError' | 'UnknownToolError' | 'ToolExecutionError';

export interface ToolErrorDetail {
  kind: ToolErrorKind;
  message: string;
}

export type ToolCallResult =
  | { callId: string; status: 'ok'; payload: unknown }
  | { callId: string; status: 'error'; error: ToolErrorDetail };

export function okResult(callId: string, payload: unknown): ToolCallResult {
  return { callId, status: 'ok', payload };
}

export function errorResult(callId: string, kind: ToolErrorKind, message: string): ToolCallResult {
  return { callId, status: 'error', error: { kind, message } };
}

/** Text form of a result, as fed back to a reasoning backend. */
export function resultText(result: ToolCallResult): string {
  if (result.status === 'error') {
    return `${result.error.kind}: ${result.error.message}`;
  }
  if (typeof result.payload === 'string') {
    return result.payload;
  }
  return JSON.stringify(result.payload ?? null);
}

// ─── Schema conversion ──────────────────────────────────────────────────────

const PARAMETER_TYPES: ReadonlySet<string> = new Set([
  'string',
  'number',
  'integer',
  'boolean',
  'array',
  'object',
]);

function isParameterType(value: unknown): value is ParameterType {
  return typeof value === 'string' && PARAMETER_TYPES.has(value);
}

export function toInputSchema(parameters: ParameterSchema): JsonSchemaObject {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [name, spec] of Object.entries(parameters)) {
    const property: Record<string, unknown> = { type: spec.type };
    if (spec.description) property.description = spec.description;
    if (spec.items) property.items = { type: spec.items };
    if (spec.default !== undefined) property.default = spec.default;
    properties[name] = property;

    if (spec.required) {
      required.push(name);
    }
  }

  return { type: 'object', properties, required };
}

/**
 * Reads a JSON-schema object (as served by a remote `tools/list`) back into a
 * ParameterSchema. Properties with a missing or unsupported type become `string`.
 */
export function fromInputSchema(schema: unknown): ParameterSchema {
  if (!isRecord(schema) || !isRecord(schema.properties)) {
    return {};
  }

  const required = Array.isArray(schema.required)
    ? schema.required.filter((name): name is string => typeof name === 'string')
    : [];

  const parameters: ParameterSchema = {};
  for (const [name, raw] of Object.entries(schema.properties)) {
    const property = isRecord(raw) ? raw : {};
    const spec: ParameterSpec = {
      type: isParameterType(property.type) ? property.type : 'string',
      required: required.includes(name),
    };
    if (typeof property.description === 'string') spec.description = property.description;
    if (property.default !== undefined) spec.default = property.default;
    if (isRecord(property.items) && isParameterType(property.items.type)) {
      spec.items = property.items.type;
    }
    parameters[name] = spec;
  }
  return parameters;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
