/**
 * Validates tool arguments against a ParameterSchema and applies defaults.
 */

import { ValidationError } from '../models/errors';
import { ExtraArgumentPolicy, ParameterSchema, ParameterType, isRecord } from '../models/tool';

function matchesType(value: unknown, type: ParameterType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isRecord(value);
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Returns the normalized argument map, or throws ValidationError listing every
 * problem found. `null` counts as absent.
 */
export function validateArguments(
  toolName: string,
  schema: ParameterSchema,
  args: Record<string, unknown>,
  extraArguments: ExtraArgumentPolicy,
): Record<string, unknown> {
  const issues: string[] = [];
  const normalized: Record<string, unknown> = {};

  for (const [name, spec] of Object.entries(schema)) {
    const value = Object.hasOwn(args, name) ? args[name] : undefined;

    if (value === undefined || value === null) {
      if (spec.default !== undefined) {
        normalized[name] = spec.default;
      } else if (spec.required) {
        issues.push(`missing required field "${name}"`);
      }
      continue;
    }

    if (!matchesType(value, spec.type)) {
      issues.push(`field "${name}" must be ${spec.type}, got ${describe(value)}`);
      continue;
    }

    const itemType = spec.items;
    if (itemType && Array.isArray(value)) {
      const badIndex = value.findIndex((item) => !matchesType(item, itemType));
      if (badIndex >= 0) {
        issues.push(`field "${name}[${badIndex}]" must be ${itemType}`);
        continue;
      }
    }

    normalized[name] = value;
  }

  for (const name of Object.keys(args)) {
    if (Object.hasOwn(schema, name)) continue;
    if (extraArguments === 'reject') {
      issues.push(`unexpected field "${name}"`);
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(toolName, issues);
  }
  return normalized;
}
