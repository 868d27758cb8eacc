import { ValidationError } from '../../shared/types.js';
import { isToolArguments, type ToolArguments } from '../../shared/values.js';
import type { ToolCallInput } from '../../app/orchestrator.js';

function parseJson(raw: string, label: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      `Invalid ${label} json: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_ARGS',
    );
  }
}

export function parseArgsJson(raw: string | undefined): ToolArguments {
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return {};
  }
  const parsed = parseJson(raw, '--args');
  if (!isToolArguments(parsed)) {
    throw new ValidationError('--args must be a JSON object', 'INVALID_ARGS');
  }
  return parsed;
}

export function parseCallsJson(raw: string | undefined): ToolCallInput[] {
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return [];
  }
  const parsed = parseJson(raw, '--calls');
  if (!Array.isArray(parsed)) {
    throw new ValidationError('--calls must be a JSON array', 'INVALID_ARGS');
  }

  return parsed.map((entry: unknown, index): ToolCallInput => {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new ValidationError(`--calls[${index}] must be an object`, 'INVALID_ARGS');
    }
    const name: unknown = Reflect.get(entry, 'name');
    const id: unknown = Reflect.get(entry, 'id');
    const args: unknown = Reflect.get(entry, 'arguments');
    if (typeof name !== 'string' || name.trim().length === 0) {
      throw new ValidationError(`--calls[${index}].name must be a non-empty string`, 'INVALID_ARGS');
    }
    if (args !== undefined && !isToolArguments(args)) {
      throw new ValidationError(`--calls[${index}].arguments must be an object`, 'INVALID_ARGS');
    }
    return {
      name,
      ...(typeof id === 'string' && id.length > 0 ? { id } : {}),
      ...(args !== undefined ? { arguments: args } : {}),
    };
  });
}
