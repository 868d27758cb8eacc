import type { AppContext } from '../../app/context.js';
import { createToolCall } from '../../tools/registry.js';
import { parseArgsJson, parseCallsJson } from '../shared/json.js';
import { consoleOutput, printJson, runCommand, type CommandOutput } from '../shared/result.js';

export type ToolsCommandInput =
  | { kind: 'list'; allowList?: string[] }
  | { kind: 'info'; name: string }
  | { kind: 'validate'; name: string; rawArgs?: string }
  | { kind: 'invoke'; name: string; rawArgs?: string }
  | { kind: 'batch'; rawCalls: string };

export async function runToolsCommand(
  parsed: ToolsCommandInput,
  context: AppContext,
  output: CommandOutput = consoleOutput,
): Promise<number> {
  const { registry } = context;
  return runCommand(async () => {
    if (parsed.kind === 'list') {
      printJson(output, registry.list({ allowList: parsed.allowList }));
      return 0;
    }
    if (parsed.kind === 'info') {
      const descriptor = registry.getDescriptor(parsed.name);
      if (!descriptor) {
        output.error(`Tool not found: ${parsed.name}`);
        return 1;
      }
      printJson(output, descriptor);
      return 0;
    }
    if (parsed.kind === 'validate') {
      const errors = registry.validate(createToolCall(parsed.name, parseArgsJson(parsed.rawArgs)));
      printJson(output, { valid: errors.length === 0, errors });
      return errors.length === 0 ? 0 : 1;
    }
    if (parsed.kind === 'invoke') {
      const call = createToolCall(parsed.name, parseArgsJson(parsed.rawArgs), `cli-${Date.now()}`);
      const result = await registry.execute(call);
      printJson(output, { call, result });
      return result.error ? 1 : 0;
    }

    const calls = parseCallsJson(parsed.rawCalls).map((input) =>
      createToolCall(input.name, input.arguments ?? {}, input.id),
    );
    const results = await registry.executeBatch(calls);
    printJson(output, calls.map((call, index) => ({ call, result: results[index] })));
    return results.some((result) => result.error) ? 1 : 0;
  }, output);
}
