import type { AppContext } from '../../app/context.js';
import { ValidationError } from '../../shared/types.js';
import { parseCallsJson } from '../shared/json.js';
import { consoleOutput, printJson, runCommand, type CommandOutput } from '../shared/result.js';

export interface TurnCommandInput {
  sessionId: string;
  message: string;
  rawCalls?: string;
}

export async function runTurnCommand(
  parsed: TurnCommandInput,
  context: AppContext,
  output: CommandOutput = consoleOutput,
): Promise<number> {
  return runCommand(async () => {
    if (!parsed.sessionId.trim()) {
      throw new ValidationError('--session must not be empty', 'INVALID_ARGS');
    }
    const response = await context.orchestrator.runTurn({
      sessionId: parsed.sessionId,
      message: parsed.message,
      toolCalls: parseCallsJson(parsed.rawCalls),
    });
    printJson(output, {
      response,
      sessions: context.sessions.listSummaries(),
    });
    return response.error ? 1 : 0;
  }, output, { usage: 'Usage: opsdesk turn --session <id> --message <text> [--calls <json>]', printUsageOnValidationError: true });
}
