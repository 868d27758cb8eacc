import { Command } from 'commander';
import { createAppContext } from '../../../app/context.js';
import { resolveAppConfig } from '../../../config/appConfig.js';
import { setExitCode } from '../../shared/exitCode.js';
import { runCommand } from '../../shared/result.js';
import { runTurnCommand } from '../turn.js';

export function buildTurnCommand(program: Command): Command {
  return program
    .command('turn')
    .description('Run one conversational turn against a fresh in-memory context')
    .requiredOption('--session <id>', 'Session id; created when unknown.')
    .requiredOption('--message <text>', 'User message to record.')
    .option('--calls <json>', 'JSON array of tool calls to execute in this turn.')
    .action(async (options: { session: string; message: string; calls?: string }) => {
      const code = await runCommand(async () => {
        const context = createAppContext(resolveAppConfig());
        context.start();
        try {
          return await runTurnCommand(
            { sessionId: options.session, message: options.message, rawCalls: options.calls },
            context,
          );
        } finally {
          await context.shutdown();
        }
      });
      setExitCode(code);
    });
}
