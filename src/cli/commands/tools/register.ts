import { Command } from 'commander';
import { createAppContext } from '../../../app/context.js';
import { resolveAppConfig } from '../../../config/appConfig.js';
import { setExitCode } from '../../shared/exitCode.js';
import { runCommand } from '../../shared/result.js';
import { runToolsCommand, type ToolsCommandInput } from '../tools.js';

function splitList(raw: string | undefined): string[] | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }
  const entries = raw.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : undefined;
}

async function runWithContext(parsed: ToolsCommandInput): Promise<number> {
  return runCommand(async () => {
    const context = createAppContext(resolveAppConfig());
    try {
      return await runToolsCommand(parsed, context);
    } finally {
      await context.shutdown();
    }
  });
}

export function buildToolsCommand(program: Command): Command {
  const tools = program.command('tools').description('Inspect and run registered tools');

  tools
    .addHelpText(
      'after',
      [
        'Examples:',
        '  opsdesk tools list',
        '  opsdesk tools info echo',
        '  opsdesk tools validate echo --args \'{"message":"hi"}\'',
        '  opsdesk tools invoke echo --args \'{"message":"hi","repeat":2}\'',
        '  opsdesk tools batch --calls \'[{"name":"echo","arguments":{"message":"a"}},{"name":"time.now"}]\'',
      ].join('\n'),
    );

  tools
    .command('list')
    .description('List tools.')
    .option('--allow <names>', 'Comma separated tool names to include.')
    .action(async (options: { allow?: string }) => {
      const allowList = splitList(options.allow);
      setExitCode(await runWithContext({ kind: 'list', ...(allowList ? { allowList } : {}) }));
    });

  tools
    .command('info')
    .description('Show tool descriptor.')
    .argument('<name>', 'Tool name.')
    .action(async (name: string) => {
      setExitCode(await runWithContext({ kind: 'info', name }));
    });

  tools
    .command('validate')
    .description('Validate arguments against a tool schema without running it.')
    .argument('<name>', 'Tool name.')
    .option('--args <json>', 'Tool arguments in json string.')
    .action(async (name: string, options: { args?: string }) => {
      setExitCode(await runWithContext({ kind: 'validate', name, rawArgs: options.args }));
    });

  tools
    .command('invoke')
    .description('Invoke tool.')
    .argument('<name>', 'Tool name.')
    .option('--args <json>', 'Tool arguments in json string.')
    .action(async (name: string, options: { args?: string }) => {
      setExitCode(await runWithContext({ kind: 'invoke', name, rawArgs: options.args }));
    });

  tools
    .command('batch')
    .description('Invoke several tools concurrently.')
    .requiredOption('--calls <json>', 'JSON array of {"name","arguments","id"} objects.')
    .action(async (options: { calls: string }) => {
      setExitCode(await runWithContext({ kind: 'batch', rawCalls: options.calls }));
    });

  return tools;
}
