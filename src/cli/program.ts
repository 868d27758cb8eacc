import { Command } from 'commander';
import { buildToolsCommand } from './commands/tools/register.js';
import { buildTurnCommand } from './commands/turn/register.js';
import { setExitCode } from './shared/exitCode.js';
import { VERSION } from './version.js';

const GLOBAL_NOTES = 'Notes: state is in memory only; every invocation starts with an empty session store. Limits come from OPSDESK_* environment variables.';

export function buildProgram(): Command {
  const program = new Command('opsdesk');

  program
    .description('Tool registry and session store command line interface')
    .addHelpText('beforeAll', `${GLOBAL_NOTES}\n`)
    .helpOption('-h, --help', 'display help for command')
    .option('-v, --version', 'display version')
    .allowExcessArguments(true)
    .action((options: { version?: boolean }, command: Command) => {
      if (options.version) {
        console.log(`opsdesk v${VERSION}`);
        setExitCode(0);
        return;
      }

      if (command.args.length > 0) {
        console.error(`Unknown command: ${command.args[0]}`);
        setExitCode(1);
        return;
      }

      command.outputHelp();
      setExitCode(0);
    });

  buildToolsCommand(program);
  buildTurnCommand(program);

  return program;
}

export async function runCli(argv: string[]): Promise<number> {
  const program = buildProgram();
  await program.parseAsync(argv, { from: 'user' });
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}

