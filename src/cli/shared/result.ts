import { ValidationError } from '../../shared/types.js';
import { formatCliError } from './exitCode.js';

export interface CommandExecutionOptions {
  usage?: string | (() => string);
  printUsageOnValidationError?: boolean;
}

export interface CommandOutput {
  log: (line: string) => void;
  error: (line: string) => void;
}

export const consoleOutput: CommandOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function printJson(output: CommandOutput, payload: unknown): void {
  output.log(JSON.stringify(payload, null, 2));
}

export async function runCommand(
  execute: () => Promise<number> | number,
  output: CommandOutput = consoleOutput,
  options: CommandExecutionOptions = {},
): Promise<number> {
  try {
    return await Promise.resolve(execute());
  } catch (error) {
    const validationError = error instanceof ValidationError ? error : undefined;
    if (validationError) {
      output.error(`[${validationError.code}] ${validationError.message}`);
    } else {
      output.error(formatCliError(error));
    }
    if (options.usage && options.printUsageOnValidationError && validationError) {
      output.error(typeof options.usage === 'function' ? options.usage() : options.usage);
    }
    return 1;
  }
}
