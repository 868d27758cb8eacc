export function setExitCode(code: number): void {
  process.exitCode = code;
}

export function formatCliError(error: unknown): string {
  return `ERROR: ${error instanceof Error ? error.message : String(error)}`;
}
