export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_TOOL_SPEC"
  | "INVALID_CONFIG"
  | "INVALID_ARGS"
  | "DUPLICATE_SESSION";

export class ValidationError extends Error {
  public readonly code: string;
  constructor(message: string, code: ErrorCode | string = "VALIDATION_ERROR") {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

export class DuplicateSessionError extends ValidationError {
  public readonly sessionId: string;
  constructor(sessionId: string) {
    super(`Session ${sessionId} already exists`, "DUPLICATE_SESSION");
    this.name = "DuplicateSessionError";
    this.sessionId = sessionId;
  }
}

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
