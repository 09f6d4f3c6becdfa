export enum ToolErrorCode {
  MISSING_RUN_ARG = "MISSING_RUN_ARG",
  CONFLICTING_ACTIONS = "CONFLICTING_ACTIONS",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
}

export class ToolError extends Error {
  readonly code: ToolErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ToolErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ToolError";
    this.code = code;
    this.context = context;
  }
}

/** Exit status for an input error that aborts the invocation. */
export function exitCodeFor(err: ToolError): number {
  return err.code === ToolErrorCode.MISSING_RUN_ARG ? 1 : 2;
}
