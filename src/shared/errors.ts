import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

export enum TerminalErrorKind {
  SPAWN_FAILURE = "SpawnFailure",
  OUTPUT_FAILURE = "OutputFailure",
  INVALID_ARGUMENT = "InvalidArgument",
  METHOD_NOT_FOUND = "MethodNotFound",
  TIMEOUT = "Timeout",
  CANCELLED = "Cancelled",
  COMMAND_REJECTED = "CommandRejected",
  FETCH_FAILURE = "FetchFailure",
  RESOURCE_NOT_FOUND = "ResourceNotFound",
}

export class TerminalError extends Error {
  readonly kind: TerminalErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(kind: TerminalErrorKind, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "TerminalError";
    this.kind = kind;
    this.context = context;
  }
}

const PROTOCOL_CODES: Record<TerminalErrorKind, ErrorCode> = {
  [TerminalErrorKind.SPAWN_FAILURE]: ErrorCode.InternalError,
  [TerminalErrorKind.OUTPUT_FAILURE]: ErrorCode.InternalError,
  [TerminalErrorKind.INVALID_ARGUMENT]: ErrorCode.InvalidParams,
  [TerminalErrorKind.METHOD_NOT_FOUND]: ErrorCode.MethodNotFound,
  [TerminalErrorKind.TIMEOUT]: ErrorCode.InternalError,
  [TerminalErrorKind.CANCELLED]: ErrorCode.InternalError,
  [TerminalErrorKind.COMMAND_REJECTED]: ErrorCode.InvalidParams,
  [TerminalErrorKind.FETCH_FAILURE]: ErrorCode.InternalError,
  [TerminalErrorKind.RESOURCE_NOT_FOUND]: ErrorCode.InvalidParams,
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Convert anything thrown by a handler into the protocol-level error the client sees.
 * `data.kind` is the machine-readable kind; unknown failures surface as InternalError.
 */
export function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof TerminalError) {
    return new McpError(PROTOCOL_CODES[err.kind], err.message, { kind: err.kind, ...err.context });
  }
  return new McpError(ErrorCode.InternalError, errorMessage(err), { kind: "InternalError" });
}
