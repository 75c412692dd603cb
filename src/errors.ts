/** A requested tool could not be run, or ran and reported a failure. */
export class ToolExecutionError extends Error {
  constructor(message: string, readonly toolName?: string) {
    super(message);
    this.name = "ToolExecutionError";
  }
}

/** Error response sent back by the tool server. */
export class JsonRpcError extends Error {
  constructor(readonly code: number, message: string, readonly data?: unknown) {
    super(message);
    this.name = "JsonRpcError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
