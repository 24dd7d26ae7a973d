export type TransportOperation = "connect" | "send" | "read";

export class ConnectionError extends Error {
  override readonly name = "ConnectionError";

  constructor(
    readonly host: string,
    readonly port: number,
    options?: { cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`failed to connect to ${host}:${String(port)}${reason}`, options);
  }
}

export class TimeoutError extends Error {
  override readonly name = "TimeoutError";

  constructor(
    readonly operation: TransportOperation,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`);
  }
}

export class TransportIOError extends Error {
  override readonly name = "TransportIOError";

  constructor(
    readonly operation: Exclude<TransportOperation, "connect">,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${operation} failed: ${message}`, options);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
