import { CommandResult, ErrorKind } from "./types.js";

export class BridgeError extends Error {
  constructor(readonly kind: ErrorKind, message: string) {
    super(message);
    this.name = "BridgeError";
  }
}

export class TimeoutError extends BridgeError {
  constructor(operation: string, timeoutMs: number) {
    super("timeout", `${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export function failure(kind: ErrorKind, message: string): CommandResult {
  return { status: "error", kind, message };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function httpStatusFor(kind: ErrorKind): number {
  switch (kind) {
    case "unknown_device":
      return 404;
    case "device_unreachable":
    case "timeout":
    case "queue_overflow":
      return 503;
    case "pairing_required":
    case "certificate_invalid":
      return 409;
    case "pairing_failed":
      return 401;
    default:
      return 400;
  }
}
