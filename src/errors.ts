/**
 * Error taxonomy for the bridge.
 *
 * ConfigError and DialError are fatal at startup. StreamError and
 * CancellationError end one retry iteration and are recovered by the
 * orchestrator.
 */

export type BridgeErrorCode = "CONFIG_ERROR" | "DIAL_ERROR" | "STREAM_ERROR" | "CANCELLED";

/**
 * Base bridge error class
 */
export class BridgeError extends Error {
  readonly code: BridgeErrorCode;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: { code: BridgeErrorCode; suggestion?: string },
  ) {
    super(message);
    this.name = "BridgeError";
    this.code = options.code;
    this.suggestion = options.suggestion;
  }
}

/**
 * Malformed configuration or TLS material
 */
export class ConfigError extends BridgeError {
  constructor(message: string, options: { suggestion?: string } = {}) {
    super(message, { code: "CONFIG_ERROR", ...options });
    this.name = "ConfigError";
  }
}

/**
 * Connection to the target or collector could not be established
 */
export class DialError extends BridgeError {
  constructor(message: string, options: { suggestion?: string } = {}) {
    super(message, { code: "DIAL_ERROR", ...options });
    this.name = "DialError";
  }
}

/**
 * Opening, sending on or receiving from a subscribe/publish stream failed
 */
export class StreamError extends BridgeError {
  constructor(message: string) {
    super(message, { code: "STREAM_ERROR" });
    this.name = "StreamError";
  }
}

/**
 * A session observed that its iteration's scope was cancelled.
 * `reason` is what the scope was aborted with, usually the sibling's error.
 */
export class CancellationError extends BridgeError {
  readonly reason: unknown;

  constructor(reason?: unknown) {
    super(`session cancelled: ${describeReason(reason)}`, { code: "CANCELLED" });
    this.name = "CancellationError";
    this.reason = reason;
  }
}

export function isCancellation(err: unknown): err is CancellationError {
  return err instanceof CancellationError;
}

/** A stream failure caused by our own cancellation is reported as cancellation. */
export function streamFailure(signal: AbortSignal, message: string): BridgeError {
  if (signal.aborted) return new CancellationError(signal.reason);
  return new StreamError(message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function describeReason(reason: unknown): string {
  if (reason === undefined) return "scope closed";
  return errorMessage(reason);
}
