/**
 * Standard error classes for CouchLift
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  TRANSPORT_ERROR = "TRANSPORT_ERROR",
  REQUEST_TIMEOUT = "REQUEST_TIMEOUT",
  DECODE_ERROR = "DECODE_ERROR",
  CONFLICT_ERROR = "CONFLICT_ERROR",
  STALL_ERROR = "STALL_ERROR",
  DELETION_REFUSED = "DELETION_REFUSED",
  USAGE_ERROR = "USAGE_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class CouchLiftError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "CouchLiftError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export interface TransportDetails {
  method: string;
  url: string;
  status?: number;
  body?: unknown;
}

/**
 * Non-2xx response or connection failure. Never retried.
 */
export class TransportError extends CouchLiftError {
  constructor(
    message: string,
    public readonly transport: TransportDetails,
    options?: ErrorOptions,
    code: ErrorCode = ErrorCode.TRANSPORT_ERROR,
  ) {
    super(code, message, transport, options);
    this.name = "TransportError";
  }

  get status(): number | undefined {
    return this.transport.status;
  }
}

/**
 * A bounded request ran out of time before the server answered.
 */
export class RequestTimeoutError extends TransportError {
  constructor(
    message: string,
    transport: TransportDetails,
    public readonly timeoutMs: number,
    options?: ErrorOptions,
  ) {
    super(message, transport, options, ErrorCode.REQUEST_TIMEOUT);
    this.name = "RequestTimeoutError";
  }
}

export class DecodeError extends CouchLiftError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.DECODE_ERROR, message, details, options);
    this.name = "DecodeError";
  }
}

export class ConflictError extends CouchLiftError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFLICT_ERROR, message, details, options);
    this.name = "ConflictError";
  }
}

export class StallError extends CouchLiftError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.STALL_ERROR, message, details, options);
    this.name = "StallError";
  }
}

export class DeletionRefusedError extends CouchLiftError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.DELETION_REFUSED, message, details, options);
    this.name = "DeletionRefusedError";
  }
}

export class UsageError extends CouchLiftError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.USAGE_ERROR, message, details, options);
    this.name = "UsageError";
  }
}

export class ConfigError extends CouchLiftError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

/**
 * Wrap anything thrown into a CouchLiftError for reporting
 */
export function toCouchLiftError(error: unknown): CouchLiftError {
  if (error instanceof CouchLiftError) {
    return error;
  }
  return new CouchLiftError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
