/**
 * Stage of an operation at which an error was raised
 */
export type DwollaErrorStage =
  | "configure"
  | "authenticate"
  | "encode"
  | "send"
  | "decode"
  | "status";

export interface DwollaErrorContext {
  /** Operation that failed, e.g. `customers.get` */
  operation: string;
  stage: DwollaErrorStage;
  /** HTTP status, when the vendor answered */
  statusCode?: number;
  /** Decoded vendor error body, when one was sent */
  body?: unknown;
  cause?: unknown;
}

/**
 * Base class for every error raised by the client
 *
 * @example
 * ```typescript
 * try {
 *   await dwolla.customers.get(customerId);
 * } catch (error) {
 *   if (error instanceof NotFoundError) {
 *     // error.operation === "customers.get"
 *   }
 * }
 * ```
 */
export class DwollaError extends Error {
  public readonly operation: string;
  public readonly stage: DwollaErrorStage;
  public readonly statusCode?: number;
  public readonly body?: unknown;

  constructor(message: string, context: DwollaErrorContext) {
    super(message, { cause: context.cause });
    this.name = "DwollaError";
    this.operation = context.operation;
    this.stage = context.stage;
    this.statusCode = context.statusCode;
    this.body = context.body;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      operation: this.operation,
      stage: this.stage,
      statusCode: this.statusCode,
      body: this.body,
    };
  }
}

/**
 * Client configuration is missing or invalid
 */
export class ConfigurationError extends DwollaError {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message, { operation: "configure", stage: "configure" });
    this.name = "ConfigurationError";
  }
}

/**
 * A bearer token could not be obtained
 */
export class AuthenticationError extends DwollaError {
  constructor(message: string, context: DwollaErrorContext) {
    super(message, context);
    this.name = "AuthenticationError";
  }
}

/**
 * HTTP 400: duplicate resource or payload rejected by the vendor
 */
export class ValidationError extends DwollaError {
  constructor(message: string, context: DwollaErrorContext) {
    super(message, context);
    this.name = "ValidationError";
  }
}

/**
 * HTTP 403
 */
export class AuthorizationError extends DwollaError {
  constructor(message: string, context: DwollaErrorContext) {
    super(message, context);
    this.name = "AuthorizationError";
  }
}

/**
 * HTTP 404
 */
export class NotFoundError extends DwollaError {
  constructor(message: string, context: DwollaErrorContext) {
    super(message, context);
    this.name = "NotFoundError";
  }
}

/**
 * Any other unexpected status; the message is the raw status line
 */
export class PassthroughError extends DwollaError {
  constructor(
    message: string,
    context: DwollaErrorContext,
    public readonly statusText: string,
  ) {
    super(message, context);
    this.name = "PassthroughError";
  }
}

/**
 * The request never produced a response (DNS, refused connection, timeout)
 */
export class NetworkError extends DwollaError {
  constructor(message: string, context: DwollaErrorContext) {
    super(message, context);
    this.name = "NetworkError";
  }
}

/**
 * A payload could not be encoded, or a response did not decode to the
 * expected shape
 */
export class SerializationError extends DwollaError {
  constructor(message: string, context: DwollaErrorContext) {
    super(message, context);
    this.name = "SerializationError";
  }
}

export function isDwollaError(error: unknown): error is DwollaError {
  return error instanceof DwollaError;
}

/**
 * Message of an unknown thrown value, for wrapping
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
