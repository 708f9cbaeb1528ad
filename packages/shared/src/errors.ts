/**
 * YoGuido Error Hierarchy
 *
 * Every error raised by the engine extends YoGuidoError, which carries a
 * stable code, structured details and a JSON form that can cross the wire.
 *
 * @example Throwing errors
 * ```typescript
 * throw new NotFoundError('session', sessionId);
 * throw new BuildError('/admin', 'Layout "admin" is not registered');
 * throw HandlerTimeoutError.after(5000, 'root/button0', 'click');
 * ```
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   await router.dispatch(sessionId, nodeId, 'click');
 * } catch (error) {
 *   if (isNotFoundError(error)) {
 *     // session expired, ask the client to reload
 *   } else if (isYoGuidoError(error)) {
 *     console.log(error.code, error.toJSON());
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Error codes for programmatic handling.
 * Format: CATEGORY_SPECIFIC
 */
export const ERROR_CODES = [
  // Render pipeline
  "BUILD_FAILED",
  "DIFF_INVARIANT",
  // Event handling
  "HANDLER_FAILED",
  "HANDLER_STALE",
  "HANDLER_TIMEOUT",
  // Not Found
  "NOT_FOUND_SESSION",
  "NOT_FOUND_PAGE",
  "NOT_FOUND_LAYOUT",
  "NOT_FOUND_RESOURCE",
  // Validation
  "VALIDATION_REQUIRED",
  "VALIDATION_TYPE",
  "VALIDATION_FORMAT",
  "VALIDATION_CONSTRAINT",
  // State/Lifecycle
  "STATE_INVALID",
  "STATE_FROZEN",
  "STATE_CLOSED",
  // Transport
  "TRANSPORT_TIMEOUT",
  "TRANSPORT_CONNECTION",
  "TRANSPORT_RESPONSE",
  "TRANSPORT_PARSE",
  // Context
  "CONTEXT_NOT_FOUND",
  // Unexpected failures surfaced over HTTP
  "INTERNAL_ERROR",
] as const;

export type YoGuidoErrorCode = (typeof ERROR_CODES)[number];

const KNOWN_CODES: ReadonlySet<string> = new Set(ERROR_CODES);

export function isYoGuidoErrorCode(value: unknown): value is YoGuidoErrorCode {
  return typeof value === "string" && KNOWN_CODES.has(value);
}

export interface SerializedYoGuidoError {
  name: string;
  code: YoGuidoErrorCode;
  message: string;
  details?: Record<string, unknown>;
  cause?: SerializedYoGuidoError | { message: string; name?: string };
  stack?: string;
}

/**
 * Base class for all YoGuido errors.
 */
export class YoGuidoError extends Error {
  readonly code: YoGuidoErrorCode;

  readonly details: Record<string, unknown>;

  constructor(
    code: YoGuidoErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = "YoGuidoError";
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize error for transport (JSON-safe)
   */
  toJSON(): SerializedYoGuidoError {
    const serialized: SerializedYoGuidoError = {
      name: this.name,
      code: this.code,
      message: this.message,
    };

    if (Object.keys(this.details).length > 0) {
      serialized.details = this.details;
    }

    if (this.cause instanceof YoGuidoError) {
      serialized.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      serialized.cause = { message: this.cause.message, name: this.cause.name };
    }

    if (this.stack) {
      serialized.stack = this.stack;
    }

    return serialized;
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(json: SerializedYoGuidoError): YoGuidoError {
    let cause: Error | undefined;
    if (json.cause && "code" in json.cause) {
      cause = YoGuidoError.fromJSON(json.cause);
    } else if (json.cause) {
      cause = new Error(json.cause.message);
    }
    return new YoGuidoError(json.code, json.message, json.details, cause);
  }
}

// =============================================================================
// Render Pipeline Errors
// =============================================================================

/**
 * A page or layout function threw while the tree was being built.
 * The session keeps its last committed tree.
 *
 * @example
 * ```typescript
 * throw new BuildError('/reports', 'closeContainer() called with no open container');
 * ```
 */
export class BuildError extends YoGuidoError {
  readonly route: string;

  constructor(route: string, message: string, cause?: Error) {
    super("BUILD_FAILED", message, { route }, cause);
    this.name = "BuildError";
    this.route = route;
  }

  static from(route: string, error: unknown): BuildError {
    if (error instanceof BuildError) {
      return error;
    }
    const err = ensureError(error);
    return new BuildError(route, `Render of ${route} failed: ${err.message}`, err);
  }
}

/**
 * The diff produced an operation that references a node present in
 * neither tree. Always answered with a full resync.
 */
export class DiffInvariantViolation extends YoGuidoError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("DIFF_INVARIANT", message, details);
    this.name = "DiffInvariantViolation";
  }

  static unknownNode(op: string, id: string): DiffInvariantViolation {
    return new DiffInvariantViolation(`${op} references unknown node '${id}'`, { op, id });
  }
}

// =============================================================================
// Event Handling Errors
// =============================================================================

/**
 * A user event handler threw. The session survives and is re-rendered.
 */
export class HandlerError extends YoGuidoError {
  readonly nodeId: string;
  readonly eventName: string;

  constructor(nodeId: string, eventName: string, cause: Error) {
    super(
      "HANDLER_FAILED",
      `Handler for '${eventName}' on ${nodeId} failed: ${cause.message}`,
      { nodeId, eventName },
      cause,
    );
    this.name = "HandlerError";
    this.nodeId = nodeId;
    this.eventName = eventName;
  }
}

/**
 * The event targets a node (or event name) the committed tree no longer has.
 */
export class StaleHandlerError extends YoGuidoError {
  readonly nodeId: string;
  readonly eventName: string;

  constructor(nodeId: string, eventName: string) {
    super(
      "HANDLER_STALE",
      `No '${eventName}' handler on ${nodeId} in the committed tree`,
      { nodeId, eventName },
    );
    this.name = "StaleHandlerError";
    this.nodeId = nodeId;
    this.eventName = eventName;
  }
}

/**
 * A handler exceeded the configured time budget. The in-flight render is discarded.
 */
export class HandlerTimeoutError extends YoGuidoError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, details: Record<string, unknown> = {}) {
    super("HANDLER_TIMEOUT", message, { timeoutMs, ...details });
    this.name = "HandlerTimeoutError";
    this.timeoutMs = timeoutMs;
  }

  static after(timeoutMs: number, nodeId: string, eventName: string): HandlerTimeoutError {
    return new HandlerTimeoutError(
      `Handler for '${eventName}' on ${nodeId} timed out after ${timeoutMs}ms`,
      timeoutMs,
      { nodeId, eventName },
    );
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

export type ResourceType = "session" | "page" | "layout" | "resource";

/**
 * @example
 * ```typescript
 * throw new NotFoundError('session', 'sess_123');
 * throw new NotFoundError('layout', 'admin', 'Page /admin uses unknown layout "admin"');
 * ```
 */
export class NotFoundError extends YoGuidoError {
  readonly resourceType: ResourceType;
  readonly resourceId: string;

  constructor(resourceType: ResourceType, resourceId: string, message?: string, cause?: Error) {
    const codeMap: Record<ResourceType, YoGuidoErrorCode> = {
      session: "NOT_FOUND_SESSION",
      page: "NOT_FOUND_PAGE",
      layout: "NOT_FOUND_LAYOUT",
      resource: "NOT_FOUND_RESOURCE",
    };

    super(
      codeMap[resourceType],
      message || `${resourceType} '${resourceId}' not found`,
      { resourceType, resourceId },
      cause,
    );
    this.name = "NotFoundError";
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export type ValidationCode =
  | "VALIDATION_REQUIRED"
  | "VALIDATION_TYPE"
  | "VALIDATION_FORMAT"
  | "VALIDATION_CONSTRAINT";

/**
 * @example
 * ```typescript
 * throw ValidationError.required('session');
 * throw new ValidationError('basePath', 'basePath must start with "/"', { code: 'VALIDATION_FORMAT' });
 * ```
 */
export class ValidationError extends YoGuidoError {
  readonly field: string;
  readonly expected?: string;
  readonly received?: string;

  constructor(
    field: string,
    message: string,
    options: { expected?: string; received?: string; code?: ValidationCode } = {},
    cause?: Error,
  ) {
    super(
      options.code || "VALIDATION_REQUIRED",
      message,
      {
        field,
        ...(options.expected && { expected: options.expected }),
        ...(options.received && { received: options.received }),
      },
      cause,
    );
    this.name = "ValidationError";
    this.field = field;
    this.expected = options.expected;
    this.received = options.received;
  }

  static required(field: string, message?: string): ValidationError {
    return new ValidationError(field, message || `${field} is required`, {
      code: "VALIDATION_REQUIRED",
    });
  }

  static type(field: string, expected: string, received?: string): ValidationError {
    const msg = received
      ? `${field} must be ${expected}, received ${received}`
      : `${field} must be ${expected}`;
    return new ValidationError(field, msg, { expected, received, code: "VALIDATION_TYPE" });
  }
}

// =============================================================================
// State/Lifecycle Errors
// =============================================================================

/**
 * @example
 * ```typescript
 * throw StateError.frozen('page');
 * throw StateError.closed('sess_123');
 * ```
 */
export class StateError extends YoGuidoError {
  readonly current: string;

  constructor(
    current: string,
    message: string,
    code: "STATE_INVALID" | "STATE_FROZEN" | "STATE_CLOSED" = "STATE_INVALID",
    cause?: Error,
  ) {
    super(code, message, { current }, cause);
    this.name = "StateError";
    this.current = current;
  }

  static frozen(operation: string): StateError {
    return new StateError(
      "frozen",
      `Cannot ${operation}: the registry is frozen once the app is serving`,
      "STATE_FROZEN",
    );
  }

  static closed(sessionId: string): StateError {
    return new StateError("closed", `Session ${sessionId} is closed`, "STATE_CLOSED");
  }
}

// =============================================================================
// Transport Errors
// =============================================================================

export type TransportCode = "timeout" | "connection" | "response" | "parse";

/**
 * Network failures seen by the browser runtime.
 */
export class TransportError extends YoGuidoError {
  readonly transportCode: TransportCode;
  readonly statusCode?: number;

  constructor(
    transportCode: TransportCode,
    message: string,
    options: { statusCode?: number; url?: string } = {},
    cause?: Error,
  ) {
    const codeMap = {
      timeout: "TRANSPORT_TIMEOUT",
      connection: "TRANSPORT_CONNECTION",
      response: "TRANSPORT_RESPONSE",
      parse: "TRANSPORT_PARSE",
    } as const;

    super(
      codeMap[transportCode],
      message,
      {
        transportCode,
        ...(options.statusCode && { statusCode: options.statusCode }),
        ...(options.url && { url: options.url }),
      },
      cause,
    );
    this.name = "TransportError";
    this.transportCode = transportCode;
    this.statusCode = options.statusCode;
  }

  static connection(message: string, url?: string, cause?: Error): TransportError {
    return new TransportError("connection", message, { url }, cause);
  }

  static http(statusCode: number, url: string, message?: string): TransportError {
    return new TransportError("response", message || `HTTP ${statusCode}`, { statusCode, url });
  }
}

// =============================================================================
// Context Errors
// =============================================================================

export class ContextError extends YoGuidoError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("CONTEXT_NOT_FOUND", message, details);
    this.name = "ContextError";
  }

  static notFound(what: string = "Context"): ContextError {
    return new ContextError(
      `${what} not found. Ensure you are running inside a render pass, an event handler or Context.run().`,
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isYoGuidoError(error: unknown): error is YoGuidoError {
  return error instanceof YoGuidoError;
}

export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}

export function isDiffInvariantViolation(error: unknown): error is DiffInvariantViolation {
  return error instanceof DiffInvariantViolation;
}

export function isHandlerError(error: unknown): error is HandlerError {
  return error instanceof HandlerError;
}

export function isStaleHandlerError(error: unknown): error is StaleHandlerError {
  return error instanceof StaleHandlerError;
}

export function isHandlerTimeoutError(error: unknown): error is HandlerTimeoutError {
  return error instanceof HandlerTimeoutError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isStateError(error: unknown): error is StateError {
  return error instanceof StateError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isContextError(error: unknown): error is ContextError {
  return error instanceof ContextError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Ensure a value is an Error, wrapping if necessary.
 */
export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value));
}

/**
 * Wrap any error as a YoGuido error if it isn't already.
 */
export function wrapAsYoGuidoError(
  error: unknown,
  defaultCode: YoGuidoErrorCode = "STATE_INVALID",
): YoGuidoError {
  if (error instanceof YoGuidoError) {
    return error;
  }
  const err = ensureError(error);
  return new YoGuidoError(defaultCode, err.message, {}, err);
}
