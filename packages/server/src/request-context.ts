/**
 * Request Context
 *
 * Framework-agnostic helpers for pulling the session id and request ids
 * out of an incoming request. Framework adapters map their request shape to
 * `RequestContext` and attach it to the request object.
 */

import { ContextError } from "yoguido-shared";
import { generateUUID } from "./utils";

// =============================================================================
// Types
// =============================================================================

/**
 * Context extracted from an incoming request.
 */
export interface RequestContext {
  /** Unique per request; taken from `x-request-id` when the caller sends one */
  requestId: string;
  /** Render session the request targets */
  sessionId?: string;
  /** Correlates logs across services (`x-trace-id`) */
  traceId?: string;
  metadata?: Record<string, unknown>;
}

export type RequestHeaders = Record<string, string | string[] | undefined>;

// =============================================================================
// ID Generators
// =============================================================================

export type IdGenerator = () => string;

export const uuidV4Generator: IdGenerator = generateUUID;

/**
 * @example createPrefixedIdGenerator('sess') // -> 'sess_9b1d...'
 */
export function createPrefixedIdGenerator(prefix: string): IdGenerator {
  return () => `${prefix}_${generateUUID()}`;
}

// =============================================================================
// Extraction
// =============================================================================

/** Header carrying the session id for requests without a JSON body */
export const SESSION_HEADER = "x-yoguido-session";
export const REQUEST_ID_HEADER = "x-request-id";
export const TRACE_ID_HEADER = "x-trace-id";

export type ContextExtractor = (body: unknown, headers: RequestHeaders, query?: unknown) => RequestContext;

function header(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first ? first : undefined;
}

function stringField(source: unknown, name: string): string | undefined {
  if (typeof source !== "object" || source === null || !(name in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, name);
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Session id from the body's `session` field, then the `x-yoguido-session`
 * header, then the `session` query parameter.
 */
export function extractSessionId(body: unknown, headers: RequestHeaders, query?: unknown): string | undefined {
  return stringField(body, "session") ?? header(headers, SESSION_HEADER) ?? stringField(query, "session");
}

/**
 * Build a context extractor. Request ids come from `x-request-id` or `generateId`.
 */
export function createContextExtractor(options: { generateId?: IdGenerator } = {}): ContextExtractor {
  const generateId = options.generateId ?? uuidV4Generator;
  return (body, headers, query) => {
    const context: RequestContext = {
      requestId: header(headers, REQUEST_ID_HEADER) ?? generateId(),
    };
    const sessionId = extractSessionId(body, headers, query);
    if (sessionId) context.sessionId = sessionId;
    const traceId = header(headers, TRACE_ID_HEADER);
    if (traceId) context.traceId = traceId;
    return context;
  };
}

export const defaultContextExtractor: ContextExtractor = createContextExtractor();

// =============================================================================
// Request Attachment
// =============================================================================

const attached = new WeakMap<object, RequestContext>();

export function attachContext(request: object, context: RequestContext): void {
  attached.set(request, context);
}

export function getContext(request: object): RequestContext | undefined {
  return attached.get(request);
}

/**
 * @throws ContextError when no context was attached (middleware missing)
 */
export function requireContext(request: object): RequestContext {
  const context = attached.get(request);
  if (!context) {
    throw new ContextError("Request context not attached; mount the YoGuido middleware first");
  }
  return context;
}
