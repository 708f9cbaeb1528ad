/**
 * # YoGuido Server
 *
 * Framework-agnostic helpers for YoGuido transports. Works with Express or
 * any other Node.js server framework.
 *
 * - **Wire validation** - zod schemas for inbound events and requests
 * - **Request context** - session and request id extraction
 * - **HTTP errors** - status codes for the error hierarchy
 *
 * ```typescript
 * import { parseClientEvent, toHttpError } from 'yoguido-server';
 *
 * try {
 *   res.json(await app.dispatch(parseClientEvent(req.body)));
 * } catch (error) {
 *   const { status, body } = toHttpError(error);
 *   res.status(status).json(body);
 * }
 * ```
 *
 * @module yoguido-server
 */

export { generateUUID } from "./utils";

export {
  uuidV4Generator,
  createPrefixedIdGenerator,
  SESSION_HEADER,
  REQUEST_ID_HEADER,
  TRACE_ID_HEADER,
  extractSessionId,
  createContextExtractor,
  defaultContextExtractor,
  attachContext,
  getContext,
  requireContext,
} from "./request-context";

export type { RequestContext, RequestHeaders, IdGenerator, ContextExtractor } from "./request-context";

export {
  jsonValueSchema,
  clientEventSchema,
  navigateRequestSchema,
  sessionRequestSchema,
  parseClientEvent,
  parseNavigateRequest,
  parseSessionRequest,
} from "./messages";

export { toHttpError } from "./http-errors";
export type { HttpError } from "./http-errors";
