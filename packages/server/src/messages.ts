/**
 * Inbound wire messages, validated with zod.
 *
 * @example
 * ```typescript
 * const event = parseClientEvent(req.body);
 * const message = await app.dispatch(event);
 * ```
 */

import { z } from "zod";
import { ValidationError, type ClientEvent, type JsonValue, type NavigateRequest, type SessionRequest } from "yoguido-shared";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const sessionId = z.string().min(1, "session must not be empty");

export const clientEventSchema = z.object({
  session: sessionId,
  node: z.string().min(1, "node must not be empty"),
  event: z.string().min(1, "event must not be empty"),
  payload: jsonValueSchema.optional(),
});

export const navigateRequestSchema = z.object({
  session: sessionId,
  path: z.string().startsWith("/", 'path must start with "/"'),
});

export const sessionRequestSchema = z.object({
  session: sessionId,
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  const field = issue.path.join(".") || "body";
  throw new ValidationError(field, `Invalid ${what}: ${field}: ${issue.message}`, {
    code: issue.code === "invalid_type" ? "VALIDATION_TYPE" : "VALIDATION_CONSTRAINT",
  });
}

/**
 * @throws ValidationError
 */
export function parseClientEvent(input: unknown): ClientEvent {
  return parse(clientEventSchema, input, "event");
}

/**
 * @throws ValidationError
 */
export function parseNavigateRequest(input: unknown): NavigateRequest {
  return parse(navigateRequestSchema, input, "navigate request");
}

/**
 * @throws ValidationError
 */
export function parseSessionRequest(input: unknown): SessionRequest {
  return parse(sessionRequestSchema, input, "session request");
}
