/**
 * Map errors to HTTP responses.
 */

import { Logger } from "yoguido-kernel";
import {
  ensureError,
  isNotFoundError,
  isValidationError,
  isYoGuidoError,
  type WireError,
} from "yoguido-shared";

export interface HttpError {
  status: number;
  body: { error: WireError };
}

/**
 * `NotFoundError` -> 404, `ValidationError` -> 400, anything else -> 500.
 * Unexpected errors are logged and their message is not exposed.
 */
export function toHttpError(error: unknown): HttpError {
  if (isNotFoundError(error)) {
    return { status: 404, body: { error: { code: error.code, message: error.message } } };
  }
  if (isValidationError(error)) {
    return { status: 400, body: { error: { code: error.code, message: error.message } } };
  }
  if (isYoGuidoError(error)) {
    return { status: 500, body: { error: { code: error.code, message: error.message } } };
  }
  Logger.for("http-errors").error({ err: ensureError(error) }, "unhandled error");
  return { status: 500, body: { error: { code: "INTERNAL_ERROR", message: "Internal server error" } } };
}
