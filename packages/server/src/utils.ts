import { randomUUID } from "node:crypto";

/**
 * RFC 4122 v4 UUID.
 */
export function generateUUID(): string {
  return randomUUID();
}
