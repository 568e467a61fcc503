/**
 * Correlation ID generation for request tracing
 */
import { randomBytes } from "node:crypto";

/**
 * Generate a unique correlation/request ID for tracing a socket event
 * through the handler, the room coordinator and the engine logs
 */
export function generateCorrelationId(): string {
  return randomBytes(8).toString("hex");
}
