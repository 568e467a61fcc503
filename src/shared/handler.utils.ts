/**
 * Socket handler utilities
 * Provides a createHandler wrapper for consistent validation, error handling, and metrics
 */
import type { z } from "zod";
import { logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import type { PeerSocket } from "@src/domains/peer/socketTransport.js";
import type { AppContext } from "@src/context.js";
import { Errors } from "./errors.js";
import { generateCorrelationId } from "./correlation.js";

/**
 * Standard handler result shape
 */
export interface HandlerResult {
  success: boolean;
  error?: string;
  data?: unknown;
}

/**
 * Handler function signature
 */
type HandlerFn<TPayload> = (
  payload: TPayload,
  socket: PeerSocket,
  context: AppContext,
) => Promise<HandlerResult>;

/**
 * Callback function signature from Socket.IO
 */
type SocketCallback = (result: HandlerResult) => void;

const asCallback = (value: unknown): SocketCallback | undefined =>
  typeof value === "function" ? (result: HandlerResult) => value(result) : undefined;

const record = (eventName: string, status: string, startTime: number): number => {
  const durationMs = Date.now() - startTime;
  metrics.eventsTotal.inc({ event: eventName, status });
  metrics.eventLatency.observe({ event: eventName }, durationMs / 1000);
  return durationMs;
};

/**
 * Create a wrapped socket event handler with:
 * - Zod schema validation
 * - Centralized error handling
 * - Logging with correlation IDs
 * - Event count and latency metrics
 *
 * @example
 * ```typescript
 * export const joinHandler = createHandler(
 *   'room:join',
 *   joinRoomSchema,
 *   async (payload, socket, context) => {
 *     return { success: true };
 *   }
 * );
 *
 * socket.on('room:join', joinHandler(socket, context));
 * ```
 */
export function createHandler<TPayload>(
  eventName: string,
  schema: z.ZodSchema<TPayload>,
  handler: HandlerFn<TPayload>,
) {
  return (socket: PeerSocket, context: AppContext) => {
    return async (rawPayload: unknown, ack?: unknown): Promise<void> => {
      const callback = asCallback(ack);
      const startTime = Date.now();
      const requestId = generateCorrelationId();

      // 1. Validate payload
      const parseResult = schema.safeParse(rawPayload);
      if (!parseResult.success) {
        record(eventName, "invalid", startTime);
        logger.debug(
          {
            requestId,
            event: eventName,
            socketId: socket.id,
            errors: parseResult.error.format(),
          },
          "Validation failed",
        );
        callback?.({ success: false, error: Errors.INVALID_PAYLOAD });
        return;
      }

      // 2. Execute handler
      try {
        const result = await handler(parseResult.data, socket, context);

        const durationMs = record(eventName, result.success ? "success" : "failure", startTime);
        logger.debug(
          {
            requestId,
            event: eventName,
            socketId: socket.id,
            success: result.success,
            durationMs,
          },
          "Handler completed",
        );

        callback?.(result);
      } catch (err) {
        const durationMs = record(eventName, "error", startTime);
        logger.error(
          {
            err,
            requestId,
            event: eventName,
            socketId: socket.id,
            durationMs,
          },
          "Handler exception",
        );

        callback?.({ success: false, error: Errors.INTERNAL_ERROR });
      }
    };
  };
}

/**
 * Create a handler without validation (for events with no payload)
 */
export function createSimpleHandler(
  eventName: string,
  handler: (socket: PeerSocket, context: AppContext) => Promise<HandlerResult>,
) {
  return (socket: PeerSocket, context: AppContext) => {
    return async (...args: unknown[]): Promise<void> => {
      // The ack, when the client asked for one, is always the last argument
      const callback = asCallback(args[args.length - 1]);
      const startTime = Date.now();
      const requestId = generateCorrelationId();

      try {
        const result = await handler(socket, context);

        const durationMs = record(eventName, result.success ? "success" : "failure", startTime);
        logger.debug(
          {
            requestId,
            event: eventName,
            socketId: socket.id,
            success: result.success,
            durationMs,
          },
          "Handler completed",
        );

        callback?.(result);
      } catch (err) {
        const durationMs = record(eventName, "error", startTime);
        logger.error(
          {
            err,
            requestId,
            event: eventName,
            socketId: socket.id,
            durationMs,
          },
          "Handler exception",
        );

        callback?.({ success: false, error: Errors.INTERNAL_ERROR });
      }
    };
  };
}
