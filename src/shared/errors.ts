/**
 * Shared error message constants for consistent error responses
 */
import type { EngineCommandKind } from "@src/domains/engine/engine.types.js";

export const Errors = {
  // General
  INVALID_PAYLOAD: "Invalid payload",
  INTERNAL_ERROR: "Internal server error",
  NOT_CONNECTED: "Client is not registered",
  CONNECTION_CLOSED: "Connection closed",

  // Join
  ALREADY_JOINED: "Already joined a room",
  NOT_IN_ROOM: "Not in a room",
  ROOM_START_FAILED: "Room failed to start",
  ROOM_UNAVAILABLE: "Room is closing, try again",

  // Engine
  ROOM_FULL: "Room is full",
  PEER_EXISTS: "Peer already added",
  ENGINE_CAPACITY: "No capacity for new rooms",
} as const;

/** A room coordinator could not bring its engine up */
export class StartError extends Error {
  constructor(
    readonly roomId: string,
    cause: unknown,
  ) {
    super(`Room ${roomId} failed to start`, { cause });
    this.name = "StartError";
  }
}

/** The engine binding refused a command */
export class EngineCommandError extends Error {
  constructor(
    readonly command: EngineCommandKind,
    message: string,
  ) {
    super(message);
    this.name = "EngineCommandError";
  }
}
