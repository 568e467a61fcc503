/**
 * Room domain types
 */
import type { DownListener, MonitorToken } from "@src/shared/liveness.js";

export type RoomId = string;
export type PeerId = string;

export type CoordinatorState = "starting" | "active" | "terminating" | "terminated";

/**
 * What a coordinator sees of a joined peer. Implemented by the endpoint's
 * session; the coordinator only holds a reference, it never owns it.
 */
export interface PeerLink {
  readonly peerId: PeerId;
  /** Push a room event to the peer. Must not block the caller. */
  deliver(payload: unknown): void;
  /** Forced removal by the room (rollback, engine failure, shutdown) */
  evict(reason: string): void;
  monitor(listener: DownListener): MonitorToken;
}

export interface PeerHandle {
  peerId: PeerId;
  link: PeerLink;
  monitor: MonitorToken;
  joinedAt: number;
}

/**
 * Outcome of registerPeer. `retryable` refusals come from a room that is
 * no longer taking peers; a fresh findOrStart may succeed. Anything else
 * was refused by the room itself (for instance a full room).
 */
export type Registration =
  | { success: true }
  | { success: false; error: string; retryable: boolean };

export type JoinResult =
  | { success: true; roomId: RoomId; peerId: PeerId }
  | { success: false; error: string };

export interface RoomStats {
  roomId: RoomId;
  state: CoordinatorState;
  peerCount: number;
  createdAt: number;
}
