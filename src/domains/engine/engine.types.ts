/**
 * Media-relay engine binding
 *
 * The coordinator talks to its engine through two channels only:
 * one-way commands, and a single lazily consumed stream of events.
 * Any engine (the in-process relay engine, an SFU adapter, a test fake)
 * can sit behind this interface.
 */
import type { PeerId, RoomId } from "@src/domains/room/room.types.js";

export type EngineCommand =
  | { kind: "add-peer"; peerId: PeerId }
  | { kind: "remove-peer"; peerId: PeerId }
  | { kind: "media-event"; peerId: PeerId; data: unknown }
  | { kind: "shutdown" };

export type EngineCommandKind = EngineCommand["kind"];

export interface PeerTarget {
  type: "peer";
  peerId: PeerId;
}

export interface BroadcastTarget {
  type: "broadcast";
  except?: PeerId;
}

/** Events about the engine itself rather than about a peer */
export interface EngineTarget {
  type: "engine";
}

export type EngineEventTarget = PeerTarget | BroadcastTarget | EngineTarget;

export type EngineEvent =
  | { kind: "media-event"; target: PeerTarget | BroadcastTarget; payload: unknown }
  | { kind: "peer-joined"; target: PeerTarget; payload: { metadata: unknown } }
  | { kind: "peer-left"; target: PeerTarget; payload: null }
  | {
      kind: "command-failed";
      target: PeerTarget | EngineTarget;
      payload: { command: EngineCommandKind; reason: string };
    }
  | { kind: "shutdown-complete"; target: EngineTarget; payload: null }
  | { kind: "crashed"; target: EngineTarget; payload: { reason: string } };

export interface EngineBinding {
  /**
   * One-way dispatch. Outcomes arrive later as events. Throws
   * EngineCommandError when the engine no longer takes commands or
   * refuses the command outright (a full room on add-peer).
   */
  command(command: EngineCommand): void;

  /**
   * The engine's event stream. Unbounded and non-restartable: it can be
   * taken once, by the owning coordinator.
   */
  events(): AsyncIterable<EngineEvent>;
}

export type EngineFactory = (roomId: RoomId) => Promise<EngineBinding>;

export const peerTarget = (peerId: PeerId): PeerTarget => ({ type: "peer", peerId });

export const engineTarget: EngineTarget = { type: "engine" };
