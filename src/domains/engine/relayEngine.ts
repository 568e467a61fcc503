/**
 * SignalingRelayEngine — in-process media-relay engine
 *
 * Keeps the negotiation state of one room (which peers announced
 * themselves, their metadata and published tracks) and relays
 * peer-to-peer negotiation messages (offers, answers, candidates) between
 * them. Media itself never passes through the server.
 *
 * Peers are added by the coordinator (add-peer) but only become visible
 * to others once they send a `join` media event.
 */
import type { Logger } from "@src/infrastructure/logger.js";
import type { PeerId, RoomId } from "@src/domains/room/room.types.js";
import { AsyncQueue } from "@src/shared/asyncQueue.js";
import { EngineCommandError, Errors } from "@src/shared/errors.js";
import {
  engineTarget,
  peerTarget,
  type EngineBinding,
  type EngineCommand,
  type EngineCommandKind,
  type EngineEvent,
} from "./engine.types.js";
import { parseClientMediaEvent } from "./mediaEvent.schemas.js";

interface RelayPeer {
  id: PeerId;
  joined: boolean;
  metadata: unknown;
  tracks: Map<string, unknown>;
}

export interface PeerDescription {
  id: PeerId;
  metadata: unknown;
  trackIdToMetadata: Record<string, unknown>;
}

export interface RelayEngineOptions {
  maxPeers: number;
  /** Invoked once when the engine stops, whatever the cause */
  onClosed?: () => void;
}

type EngineStatus = "running" | "closed" | "crashed";

export class SignalingRelayEngine implements EngineBinding {
  private readonly peers = new Map<PeerId, RelayPeer>();
  private readonly queue = new AsyncQueue<EngineEvent>();
  private eventsTaken = false;
  private status: EngineStatus = "running";

  constructor(
    readonly roomId: RoomId,
    private readonly logger: Logger,
    private readonly options: RelayEngineOptions,
  ) {}

  get isRunning(): boolean {
    return this.status === "running";
  }

  get peerCount(): number {
    return this.peers.size;
  }

  events(): AsyncIterable<EngineEvent> {
    if (this.eventsTaken) {
      throw new Error(`Event stream of room ${this.roomId} already taken`);
    }
    this.eventsTaken = true;
    return this.queue;
  }

  command(command: EngineCommand): void {
    if (this.status !== "running") {
      throw new EngineCommandError(
        command.kind,
        `Engine for room ${this.roomId} is ${this.status}`,
      );
    }

    try {
      this.dispatch(command);
    } catch (err) {
      if (err instanceof EngineCommandError) throw err;
      this.crash(command.kind, err);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Command Handling
  // ─────────────────────────────────────────────────────────────────

  private dispatch(command: EngineCommand): void {
    switch (command.kind) {
      case "add-peer":
        this.addPeer(command.peerId);
        break;
      case "remove-peer":
        this.removePeer(command.peerId);
        break;
      case "media-event":
        this.handleMediaEvent(command.peerId, command.data);
        break;
      case "shutdown":
        this.shutdown();
        break;
    }
  }

  private addPeer(peerId: PeerId): void {
    if (this.peers.has(peerId)) {
      throw new EngineCommandError("add-peer", Errors.PEER_EXISTS);
    }
    if (this.peers.size >= this.options.maxPeers) {
      throw new EngineCommandError("add-peer", Errors.ROOM_FULL);
    }

    this.peers.set(peerId, {
      id: peerId,
      joined: false,
      metadata: null,
      tracks: new Map(),
    });
    this.logger.debug({ roomId: this.roomId, peerId }, "Relay engine: peer added");
  }

  private removePeer(peerId: PeerId): void {
    const peer = this.peers.get(peerId);
    if (!peer) return;

    this.peers.delete(peerId);
    if (peer.joined) {
      this.notifyOthers(peerId, { type: "peerLeft", data: { peerId } });
      this.queue.push({ kind: "peer-left", target: peerTarget(peerId), payload: null });
    }
    this.logger.debug({ roomId: this.roomId, peerId }, "Relay engine: peer removed");
  }

  private handleMediaEvent(peerId: PeerId, data: unknown): void {
    const peer = this.peers.get(peerId);
    if (!peer) {
      this.logger.debug(
        { roomId: this.roomId, peerId },
        "Relay engine: media event from unknown peer dropped",
      );
      return;
    }

    const parsed = parseClientMediaEvent(data);
    if (!parsed.success) {
      this.sendError(peerId, parsed.error);
      return;
    }

    const event = parsed.event;
    if (event.type !== "join" && !peer.joined) {
      this.sendError(peerId, "Peer has not joined");
      return;
    }

    switch (event.type) {
      case "join": {
        if (peer.joined) {
          this.sendError(peerId, "Peer already joined");
          return;
        }
        peer.joined = true;
        peer.metadata = event.data.metadata ?? null;

        const peersInRoom = [...this.peers.values()]
          .filter((p) => p.joined && p.id !== peerId)
          .map(describePeer);

        this.sendTo(peerId, {
          type: "peerAccepted",
          data: { id: peerId, peersInRoom },
        });
        this.notifyOthers(peerId, {
          type: "peerJoined",
          data: { peer: describePeer(peer) },
        });
        this.queue.push({
          kind: "peer-joined",
          target: peerTarget(peerId),
          payload: { metadata: peer.metadata },
        });
        return;
      }

      case "updatePeerMetadata":
        peer.metadata = event.data.metadata ?? null;
        this.notifyOthers(peerId, {
          type: "peerUpdated",
          data: { peerId, metadata: peer.metadata },
        });
        return;

      case "addTracks":
        for (const [trackId, metadata] of Object.entries(event.data.tracks)) {
          peer.tracks.set(trackId, metadata ?? null);
        }
        this.notifyOthers(peerId, {
          type: "tracksAdded",
          data: { peerId, trackIdToMetadata: event.data.tracks },
        });
        return;

      case "removeTracks":
        for (const trackId of event.data.trackIds) {
          peer.tracks.delete(trackId);
        }
        this.notifyOthers(peerId, {
          type: "tracksRemoved",
          data: { peerId, trackIds: event.data.trackIds },
        });
        return;

      case "signal": {
        const target = this.peers.get(event.data.to);
        if (!target?.joined || target.id === peerId) {
          this.logger.debug(
            { roomId: this.roomId, from: peerId, to: event.data.to },
            "Relay engine: signal to unknown peer dropped",
          );
          return;
        }
        this.sendTo(target.id, {
          type: "signal",
          data: { from: peerId, signal: event.data.signal },
        });
        return;
      }
    }
  }

  private shutdown(): void {
    this.status = "closed";
    this.peers.clear();
    this.queue.push({ kind: "shutdown-complete", target: engineTarget, payload: null });
    this.queue.end();
    this.logger.debug({ roomId: this.roomId }, "Relay engine: shut down");
    this.options.onClosed?.();
  }

  private crash(command: EngineCommandKind, err: unknown): void {
    const reason = err instanceof Error ? err.message : String(err);
    this.logger.error(
      { err, roomId: this.roomId, command },
      "Relay engine: crashed while handling command",
    );

    this.status = "crashed";
    this.peers.clear();
    this.queue.push({ kind: "crashed", target: engineTarget, payload: { reason } });
    this.queue.fail(err);
    this.options.onClosed?.();
  }

  // ─────────────────────────────────────────────────────────────────
  // Event Emission
  // ─────────────────────────────────────────────────────────────────

  private sendTo(peerId: PeerId, payload: unknown): void {
    this.queue.push({ kind: "media-event", target: peerTarget(peerId), payload });
  }

  private sendError(peerId: PeerId, message: string): void {
    this.sendTo(peerId, { type: "error", data: { message } });
  }

  /** Send to every joined peer except the originator, one targeted event each */
  private notifyOthers(originId: PeerId, payload: unknown): void {
    for (const peer of this.peers.values()) {
      if (peer.joined && peer.id !== originId) {
        this.sendTo(peer.id, payload);
      }
    }
  }
}

function describePeer(peer: RelayPeer): PeerDescription {
  return {
    id: peer.id,
    metadata: peer.metadata,
    trackIdToMetadata: Object.fromEntries(peer.tracks),
  };
}
