/**
 * PeerEndpoint — per-connection adapter between a transport and a room
 *
 * Translates join/leave/media events from the client into registry and
 * coordinator calls, and pushes room events back onto the transport.
 * At most one session (room membership) is open at a time.
 */
import { randomUUID } from "node:crypto";
import type { Logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { config } from "@src/config/index.js";
import { Errors } from "@src/shared/errors.js";
import { parseRoomTarget } from "@src/domains/room/roomTarget.js";
import type { RoomRegistry } from "@src/domains/room/roomRegistry.js";
import type { JoinResult, PeerId, RoomId } from "@src/domains/room/room.types.js";
import { PeerSession } from "./peerSession.js";
import type { PeerTransport } from "./socketTransport.js";

export const PeerEvents = {
  MEDIA_EVENT: "mediaEvent",
  ROOM_LEFT: "room:left",
} as const;

export type RoomDirectory = Pick<RoomRegistry, "findOrStart">;

export interface PeerEndpointOptions {
  roomTargetPrefix: string;
  joinMaxAttempts: number;
}

export class PeerEndpoint {
  private session: PeerSession | null = null;
  private joining = false;
  private closed = false;
  private readonly logger: Logger;

  constructor(
    private readonly transport: PeerTransport,
    private readonly rooms: RoomDirectory,
    logger: Logger,
    private readonly options: PeerEndpointOptions = {
      roomTargetPrefix: config.ROOM_TARGET_PREFIX,
      joinMaxAttempts: config.JOIN_MAX_ATTEMPTS,
    },
  ) {
    this.logger = logger.child({ socketId: transport.id });
  }

  get id(): string {
    return this.transport.id;
  }

  get roomId(): RoomId | null {
    return this.session?.roomId ?? null;
  }

  get peerId(): PeerId | null {
    return this.session?.peerId ?? null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Join the room named by `target` (`<prefix><roomId>`). Nothing stays
   * registered when the join fails.
   */
  async join(target: string): Promise<JoinResult> {
    if (this.closed) return { success: false, error: Errors.CONNECTION_CLOSED };
    if (this.session || this.joining) return { success: false, error: Errors.ALREADY_JOINED };

    const parsed = parseRoomTarget(target, this.options.roomTargetPrefix);
    if (!parsed.success) {
      this.logger.debug({ target, error: parsed.error }, "Join target rejected");
      return { success: false, error: parsed.error };
    }

    this.joining = true;
    try {
      return await this.joinRoom(parsed.roomId);
    } finally {
      this.joining = false;
    }
  }

  /** Forward a client media event to the room. Returns false when not in a room. */
  handleClientEvent(payload: unknown): boolean {
    const session = this.session;
    if (!session) {
      this.logger.debug("Media event without a room session dropped");
      metrics.eventsDropped.inc({ reason: "no_session" });
      return false;
    }

    session.coordinator.relayClientEvent(session.peerId, payload);
    return true;
  }

  /** Leave the current room; the transport stays usable for another join */
  leave(): boolean {
    const session = this.session;
    if (!session) return false;

    this.session = null;
    session.end("left");
    this.logger.info({ roomId: session.roomId, peerId: session.peerId }, "Peer left room");
    return true;
  }

  /** Transport closed: end the session for good */
  close(reason: string): void {
    if (this.closed) return;
    this.closed = true;

    const session = this.session;
    this.session = null;
    if (session?.end(reason)) {
      this.logger.info(
        { roomId: session.roomId, peerId: session.peerId, reason },
        "Peer session closed",
      );
    }
  }

  private async joinRoom(roomId: RoomId): Promise<JoinResult> {
    for (let attempt = 1; attempt <= this.options.joinMaxAttempts; attempt++) {
      const found = await this.rooms.findOrStart(roomId);
      if (!found.success) {
        return { success: false, error: Errors.ROOM_START_FAILED };
      }
      if (this.closed) return { success: false, error: Errors.CONNECTION_CLOSED };

      const peerId = randomUUID();
      const session = new PeerSession(roomId, peerId, found.coordinator, {
        deliver: (payload) => this.send(PeerEvents.MEDIA_EVENT, { data: payload }),
        evicted: (evicted, reason) => this.onEvicted(evicted, reason),
      });
      this.session = session;

      const registration = await found.coordinator.registerPeer(peerId, session);
      if (!registration.success) {
        session.end("not_registered");
        if (this.session === session) this.session = null;
        if (this.closed) return { success: false, error: Errors.CONNECTION_CLOSED };

        if (!registration.retryable) {
          this.logger.info({ roomId, reason: registration.error }, "Join refused by room");
          return { success: false, error: registration.error };
        }

        this.logger.debug({ roomId, attempt }, "Room stopped before registration, retrying");
        continue;
      }

      if (!session.isOpen) {
        return { success: false, error: session.endReason ?? Errors.ROOM_UNAVAILABLE };
      }

      this.logger.info({ roomId, peerId }, "Peer joined room");
      return { success: true, roomId, peerId };
    }

    this.logger.warn({ roomId, attempts: this.options.joinMaxAttempts }, "Join gave up");
    return { success: false, error: Errors.ROOM_UNAVAILABLE };
  }

  private onEvicted(session: PeerSession, reason: string): void {
    if (this.session === session) this.session = null;

    this.logger.info({ roomId: session.roomId, peerId: session.peerId, reason }, "Peer evicted");
    this.send(PeerEvents.ROOM_LEFT, { roomId: session.roomId, reason });
  }

  private send(event: string, data: unknown): void {
    if (this.closed) return;
    try {
      this.transport.send(event, data);
    } catch (err) {
      this.logger.warn({ err, event }, "Transport send failed");
    }
  }
}
