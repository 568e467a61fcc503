import { Liveness, type DownListener, type MonitorToken } from "@src/shared/liveness.js";
import type { RoomCoordinator } from "@src/domains/room/roomCoordinator.js";
import type { PeerId, PeerLink, RoomId } from "@src/domains/room/room.types.js";

export interface PeerSessionHooks {
  /** Push a room event to the transport */
  deliver(payload: unknown): void;
  /** The room removed this session */
  evicted(session: PeerSession, reason: string): void;
}

/**
 * One membership of an endpoint in a room.
 *
 * The session is the unit the coordinator monitors: ending it (leave,
 * transport close) is observed by the coordinator through its monitor,
 * never by an explicit unregister call.
 */
export class PeerSession implements PeerLink {
  private readonly liveness = new Liveness();

  constructor(
    readonly roomId: RoomId,
    readonly peerId: PeerId,
    readonly coordinator: RoomCoordinator,
    private readonly hooks: PeerSessionHooks,
  ) {}

  get isOpen(): boolean {
    return this.liveness.isAlive;
  }

  get endReason(): string | null {
    return this.liveness.reason;
  }

  deliver(payload: unknown): void {
    if (!this.liveness.isAlive) return;
    this.hooks.deliver(payload);
  }

  evict(reason: string): void {
    if (this.liveness.terminate(reason)) {
      this.hooks.evicted(this, reason);
    }
  }

  monitor(listener: DownListener): MonitorToken {
    return this.liveness.monitor(listener);
  }

  /** End the session from the peer side. Returns false if already ended. */
  end(reason: string): boolean {
    return this.liveness.terminate(reason);
  }
}
