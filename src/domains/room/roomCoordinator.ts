/**
 * RoomCoordinator — one per active room
 *
 * Owns the room's peer set and its engine binding, and relays events in
 * both directions. Every input (registrations, client events, engine
 * events, liveness notifications, timers) goes through one mailbox and is
 * handled one message at a time, so peer membership is only ever touched
 * by this coordinator.
 *
 * Lifecycle:
 *   starting → active → terminating → terminated
 * A start failure goes straight to terminated. Losing the last peer,
 * an explicit terminate() or an engine failure leave the active state.
 */
import type { Logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { Mailbox } from "@src/shared/mailbox.js";
import { EngineCommandError, Errors } from "@src/shared/errors.js";
import type {
  EngineBinding,
  EngineCommand,
  EngineEvent,
  EngineFactory,
} from "@src/domains/engine/engine.types.js";
import type {
  CoordinatorState,
  PeerHandle,
  PeerId,
  PeerLink,
  Registration,
  RoomId,
  RoomStats,
} from "./room.types.js";

type CoordinatorMessage =
  | { type: "register"; peerId: PeerId; link: PeerLink; done: (result: Registration) => void }
  | { type: "client-event"; peerId: PeerId; payload: unknown }
  | { type: "engine-event"; event: EngineEvent }
  | { type: "engine-stream-ended" }
  | { type: "engine-stream-failed"; error: unknown }
  | { type: "liveness-lost"; peerId: PeerId; reason: string }
  | { type: "empty-room-timeout" }
  | { type: "shutdown-timeout" }
  | { type: "terminate"; reason: string };

const roomUnavailable: Registration = {
  success: false,
  error: Errors.ROOM_UNAVAILABLE,
  retryable: true,
};

export interface RoomCoordinatorOptions {
  engineFactory: EngineFactory;
  logger: Logger;
  startTimeoutMs: number;
  shutdownTimeoutMs: number;
  /** Terminate a room that stays empty this long; 0 disables */
  emptyRoomTimeoutMs: number;
  onTerminated: (coordinator: RoomCoordinator) => void;
}

export class RoomCoordinator {
  private readonly peers = new Map<PeerId, PeerHandle>();
  private readonly mailbox: Mailbox<CoordinatorMessage>;
  private readonly logger: Logger;
  private readonly terminated: Promise<void>;
  private resolveTerminated: () => void = () => {};

  private currentState: CoordinatorState = "starting";
  private engine: EngineBinding | null = null;
  private emptyRoomTimer: NodeJS.Timeout | null = null;
  private shutdownTimer: NodeJS.Timeout | null = null;
  private terminationReason: string | null = null;
  /** terminate() received while still starting */
  private deferredTermination: string | null = null;
  readonly createdAt = Date.now();

  constructor(
    readonly roomId: RoomId,
    private readonly options: RoomCoordinatorOptions,
  ) {
    this.logger = options.logger.child({ roomId });
    this.mailbox = new Mailbox<CoordinatorMessage>(
      (message) => this.handle(message),
      (err, message) =>
        this.logger.error({ err, message: message?.type }, "Coordinator message handler failed"),
    );
    this.terminated = new Promise((resolve) => {
      this.resolveTerminated = resolve;
    });
  }

  // ─────────────────────────────────────────────────────────────────
  // Public Accessors
  // ─────────────────────────────────────────────────────────────────

  get state(): CoordinatorState {
    return this.currentState;
  }

  /** True while the coordinator accepts new peers */
  get isActive(): boolean {
    return this.currentState === "active";
  }

  get peerCount(): number {
    return this.peers.size;
  }

  getPeerIds(): PeerId[] {
    return [...this.peers.keys()];
  }

  getStats(): RoomStats {
    return {
      roomId: this.roomId,
      state: this.currentState,
      peerCount: this.peers.size,
      createdAt: this.createdAt,
    };
  }

  /** Resolves once the coordinator reached the terminated state */
  whenTerminated(): Promise<void> {
    return this.terminated;
  }

  // ─────────────────────────────────────────────────────────────────
  // Starting
  // ─────────────────────────────────────────────────────────────────

  /**
   * Bring up the engine. Rejects on failure or timeout, leaving the
   * coordinator terminated; an engine that arrives after the timeout is
   * shut down right away.
   */
  async start(): Promise<void> {
    if (this.currentState !== "starting") {
      throw new Error(`Room ${this.roomId} cannot start from state ${this.currentState}`);
    }

    let timedOut = false;
    let rejectTimeout: (err: Error) => void = () => {};
    const timeout = new Promise<never>((_, reject) => {
      rejectTimeout = reject;
    });
    const timer = setTimeout(() => {
      timedOut = true;
      rejectTimeout(new Error(`Engine start timed out after ${this.options.startTimeoutMs}ms`));
    }, this.options.startTimeoutMs);

    const creating = new Promise<EngineBinding>((resolve) => {
      resolve(this.options.engineFactory(this.roomId));
    });
    creating
      .then((lateEngine) => {
        if (timedOut) {
          this.discardEngine(lateEngine, "Engine arrived after start timeout, shutting it down");
        }
      })
      .catch(() => {
        // Reported through Promise.race below
      });

    let engine: EngineBinding;
    try {
      engine = await Promise.race([creating, timeout]);
    } catch (err) {
      this.abortStart();
      throw err;
    } finally {
      clearTimeout(timer);
    }

    let events: AsyncIterable<EngineEvent>;
    try {
      events = engine.events();
    } catch (err) {
      this.discardEngine(engine, "Engine event stream unavailable, shutting the engine down");
      this.abortStart();
      throw err;
    }

    this.engine = engine;
    this.currentState = "active";
    metrics.roomsActive.inc();
    this.pumpEngineEvents(events).catch((err: unknown) =>
      this.logger.error({ err }, "Engine event pump failed"),
    );
    this.armEmptyRoomTimer();
    this.logger.info("Room coordinator active");

    if (this.deferredTermination !== null) {
      this.mailbox.post({ type: "terminate", reason: this.deferredTermination });
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Public Operations (all asynchronous, via the mailbox)
  // ─────────────────────────────────────────────────────────────────

  /**
   * Register a peer and add it to the engine. A refusal is retryable when
   * the room no longer takes peers, final when the engine turned the peer
   * down.
   */
  registerPeer(peerId: PeerId, link: PeerLink): Promise<Registration> {
    return new Promise((resolve) => {
      if (!this.mailbox.post({ type: "register", peerId, link, done: resolve })) {
        resolve(roomUnavailable);
      }
    });
  }

  /** Forward a client event to the engine, tagged with its peer id */
  relayClientEvent(peerId: PeerId, payload: unknown): void {
    this.mailbox.post({ type: "client-event", peerId, payload });
  }

  /**
   * Evict every peer and shut the room down. While starting, the request
   * is held and applied as soon as the room is active.
   */
  terminate(reason: string): Promise<void> {
    this.mailbox.post({ type: "terminate", reason });
    return this.terminated;
  }

  // ─────────────────────────────────────────────────────────────────
  // Message Handling
  // ─────────────────────────────────────────────────────────────────

  private handle(message: CoordinatorMessage): void {
    switch (message.type) {
      case "register":
        message.done(this.registerPeerNow(message.peerId, message.link));
        return;
      case "client-event":
        this.relayClientEventNow(message.peerId, message.payload);
        return;
      case "engine-event":
        this.onEngineEvent(message.event);
        return;
      case "engine-stream-ended":
        if (this.currentState === "terminating") {
          this.finalize();
        } else if (this.currentState === "active") {
          this.onEngineFailure("engine event stream ended");
        }
        return;
      case "engine-stream-failed":
        if (this.currentState === "terminating") {
          this.finalize();
        } else if (this.currentState === "active") {
          this.logger.error({ err: message.error }, "Engine event stream failed");
          this.onEngineFailure("engine event stream failed");
        }
        return;
      case "liveness-lost":
        this.onPeerLivenessLost(message.peerId, message.reason);
        return;
      case "empty-room-timeout":
        this.emptyRoomTimer = null;
        if (this.currentState === "active" && this.peers.size === 0) {
          this.beginTermination("empty_timeout");
        }
        return;
      case "shutdown-timeout":
        this.shutdownTimer = null;
        if (this.currentState === "terminating") {
          this.logger.warn(
            { timeoutMs: this.options.shutdownTimeoutMs },
            "Engine shutdown not acknowledged in time",
          );
          this.finalize();
        }
        return;
      case "terminate":
        if (this.currentState === "starting") {
          this.deferredTermination ??= message.reason;
          return;
        }
        if (this.currentState !== "active") return;
        this.evictAll(message.reason);
        this.beginTermination(message.reason);
        return;
    }
  }

  private registerPeerNow(peerId: PeerId, link: PeerLink): Registration {
    if (this.currentState !== "active" || !this.engine) {
      this.logger.debug({ peerId, state: this.currentState }, "Registration refused");
      return roomUnavailable;
    }
    if (this.peers.has(peerId)) {
      this.logger.warn({ peerId }, "Duplicate peer registration refused");
      return { success: false, error: Errors.PEER_EXISTS, retryable: true };
    }

    const monitor = link.monitor((reason) => {
      this.mailbox.post({ type: "liveness-lost", peerId, reason });
    });
    this.peers.set(peerId, { peerId, link, monitor, joinedAt: Date.now() });
    metrics.peersConnected.inc();
    this.clearEmptyRoomTimer();

    try {
      this.engine.command({ kind: "add-peer", peerId });
    } catch (err) {
      this.logger.warn({ err, peerId }, "Engine refused peer");
      this.dropPeer(peerId);
      this.afterPeerRemoved();
      if (this.currentState !== "active") return roomUnavailable;
      return {
        success: false,
        error: err instanceof EngineCommandError ? err.message : Errors.INTERNAL_ERROR,
        retryable: false,
      };
    }

    this.logger.info({ peerId, peerCount: this.peers.size }, "Peer registered");
    return { success: true };
  }

  private relayClientEventNow(peerId: PeerId, payload: unknown): void {
    if (this.currentState !== "active" || !this.peers.has(peerId)) {
      this.logger.debug({ peerId }, "Client event from unknown peer dropped");
      metrics.eventsDropped.inc({ reason: "stale_peer" });
      return;
    }

    if (this.sendToEngine({ kind: "media-event", peerId, data: payload })) {
      metrics.eventsRelayed.inc({ direction: "inbound" });
    }
  }

  private onEngineEvent(event: EngineEvent): void {
    switch (event.kind) {
      case "media-event":
        if (this.currentState !== "active") return;
        if (event.target.type === "peer") {
          this.deliverTo(event.target.peerId, event.payload);
        } else {
          for (const handle of this.peers.values()) {
            if (handle.peerId !== event.target.except) {
              this.deliverTo(handle.peerId, event.payload);
            }
          }
        }
        return;

      case "peer-joined":
        this.logger.debug({ peerId: event.target.peerId }, "Engine: peer joined");
        return;

      case "peer-left":
        this.logger.debug({ peerId: event.target.peerId }, "Engine: peer left");
        return;

      case "command-failed":
        this.logger.warn(
          { command: event.payload.command, reason: event.payload.reason, target: event.target },
          "Engine rejected command",
        );
        if (event.payload.command === "add-peer" && event.target.type === "peer") {
          this.rollbackRegistration(event.target.peerId, event.payload.reason);
        }
        return;

      case "shutdown-complete":
        if (this.currentState === "terminating") this.finalize();
        return;

      case "crashed":
        if (this.currentState === "active") {
          this.onEngineFailure(event.payload.reason);
        } else if (this.currentState === "terminating") {
          this.finalize();
        }
        return;
    }
  }

  private onPeerLivenessLost(peerId: PeerId, reason: string): void {
    if (!this.dropPeer(peerId)) return;

    this.logger.info({ peerId, reason, peerCount: this.peers.size }, "Peer liveness lost");
    if (this.currentState === "active") {
      this.sendToEngine({ kind: "remove-peer", peerId });
    }
    this.afterPeerRemoved();
  }

  /** add-peer was refused by the engine: undo the registration and tell the peer */
  private rollbackRegistration(peerId: PeerId, reason: string): void {
    const handle = this.peers.get(peerId);
    if (!handle) return;

    this.dropPeer(peerId);
    handle.link.evict(reason);
    this.afterPeerRemoved();
  }

  /**
   * Engine failure policy: the room cannot work without its engine, so
   * every peer is evicted and the coordinator terminates.
   */
  private onEngineFailure(reason: string): void {
    this.logger.error({ reason, peerCount: this.peers.size }, "Engine failed, closing room");
    this.terminationReason = "engine_failed";
    this.evictAll("engine_failed");
    this.finalize();
  }

  // ─────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────

  private sendToEngine(command: EngineCommand): boolean {
    if (!this.engine) return false;
    try {
      this.engine.command(command);
      return true;
    } catch (err) {
      this.logger.error({ err, command: command.kind }, "Engine command failed");
      return false;
    }
  }

  /** Fire-and-forget delivery; a failing peer never affects the others */
  private deliverTo(peerId: PeerId, payload: unknown): void {
    const handle = this.peers.get(peerId);
    if (!handle) {
      this.logger.debug({ peerId }, "Engine event for unknown peer dropped");
      metrics.eventsDropped.inc({ reason: "unknown_target" });
      return;
    }

    try {
      handle.link.deliver(payload);
      metrics.eventsRelayed.inc({ direction: "outbound" });
    } catch (err) {
      this.logger.warn({ err, peerId }, "Delivery to peer failed");
    }
  }

  /** Remove a peer handle and cancel its monitor. Returns false if absent. */
  private dropPeer(peerId: PeerId): boolean {
    const handle = this.peers.get(peerId);
    if (!handle) return false;

    handle.monitor.demonitor();
    this.peers.delete(peerId);
    metrics.peersConnected.dec();
    return true;
  }

  private evictAll(reason: string): void {
    for (const handle of [...this.peers.values()]) {
      this.dropPeer(handle.peerId);
      handle.link.evict(reason);
    }
  }

  private afterPeerRemoved(): void {
    if (this.currentState === "active" && this.peers.size === 0) {
      this.beginTermination("empty");
    }
  }

  private beginTermination(reason: string): void {
    this.currentState = "terminating";
    this.terminationReason ??= reason;
    this.clearEmptyRoomTimer();
    this.logger.info({ reason }, "Room terminating");

    if (!this.sendToEngine({ kind: "shutdown" })) {
      this.finalize();
      return;
    }

    this.shutdownTimer = setTimeout(() => {
      this.mailbox.post({ type: "shutdown-timeout" });
    }, this.options.shutdownTimeoutMs);
  }

  private finalize(): void {
    if (this.currentState === "terminated") return;

    const wasActive = this.engine !== null;
    this.currentState = "terminated";
    this.clearEmptyRoomTimer();
    if (this.shutdownTimer) {
      clearTimeout(this.shutdownTimer);
      this.shutdownTimer = null;
    }
    for (const peerId of [...this.peers.keys()]) {
      this.dropPeer(peerId);
    }
    for (const pending of this.mailbox.close()) {
      if (pending.type === "register") pending.done(roomUnavailable);
    }
    this.engine = null;
    if (wasActive) metrics.roomsActive.dec();

    this.logger.info({ reason: this.terminationReason }, "Room terminated");
    this.options.onTerminated(this);
    this.resolveTerminated();
  }

  private armEmptyRoomTimer(): void {
    if (this.options.emptyRoomTimeoutMs <= 0 || this.emptyRoomTimer) return;
    this.emptyRoomTimer = setTimeout(() => {
      this.mailbox.post({ type: "empty-room-timeout" });
    }, this.options.emptyRoomTimeoutMs);
  }

  private clearEmptyRoomTimer(): void {
    if (this.emptyRoomTimer) {
      clearTimeout(this.emptyRoomTimer);
      this.emptyRoomTimer = null;
    }
  }

  private abortStart(): void {
    this.currentState = "terminated";
    this.mailbox.close();
    this.resolveTerminated();
  }

  private discardEngine(engine: EngineBinding, message: string): void {
    this.logger.warn(message);
    try {
      engine.command({ kind: "shutdown" });
    } catch (err) {
      this.logger.error({ err }, "Failed to shut down late engine");
    }
  }

  /** Feed engine events into the mailbox until the stream ends or the room is gone */
  private async pumpEngineEvents(events: AsyncIterable<EngineEvent>): Promise<void> {
    try {
      for await (const event of events) {
        if (this.currentState === "terminated") break;
        this.mailbox.post({ type: "engine-event", event });
      }
      this.mailbox.post({ type: "engine-stream-ended" });
    } catch (error) {
      this.mailbox.post({ type: "engine-stream-failed", error });
    }
  }
}
