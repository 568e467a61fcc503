import type { Logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { config } from "@src/config/index.js";
import { StartError } from "@src/shared/errors.js";
import type { EngineFactory } from "@src/domains/engine/engine.types.js";
import { RoomCoordinator } from "./roomCoordinator.js";
import type { RoomId, RoomStats } from "./room.types.js";

export type FindOrStartResult =
  | { success: true; coordinator: RoomCoordinator }
  | { success: false; error: StartError };

export interface RoomRegistryOptions {
  startTimeoutMs: number;
  shutdownTimeoutMs: number;
  emptyRoomTimeoutMs: number;
}

const defaultOptions = (): RoomRegistryOptions => ({
  startTimeoutMs: config.ENGINE_START_TIMEOUT_MS,
  shutdownTimeoutMs: config.ENGINE_SHUTDOWN_TIMEOUT_MS,
  emptyRoomTimeoutMs: config.EMPTY_ROOM_TIMEOUT_MS,
});

/**
 * Process-wide directory of room coordinators.
 *
 * The only mutations are findOrStart() and onCoordinatorTerminated().
 * The absence check and the insertion of the in-flight start happen in the
 * same synchronous turn, so concurrent joins for one room coalesce on a
 * single coordinator.
 */
export class RoomRegistry {
  private readonly rooms = new Map<RoomId, RoomCoordinator>();

  // Track rooms being started so concurrent calls for the same roomId coalesce
  private readonly startingRooms = new Map<RoomId, Promise<FindOrStartResult>>();

  constructor(
    private readonly engineFactory: EngineFactory,
    private readonly logger: Logger,
    private readonly options: RoomRegistryOptions = defaultOptions(),
  ) {}

  getRoomCount(): number {
    return this.rooms.size;
  }

  /** Look up a room without starting it */
  get(roomId: RoomId): RoomCoordinator | undefined {
    return this.rooms.get(roomId);
  }

  getStats(): RoomStats[] {
    return [...this.rooms.values()].map((coordinator) => coordinator.getStats());
  }

  /**
   * Return the live coordinator of a room, starting one if there is none.
   * A coordinator that is already shutting down is waited for and replaced.
   */
  async findOrStart(roomId: RoomId): Promise<FindOrStartResult> {
    const existing = this.rooms.get(roomId);
    if (existing) {
      if (existing.isActive) return { success: true, coordinator: existing };

      if (existing.state === "terminated") {
        this.onCoordinatorTerminated(roomId, existing);
      } else {
        this.logger.debug({ roomId }, "Room is terminating, waiting to restart it");
        await existing.whenTerminated();
        return this.findOrStart(roomId);
      }
    }

    const pending = this.startingRooms.get(roomId);
    if (pending) return pending;

    const starting = this.startCoordinator(roomId);
    this.startingRooms.set(roomId, starting);
    return starting;
  }

  /**
   * Remove the entry of a terminated coordinator. Idempotent; a notification
   * about a coordinator that was already replaced is ignored.
   */
  onCoordinatorTerminated(roomId: RoomId, coordinator?: RoomCoordinator): void {
    const current = this.rooms.get(roomId);
    if (!current) return;
    if (coordinator && current !== coordinator) return;

    this.rooms.delete(roomId);
    this.logger.info({ roomId, rooms: this.rooms.size }, "Room unregistered");
  }

  /** Terminate every room (graceful shutdown) */
  async shutdown(reason = "server_shutdown"): Promise<void> {
    await Promise.allSettled([...this.startingRooms.values()]);

    const coordinators = [...this.rooms.values()];
    if (coordinators.length === 0) return;

    this.logger.info({ rooms: coordinators.length, reason }, "Closing all rooms");
    await Promise.all(coordinators.map((coordinator) => coordinator.terminate(reason)));
  }

  /**
   * Internal start logic (called only once per roomId at a time)
   */
  private async startCoordinator(roomId: RoomId): Promise<FindOrStartResult> {
    this.logger.info({ roomId }, "Starting room");

    const coordinator = new RoomCoordinator(roomId, {
      engineFactory: this.engineFactory,
      logger: this.logger,
      startTimeoutMs: this.options.startTimeoutMs,
      shutdownTimeoutMs: this.options.shutdownTimeoutMs,
      emptyRoomTimeoutMs: this.options.emptyRoomTimeoutMs,
      onTerminated: (terminated) => this.onCoordinatorTerminated(roomId, terminated),
    });

    try {
      await coordinator.start();
      // The engine may already have failed between activation and here
      if (coordinator.state === "terminated") {
        throw new Error(`Room ${roomId} terminated while starting`);
      }
      this.rooms.set(roomId, coordinator);
      return { success: true, coordinator };
    } catch (cause) {
      this.logger.error({ err: cause, roomId }, "Failed to start room");
      metrics.roomStartFailures.inc();
      return { success: false, error: new StartError(roomId, cause) };
    } finally {
      this.startingRooms.delete(roomId);
    }
  }
}
