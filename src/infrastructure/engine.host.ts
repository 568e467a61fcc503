/**
 * Engine Host
 * Creates and tracks the per-room relay engines of this process
 * Infrastructure-level: the room domain only sees it as an EngineFactory
 */
import type { Logger } from "./logger.js";
import { config } from "@src/config/index.js";
import type { EngineBinding } from "@src/domains/engine/engine.types.js";
import { SignalingRelayEngine } from "@src/domains/engine/relayEngine.js";
import type { RoomId } from "@src/domains/room/room.types.js";
import { Errors } from "@src/shared/errors.js";

export interface EngineHostOptions {
  maxRooms: number;
  maxPeersPerRoom: number;
}

export interface EngineStats {
  roomId: RoomId;
  peerCount: number;
}

export class EngineHost {
  private readonly engines = new Map<RoomId, SignalingRelayEngine>();

  constructor(
    private readonly logger: Logger,
    private readonly options: EngineHostOptions = {
      maxRooms: config.MAX_ROOMS,
      maxPeersPerRoom: config.MAX_PEERS_PER_ROOM,
    },
  ) {}

  getEngineCount(): number {
    return this.engines.size;
  }

  getCapacity(): number {
    return this.options.maxRooms;
  }

  /** Create the engine of a room, enforcing MAX_ROOMS */
  async createEngine(roomId: RoomId): Promise<EngineBinding> {
    if (this.engines.has(roomId)) {
      throw new Error(`Engine already running for room ${roomId}`);
    }
    if (this.engines.size >= this.options.maxRooms) {
      throw new Error(`${Errors.ENGINE_CAPACITY} (${this.options.maxRooms} rooms)`);
    }

    const engine: SignalingRelayEngine = new SignalingRelayEngine(roomId, this.logger, {
      maxPeers: this.options.maxPeersPerRoom,
      onClosed: () => {
        if (this.engines.get(roomId) === engine) {
          this.engines.delete(roomId);
        }
        this.logger.debug({ roomId, engines: this.engines.size }, "Engine released");
      },
    });
    this.engines.set(roomId, engine);

    this.logger.debug({ roomId, engines: this.engines.size }, "Engine created");
    return engine;
  }

  /** Get stats for all running engines */
  getEngineStats(): EngineStats[] {
    return [...this.engines.values()].map((engine) => ({
      roomId: engine.roomId,
      peerCount: engine.peerCount,
    }));
  }

  /** Stop every engine still running (rooms should be closed first) */
  shutdown(): void {
    if (this.engines.size > 0) {
      this.logger.warn({ engines: this.engines.size }, "Stopping engines left running");
    }
    for (const engine of [...this.engines.values()]) {
      if (engine.isRunning) {
        engine.command({ kind: "shutdown" });
      }
    }
    this.engines.clear();
  }
}
