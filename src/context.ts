import type { RoomRegistry } from "./domains/room/roomRegistry.js";
import type { EngineHost } from "./infrastructure/engine.host.js";
import type { ClientManager } from "./client/clientManager.js";

export interface AppContext {
  roomRegistry: RoomRegistry;
  engineHost: EngineHost;
  clientManager: ClientManager;
}
