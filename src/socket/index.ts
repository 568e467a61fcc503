import type { Server } from "socket.io";
import { logger } from "@src/infrastructure/logger.js";
import { metrics } from "@src/infrastructure/metrics.js";
import { EngineHost } from "@src/infrastructure/engine.host.js";
import { RoomRegistry } from "@src/domains/room/roomRegistry.js";
import { ClientManager } from "@src/client/clientManager.js";
import { registerAllDomains } from "@src/domains/index.js";
import type { AppContext } from "@src/context.js";

export function initializeSocket(io: Server): AppContext {
  // Initialize Managers
  const engineHost = new EngineHost(logger);
  const roomRegistry = new RoomRegistry((roomId) => engineHost.createEngine(roomId), logger);
  const clientManager = new ClientManager(roomRegistry, logger);

  const appContext: AppContext = {
    roomRegistry,
    engineHost,
    clientManager,
  };

  io.on("connection", (socket) => {
    logger.info({ socketId: socket.id }, "Socket connected");
    metrics.socketConnections.inc();

    // Register Client
    clientManager.addClient(socket);

    socket.on("disconnect", () => {
      metrics.socketConnections.dec();
    });

    // Register Handlers with Context
    registerAllDomains(socket, appContext);
  });

  return appContext;
}
