import type { FastifyPluginAsync } from "fastify";
import type { RoomRegistry } from "@src/domains/room/roomRegistry.js";
import type { EngineHost } from "./engine.host.js";

export const createHealthRoutes = (
  roomRegistry: RoomRegistry,
  engineHost: EngineHost,
): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get("/health", async (_request, reply) => {
      const engineCount = engineHost.getEngineCount();
      const capacity = engineHost.getCapacity();

      // Degraded once no new room can be started
      const status = engineCount < capacity ? "ok" : "degraded";

      if (status !== "ok") {
        reply.code(503);
      }

      return {
        status,
        rooms: roomRegistry.getRoomCount(),
        engines: {
          active: engineCount,
          capacity,
        },
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
      };
    });
  };
};
