import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import { Server } from "socket.io";
import { config } from "@src/config/index.js";
import { initializeSocket } from "@src/socket/index.js";
import type { AppContext } from "@src/context.js";
import { createHealthRoutes } from "./health.js";
import { createMetricsRoutes } from "./metrics.js";
import { logger } from "./logger.js";

export interface BootstrapResult {
  server: FastifyInstance;
  io: Server;
  context: AppContext;
}

export async function bootstrapServer(): Promise<BootstrapResult> {
  const httpLogger: FastifyBaseLogger = logger;
  const fastify = Fastify({ loggerInstance: httpLogger });

  const io = new Server(fastify.server, {
    cors: {
      origin: [...config.CORS_ORIGINS],
      methods: ["GET", "POST"],
      credentials: true,
    },
  });

  const context = initializeSocket(io);

  // Register health check
  await fastify.register(createHealthRoutes(context.roomRegistry, context.engineHost));

  // Register metrics
  await fastify.register(createMetricsRoutes(context.roomRegistry, context.engineHost));

  return { server: fastify, io, context };
}
