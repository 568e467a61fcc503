import { logger } from "./infrastructure/logger.js";
import { config } from "./config/index.js";
import { bootstrapServer } from "./infrastructure/server.js";

const start = async () => {
  try {
    const { server, io, context } = await bootstrapServer();

    const address = await server.listen({
      port: config.PORT,
      host: "0.0.0.0",
    });

    logger.info(`Server listening at ${address}`);
    logger.info(`Environment: ${config.NODE_ENV}`);

    // Graceful Shutdown Logic
    let isShuttingDown = false;

    const gracefulShutdown = async (signal: string) => {
      if (isShuttingDown) return;
      isShuttingDown = true;

      logger.info({ signal }, "Graceful shutdown initiated");

      const shutdownTimeout = setTimeout(() => {
        logger.error("Shutdown timeout exceeded, forcing exit");
        process.exit(1);
      }, config.SHUTDOWN_TIMEOUT_MS);

      try {
        // 1. Stop accepting connections and end every peer session
        io.close();
        context.clientManager.closeAll("server_shutdown");

        // 2. Close rooms (evicts remaining peers, shuts engines down)
        await context.roomRegistry.shutdown("server_shutdown");

        // 3. Stop engines that did not shut down with their room
        context.engineHost.shutdown();

        // 4. Close Fastify
        await server.close();

        clearTimeout(shutdownTimeout);
        logger.info("Graceful shutdown complete");
        process.exit(0);
      } catch (err) {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    process.exit(1);
  }
};

// Handle unhandled rejections
process.on("unhandledRejection", (err) => {
  logger.fatal({ err }, "Unhandled Rejection");
  process.exit(1);
});

void start();
