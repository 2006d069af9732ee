import { createApp, setupGracefulShutdown } from "./app";
import { config } from "@/config/env";
import { logger } from "@/monitoring/logger";

const startServer = () => {
  try {
    const app = createApp();

    const server = app.listen(config.port, () => {
      logger.info(`Resilience admin API started on port ${config.port}`, {
        environment: process.env.NODE_ENV || "development",
        port: config.port,
      });
    });

    setupGracefulShutdown(server);

    return server;
  } catch (error) {
    logger.error("Failed to start server", { error });
    process.exit(1);
  }
};

if (require.main === module) {
  startServer();
}
