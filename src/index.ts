import { getEnv } from "./config/env";
import { logger } from "./config/logger";
import { getConfigStore } from "./config/engine-config";
import { getQueueConfig } from "./queue/queue-config";
import { screeningProcessor } from "./workers/screening-worker";
import { createApp } from "./app";

// Load configuration and start server
async function startServer() {
    try {
        const env = getEnv();

        // Invalid engine tables are fatal at startup
        const config = getConfigStore().get();
        logger.info({ version: config.version, preset: config.preset }, "Engine configuration ready");

        // Initialize queue system
        const queueConfig = getQueueConfig();
        queueConfig.startWorker(screeningProcessor);
        logger.info({ concurrency: env.SCREENING_CONCURRENCY }, "Queue system initialized and worker started");

        const app = createApp();
        const server = app.listen(env.PORT, () => {
            logger.info({ port: env.PORT }, `Server running at http://localhost:${env.PORT}`);
        });

        const shutdown = async () => {
            logger.info({}, "Shutting down");
            server.close();
            try {
                await queueConfig.close();
                process.exit(0);
            } catch (error) {
                logger.error("Failed to close queue connections:", error);
                process.exit(1);
            }
        };

        process.on("SIGTERM", () => void shutdown());
        process.on("SIGINT", () => void shutdown());
    } catch (error) {
        logger.error("Failed to start server:", error);
        process.exit(1);
    }
}

void startServer();
