import { log } from "./config/logger.js";

interface CloseableServer {
    close(callback?: (err?: Error) => void): unknown;
}

const SHUTDOWN_TIMEOUT_MS = 10000;

export const execGracefulShutdown = (server: CloseableServer) => {
    log.info("Initiating graceful shutdown...");

    server.close((err) => {
        if (err) {
            log.error({ error: err.message }, "HTTP server closed with an error");
            process.exit(1);
        }

        log.info("HTTP server closed");
        log.info("Shutdown complete");
        process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
        log.error("Forced shutdown after timeout");
        process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
};
