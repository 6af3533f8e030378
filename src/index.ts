/** Boot file: creates HTTP server, starts listening, and handles graceful shutdown. */

import http from "http";

import { createApp } from "./app.js";
import { connectMongo, closeMongo } from "./config/db.js";
import { env } from "./config/env.js";
import { logger } from "./config/logger.js";
import { pingRedis, closeRedis } from "./config/redis.js";
import { createContext } from "./context.js";

const server = http.createServer(createApp(createContext()));

process.on("uncaughtException", (err) => {
  logger.error("Uncaught exception", { message: err.message, stack: err.stack });
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { reason });
});

const start = async () => {
  try {
    // data deps must be up before listening
    await connectMongo();
    const redis = await pingRedis();
    if (redis.status === "error") throw new Error(`Redis unavailable: ${redis.message}`);

    server.listen(env.PORT, () => {
      logger.info(`circle server listening on :${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (err) {
    logger.error("Startup failed", {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  }
};

const shutdown = (signal: NodeJS.Signals) => {
  logger.warn(`Received ${signal}, shutting down...`);
  void Promise.allSettled([closeMongo(), closeRedis()]).finally(() => {
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
    setTimeout(() => {
      logger.error("Forced shutdown");
      process.exit(1);
    }, 10_000).unref();
  });
};

const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
signals.forEach((sig) => process.on(sig, () => shutdown(sig)));

void start();
