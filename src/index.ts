import "dotenv/config";
import { serve } from "@hono/node-server";
import { logger } from "./logger";
import { checkDatabaseIntegrity } from "./db";
import { loadConfig, type AppConfig } from "./config";
import { createServices, createTriggers, type Services } from "./runtime";
import { startScheduler, checkAndRunCatchUp } from "./scheduler";
import { createApp } from "./server";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Job Hunt Pipeline");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

let services: Services;
try {
  services = createServices(config);
} catch (error) {
  logger.error("Failed to initialize database:", error);
  process.exit(1);
}

const integrity = checkDatabaseIntegrity(services.db);
if (!integrity.ok) {
  logger.error(`Database integrity check failed: ${integrity.result}`);
  logger.error(`Please restore from backup or delete ${config.env.dbPath} to recreate.`);
  process.exit(1);
}

const triggers = createTriggers(services);
const app = createApp(services);
const port = config.env.port;

logger.info(`Starting server on port ${port}...`);

const tasks = startScheduler(triggers, config.lifecycle.schedules, config.env.timezone);

checkAndRunCatchUp(services.store, triggers).catch((error) => {
  logger.error("[SCHEDULER] Startup catch-up failed:", error);
});

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Job Hunt Pipeline started on http://localhost:${info.port}`);
  logger.info(`   Health: http://localhost:${info.port}/health`);
  logger.info(`   Status: http://localhost:${info.port}/status`);
  logger.info(`   API:    http://localhost:${info.port}/api/jobs`);
  logger.info("═══════════════════════════════════════════════════");
});

function shutdown(signal: string): void {
  logger.info(`${signal} received, shutting down...`);
  for (const task of tasks) task.stop();
  server.close(() => {
    services.db.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
