import "dotenv/config";
import { logger } from "../logger";
import { loadConfig } from "../config";
import { createServices, createTriggers } from "../runtime";
import type { RunType } from "../types";

/**
 * Runs one trigger from the command line and exits with its status:
 * 0 when the run completed (even with per-record failures), 1 when it aborted.
 */
export async function runTriggerScript(runType: RunType, title: string): Promise<never> {
  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Manual ${title}`);
  logger.info("═══════════════════════════════════════════════════");

  let exitCode = 1;
  try {
    const config = loadConfig();
    const services = createServices(config);
    const result = await createTriggers(services)[runType]();

    logger.info(`  Run ID:     ${result.runId}`);
    logger.info(`  Status:     ${result.status}`);
    logger.info(`  Processed:  ${result.processed}`);
    logger.info(`  Succeeded:  ${result.succeeded}`);
    logger.info(`  Failed:     ${result.failed}`);
    logger.info(`  Skipped:    ${result.skipped}`);
    logger.info(`  Duration:   ${(result.durationMs / 1000).toFixed(1)}s`);

    if (result.errors.length > 0) {
      logger.warn("Errors encountered:");
      result.errors.forEach((e) => logger.warn(`  • ${e}`));
    }

    services.db.close();
    exitCode = result.status === "completed" ? 0 : 1;
  } catch (error) {
    logger.error(`${title} aborted:`, error);
  }

  process.exit(exitCode);
}
