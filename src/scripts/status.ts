/**
 * Print table sizes, jobs by status, the last run of each trigger and the
 * current top-scored jobs.
 */

import "dotenv/config";
import { logger } from "../logger";
import { checkDatabaseIntegrity, getDatabaseStats } from "../db";
import { getConfig } from "../config";
import { createServices } from "../runtime";
import { cutoff } from "../lifecycle";
import type { RunType } from "../types";

const config = getConfig();
const { db, store } = createServices(config);

logger.info("═══════════════════════════════════════════════════");
logger.info("  System Status");
logger.info("═══════════════════════════════════════════════════");

const integrity = checkDatabaseIntegrity(db);
logger.info(`Database integrity: ${integrity.ok ? "✅ OK" : "❌ FAILED"} (${integrity.result})`);

const stats = getDatabaseStats(db);
logger.info("📊 Table sizes:");
for (const [table, count] of Object.entries(stats)) {
  logger.info(`   ${table}: ${count} rows`);
}

logger.info("\n📋 Jobs by status:");
for (const [status, count] of Object.entries(store.countByStatus())) {
  logger.info(`   ${status}: ${count}`);
}
logger.info(`   (active: ${store.count({ isActive: true })})`);

const runTypes: RunType[] = ["ingest", "format", "score", "manage", "customize", "parse-resume"];
logger.info("\n🕐 Last runs:");
for (const runType of runTypes) {
  const run = store.getLastRun(runType);
  if (!run) {
    logger.info(`   ${runType}: never`);
    continue;
  }
  logger.info(
    `   ${runType}: ${run.status} at ${run.finished_at ?? run.started_at} ` +
      `(${run.succeeded} ok, ${run.failed} failed, ${run.skipped} skipped)${run.dry_run ? " [dry run]" : ""}`,
  );
}

const failures = store.countCheckFailuresSince(cutoff(new Date(), 7));
if (failures > 0) {
  logger.warn(`\n⚠️  ${failures} activity check(s) exhausted retries in the last 7 days`);
}

const top = store.query({ isActive: true, scored: true, status: ["new", "scored"] }, "score_desc", {
  limit: 10,
});
if (top.length > 0) {
  logger.info("\n🏆 Top open jobs:");
  for (const job of top) {
    logger.info(
      `   [${job.resumeScore}] ${job.title} @ ${job.company} (${job.jobId}, ${job.resumeScoreStage})`,
    );
  }
}

db.close();
