import cron, { type ScheduledTask } from "node-cron";
import { logger } from "../logger";
import type { StoreGateway } from "../db/operations";
import type { ScheduleSettings } from "../config";
import type { Triggers } from "../runtime";
import type { RunResult, RunType } from "../types";

const _running = new Set<RunType>();

/**
 * Runs a trigger unless the same trigger is still in flight in this
 * process. Returns null when skipped.
 */
export async function runGuarded(
  runType: RunType,
  trigger: () => Promise<RunResult>,
): Promise<RunResult | null> {
  if (_running.has(runType)) {
    logger.warn(`[LOCK] ${runType} already running — skipping this tick`);
    return null;
  }
  _running.add(runType);
  try {
    return await trigger();
  } finally {
    _running.delete(runType);
  }
}

const SCHEDULED: ReadonlyArray<keyof ScheduleSettings> = [
  "ingest",
  "format",
  "score",
  "manage",
  "customize",
];

export function startScheduler(
  triggers: Triggers,
  schedules: ScheduleSettings,
  timezone: string,
): ScheduledTask[] {
  logger.info("Starting scheduler...");
  const tasks: ScheduledTask[] = [];

  for (const runType of SCHEDULED) {
    const expression = schedules[runType];
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression for ${runType}: "${expression}"`);
    }

    const task = cron.schedule(
      expression,
      async () => {
        logger.info(`[CRON] Starting ${runType}...`);
        try {
          const result = await runGuarded(runType, triggers[runType]);
          if (!result) return;
          logger.info(
            `[CRON] ${runType} ${result.status}: ${result.succeeded} ok, ${result.failed} failed, ${result.skipped} skipped`,
          );
        } catch (error) {
          logger.error(`[CRON] ${runType} failed:`, error);
        }
      },
      { timezone },
    );
    tasks.push(task);
    logger.info(`  ✓ ${runType}: ${expression} (${timezone})`);
  }

  logger.info(`Scheduler started with ${tasks.length} jobs.`);
  return tasks;
}

const CATCH_UP_HOURS = 24;

/** Ingests at startup when the last successful ingest is too old. */
export async function checkAndRunCatchUp(
  store: StoreGateway,
  triggers: Triggers,
  now: Date = new Date(),
): Promise<RunResult | null> {
  const lastRun = store.getLastSuccessfulRunTime("ingest");
  if (lastRun) {
    const hoursSinceLastRun = (now.getTime() - new Date(lastRun).getTime()) / (1000 * 60 * 60);
    if (hoursSinceLastRun <= CATCH_UP_HOURS) {
      logger.info(
        `[CATCH-UP] Last ingest was ${hoursSinceLastRun.toFixed(1)}h ago — no catch-up needed`,
      );
      return null;
    }
    logger.info(
      `[CATCH-UP] Last ingest was ${hoursSinceLastRun.toFixed(1)}h ago — triggering catch-up ingest...`,
    );
  } else {
    logger.info("[CATCH-UP] No previous ingest found — triggering initial ingest...");
  }
  return runGuarded("ingest", triggers.ingest);
}
