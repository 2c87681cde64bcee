import { logger } from "../logger";
import { runWithConcurrency, sleep as defaultSleep } from "../concurrency";
import { TransientCheckError, errorMessage } from "../errors";
import type { LifecycleEngine } from "./index";
import type { ActivitySettings } from "../config";
import type { Job } from "../types";

export type ActivityStatus = "active" | "gone";

/** Asks the posting's source whether it is still open. */
export interface ActivityChecker {
  check(job: Job): Promise<ActivityStatus>;
}

export type RecheckOptions = Pick<
  ActivitySettings,
  "stalenessDays" | "checkLimit" | "concurrency" | "maxRetries" | "retryDelayMs"
> & {
  now: Date;
  sleep?: (ms: number) => Promise<void>;
};

export interface RecheckSummary {
  checked: number;
  active: number;
  gone: number;
  failed: number;
  /** Jobs another run updated between selection and write */
  skipped: number;
}

type Outcome =
  | { kind: "result"; status: ActivityStatus }
  | { kind: "failed"; attempts: number; error: string };

async function checkWithRetry(
  checker: ActivityChecker,
  job: Job,
  maxRetries: number,
  retryDelayMs: number,
  sleep: (ms: number) => Promise<void>,
): Promise<Outcome> {
  let attempts = 0;
  let lastError = "";

  while (attempts <= maxRetries) {
    attempts++;
    try {
      const status = await checker.check(job);
      return { kind: "result", status };
    } catch (error) {
      lastError = errorMessage(error);
      if (!(error instanceof TransientCheckError)) {
        break;
      }
      if (attempts <= maxRetries) {
        logger.debug(
          `Recheck ${job.jobId} failed (${lastError}), retry ${attempts}/${maxRetries} in ${retryDelayMs}ms`,
        );
        await sleep(retryDelayMs);
      }
    }
  }

  return { kind: "failed", attempts, error: lastError };
}

/**
 * Re-verifies the oldest-checked active jobs with their source. A
 * confirmed "gone" deactivates the job; failures leave it untouched and
 * leave a check-failure record behind.
 */
export async function recheckActivity(
  engine: LifecycleEngine,
  checker: ActivityChecker,
  options: RecheckOptions,
): Promise<RecheckSummary> {
  const sleep = options.sleep ?? defaultSleep;
  const jobs = engine.selectForRecheck(
    options.now,
    options.stalenessDays,
    options.checkLimit,
  );

  const summary: RecheckSummary = {
    checked: jobs.length,
    active: 0,
    gone: 0,
    failed: 0,
    skipped: 0,
  };

  if (jobs.length === 0) {
    logger.info("Activity recheck: nothing stale");
    return summary;
  }

  logger.info(
    `Activity recheck: ${jobs.length} job(s) not checked in ${options.stalenessDays} days`,
  );

  await runWithConcurrency(jobs, options.concurrency, async (job) => {
    const outcome = await checkWithRetry(
      checker,
      job,
      options.maxRetries,
      options.retryDelayMs,
      sleep,
    );

    if (outcome.kind === "failed") {
      summary.failed++;
      logger.warn(
        `Activity check for ${job.jobId} gave up after ${outcome.attempts} attempt(s): ${outcome.error}`,
      );
      engine.recordCheckFailure(job.jobId, outcome.attempts, outcome.error, options.now);
      return;
    }

    const written =
      outcome.status === "gone"
        ? engine.markGone(job.jobId, options.now)
        : engine.markSeenActive(job.jobId, options.now);

    if (!written) {
      summary.skipped++;
      return;
    }

    if (outcome.status === "gone") {
      summary.gone++;
      logger.info(`Job ${job.jobId} (${job.title} @ ${job.company}) is no longer open`);
    } else {
      summary.active++;
    }
  });

  logger.info(
    `Activity recheck done: ${summary.active} active, ${summary.gone} gone, ${summary.failed} failed, ${summary.skipped} skipped`,
  );
  return summary;
}
