import { logger } from "./logger";
import { runWithConcurrency, sleep as defaultSleep } from "./concurrency";
import {
  CustomizationRejectedError,
  PermanentOracleError,
  ScoreRangeError,
  TransientOracleError,
  ValidationError,
  errorMessage,
} from "./errors";
import type { StoreGateway } from "./db/operations";
import type { LifecycleEngine } from "./lifecycle";
import { recheckActivity, type ActivityChecker } from "./lifecycle/recheck";
import type { CandidateSource } from "./connectors";
import type { ScoringOracle } from "./scoring";
import type { ResumeCustomizer } from "./customization";
import type { DescriptionFormatter } from "./formatting";
import type {
  ActivitySettings,
  CustomizationSettings,
  ExpirySettings,
  FormattingSettings,
  ScoringSettings,
  SearchConfig,
} from "./config";
import type {
  CustomizedResumeDraft,
  Job,
  ResumeProfile,
  RunResult,
  RunStats,
  RunType,
  ScoreStage,
} from "./types";

export interface RunContext {
  store: StoreGateway;
  dryRun: boolean;
  now?: () => Date;
}

function emptyStats(): RunStats {
  return { processed: 0, succeeded: 0, failed: 0, skipped: 0, errors: [] };
}

/**
 * Wraps one trigger in a run_log row. Per-record failures are counted by
 * the body; anything it throws aborts the run and marks it failed.
 */
async function withRunLog(
  ctx: RunContext,
  runType: RunType,
  body: (stats: RunStats) => Promise<void>,
): Promise<RunResult> {
  const startTime = Date.now();
  const stats = emptyStats();

  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Run: ${runType}${ctx.dryRun ? " (dry run)" : ""}`);
  logger.info("═══════════════════════════════════════════════════");

  const runId = ctx.store.createRun(runType, ctx.dryRun);
  logger.info(`Run ID: ${runId}`);

  let status: RunResult["status"] = "completed";
  try {
    await body(stats);
  } catch (error) {
    status = "failed";
    const errMsg = `${runType} run failed: ${errorMessage(error)}`;
    logger.error(errMsg, error);
    stats.errors.push(errMsg);
  }

  try {
    ctx.store.finishRun(runId, status, stats);
  } catch (error) {
    status = "failed";
    logger.error(`Could not finish run ${runId}:`, error);
  }

  const durationMs = Date.now() - startTime;
  logger.info(
    `  ${runType}: ${stats.succeeded} succeeded, ${stats.failed} failed, ${stats.skipped} skipped of ${stats.processed}`,
  );
  logger.info(`  Errors: ${stats.errors.length}`);
  logger.info(`  Duration: ${(durationMs / 1000).toFixed(1)}s`);
  logger.info("═══════════════════════════════════════════════════");

  return { ...stats, runId, runType, status, durationMs };
}

function clock(ctx: RunContext): () => Date {
  return ctx.now ?? (() => new Date());
}

function requireResume(store: StoreGateway, email: string): ResumeProfile {
  if (!email) {
    throw new ValidationError("CANDIDATE_EMAIL is not configured", "candidateEmail");
  }
  const resume = store.getResume(email);
  if (!resume) {
    throw new ValidationError(
      `No parsed resume stored for ${email}; run parse-resume first`,
      "resume",
    );
  }
  return resume;
}

// ─── Ingestion ──────────────────────────────────────────────────────────────

export interface IngestionDeps extends RunContext {
  engine: LifecycleEngine;
  source: CandidateSource;
  search: Pick<SearchConfig, "queries" | "location" | "geoId" | "jobType" | "postedWithin">;
}

export function runIngestion(deps: IngestionDeps): Promise<RunResult> {
  const now = clock(deps);

  return withRunLog(deps, "ingest", async (stats) => {
    let inserted = 0;

    for (const query of deps.search.queries) {
      const skipJobIds = deps.engine.knownJobIds(deps.source.provider);
      logger.info(
        `Searching "${query}" in ${deps.search.location} (${skipJobIds.size} known ids)`,
      );

      const postings = deps.source.fetchCandidates(query, deps.search.location, {
        geoId: deps.search.geoId,
        jobType: deps.search.jobType,
        postedWithin: deps.search.postedWithin,
        skipJobIds,
      });

      for await (const posting of postings) {
        stats.processed++;

        if (deps.dryRun) {
          logger.info(`[DRY RUN] Would ingest ${posting.jobId}: ${posting.title} @ ${posting.company}`);
          stats.skipped++;
          continue;
        }

        try {
          const outcome = deps.engine.ingest(posting, now());
          if (outcome === "inserted") inserted++;
          stats.succeeded++;
        } catch (error) {
          if (!(error instanceof ValidationError)) throw error;
          stats.failed++;
          stats.errors.push(`${posting.jobId}: ${error.message}`);
          logger.warn(`Rejected posting ${posting.jobId}: ${error.message}`);
        }
      }
    }

    logger.info(`Ingestion stored ${inserted} new job(s)`);
  });
}

// ─── Description formatting ─────────────────────────────────────────────────

export interface FormattingDeps extends RunContext {
  engine: LifecycleEngine;
  formatter: DescriptionFormatter;
  settings: Pick<FormattingSettings, "limit">;
  requestDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export function runDescriptionFormatting(deps: FormattingDeps): Promise<RunResult> {
  return withRunLog(deps, "format", async (stats) => {
    const jobs = deps.engine.selectForDescriptionFormatting(deps.settings.limit);
    logger.info(`Description formatting: ${jobs.length} job(s)`);
    stats.processed = jobs.length;

    for (const [index, job] of jobs.entries()) {
      const description = job.description;
      if (description === null) {
        stats.skipped++;
        continue;
      }

      if (deps.dryRun) {
        logger.info(`[DRY RUN] Would format the description of ${job.jobId}`);
        stats.skipped++;
        continue;
      }

      try {
        const markdown = await deps.formatter.format(description);
        if (deps.engine.recordFormattedDescription(job.jobId, description, markdown)) {
          stats.succeeded++;
        } else {
          logger.debug(`Description of ${job.jobId} changed or was formatted by another run`);
          stats.skipped++;
        }
      } catch (error) {
        if (error instanceof TransientOracleError) {
          logger.warn(`Formatting ${job.jobId} deferred: ${error.message}`);
          stats.skipped++;
        } else if (error instanceof PermanentOracleError) {
          logger.error(`Formatting ${job.jobId} failed: ${error.message}`);
          stats.failed++;
          stats.errors.push(`${job.jobId}: ${error.message}`);
        } else {
          throw error;
        }
      }

      if (deps.requestDelayMs > 0 && index < jobs.length - 1) {
        await (deps.sleep ?? defaultSleep)(deps.requestDelayMs);
      }
    }
  });
}

// ─── Scoring ────────────────────────────────────────────────────────────────

export interface ScoringDeps extends RunContext {
  engine: LifecycleEngine;
  oracle: ScoringOracle;
  candidateEmail: string;
  settings: Pick<ScoringSettings, "jobsToScorePerRun" | "rescoreLimit" | "concurrency">;
  requestDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

type ScoreOutcome = "applied" | "stale" | "transient" | "failed";

async function scoreOne(
  deps: ScoringDeps,
  stats: RunStats,
  job: Job,
  profile: ResumeProfile,
  stage: ScoreStage,
): Promise<ScoreOutcome> {
  try {
    const result = await deps.oracle.score(profile, job);
    const { applied } = deps.engine.applyScore(job.jobId, result.score, stage, clock(deps)());
    return applied ? "applied" : "stale";
  } catch (error) {
    if (error instanceof TransientOracleError) {
      logger.warn(`Scoring ${job.jobId} deferred: ${error.message}`);
      return "transient";
    }
    if (error instanceof PermanentOracleError || error instanceof ScoreRangeError) {
      stats.errors.push(`${job.jobId}: ${error.message}`);
      logger.error(`Scoring ${job.jobId} failed: ${error.message}`);
      return "failed";
    }
    throw error;
  } finally {
    if (deps.requestDelayMs > 0) {
      await (deps.sleep ?? defaultSleep)(deps.requestDelayMs);
    }
  }
}

function tally(stats: RunStats, outcomes: ScoreOutcome[]): void {
  for (const outcome of outcomes) {
    if (outcome === "applied") stats.succeeded++;
    else if (outcome === "failed") stats.failed++;
    else stats.skipped++;
  }
}

export function runScoring(deps: ScoringDeps): Promise<RunResult> {
  return withRunLog(deps, "score", async (stats) => {
    const resume = requireResume(deps.store, deps.candidateEmail);

    const initial = deps.engine.selectForInitialScoring(deps.settings.jobsToScorePerRun);
    logger.info(`Initial scoring: ${initial.length} job(s)`);
    stats.processed += initial.length;

    if (deps.dryRun) {
      for (const job of initial) {
        logger.info(`[DRY RUN] Would score ${job.jobId}: ${job.title} @ ${job.company}`);
      }
      stats.skipped += initial.length;
    } else {
      tally(
        stats,
        await runWithConcurrency(initial, deps.settings.concurrency, (job) =>
          scoreOne(deps, stats, job, resume, "initial"),
        ),
      );
    }

    const rescore = deps.engine.selectForRescoring(deps.settings.rescoreLimit);
    logger.info(`Re-scoring against customized resumes: ${rescore.length} job(s)`);
    stats.processed += rescore.length;

    if (deps.dryRun) {
      stats.skipped += rescore.length;
      return;
    }

    tally(
      stats,
      await runWithConcurrency(rescore, deps.settings.concurrency, async (job) => {
        const customized =
          job.customizedResumeId === null
            ? null
            : deps.store.getCustomizedResume(job.customizedResumeId);
        if (!customized) {
          logger.warn(`Customized resume for ${job.jobId} is gone, skipping re-score`);
          return "stale";
        }
        return scoreOne(deps, stats, job, customized, "custom");
      }),
    );
  });
}

// ─── Lifecycle management ───────────────────────────────────────────────────

export interface LifecycleDeps extends RunContext {
  engine: LifecycleEngine;
  checker: ActivityChecker;
  activity: ActivitySettings;
  expiry: ExpirySettings;
  sleep?: (ms: number) => Promise<void>;
}

export function runLifecycle(deps: LifecycleDeps): Promise<RunResult> {
  return withRunLog(deps, "manage", async (stats) => {
    const now = clock(deps)();

    if (deps.dryRun) {
      const stale = deps.engine.selectForRecheck(
        now,
        deps.activity.stalenessDays,
        deps.activity.checkLimit,
      );
      logger.info(`[DRY RUN] Would recheck ${stale.length} job(s); no expiry or archival applied`);
      stats.processed = stale.length;
      stats.skipped = stale.length;
      return;
    }

    logger.info("Step 1/3: Expiring stale jobs...");
    const expired = deps.engine.expireStale(now, deps.expiry.expiryDays);

    logger.info("Step 2/3: Rechecking activity...");
    const recheck = await recheckActivity(deps.engine, deps.checker, {
      now,
      stalenessDays: deps.activity.stalenessDays,
      checkLimit: deps.activity.checkLimit,
      concurrency: deps.activity.concurrency,
      maxRetries: deps.activity.maxRetries,
      retryDelayMs: deps.activity.retryDelayMs,
      sleep: deps.sleep,
    });

    logger.info("Step 3/3: Archiving old jobs...");
    const archived = deps.engine.archiveStale(now, deps.expiry.archiveDays);

    stats.processed = expired + recheck.checked + archived;
    stats.succeeded = expired + recheck.active + recheck.gone + archived;
    stats.failed = recheck.failed;
    stats.skipped = recheck.skipped;
    if (recheck.failed > 0) {
      stats.errors.push(`${recheck.failed} activity check(s) exhausted their retries`);
    }
  });
}

// ─── Customization ──────────────────────────────────────────────────────────

export interface CustomizationDeps extends RunContext {
  engine: LifecycleEngine;
  customizer: ResumeCustomizer;
  candidateEmail: string;
  settings: Pick<CustomizationSettings, "minScore" | "limit">;
}

async function discardDraft(
  customizer: ResumeCustomizer,
  jobId: string,
  draft: CustomizedResumeDraft,
): Promise<void> {
  try {
    await customizer.discard(draft);
  } catch (error) {
    logger.warn(`Could not remove unlinked artifacts for ${jobId}: ${errorMessage(error)}`);
  }
}

export function runCustomization(deps: CustomizationDeps): Promise<RunResult> {
  const now = clock(deps);

  return withRunLog(deps, "customize", async (stats) => {
    const resume = requireResume(deps.store, deps.candidateEmail);
    const jobs = deps.engine.selectForCustomization(deps.settings.minScore, deps.settings.limit);
    logger.info(`Customization: ${jobs.length} job(s) at or above score ${deps.settings.minScore}`);
    stats.processed = jobs.length;

    for (const job of jobs) {
      if (deps.dryRun) {
        logger.info(`[DRY RUN] Would customize resume for ${job.jobId} (score ${job.resumeScore})`);
        stats.skipped++;
        continue;
      }

      try {
        const draft = await deps.customizer.customize(resume, job);
        const resumeId = deps.store.insertCustomizedResume(draft, now().toISOString());

        if (deps.engine.recordCustomizedResume(job.jobId, resumeId)) {
          stats.succeeded++;
        } else {
          stats.skipped++;
          await discardDraft(deps.customizer, job.jobId, draft);
        }
      } catch (error) {
        if (error instanceof TransientOracleError) {
          logger.warn(`Customization of ${job.jobId} deferred: ${error.message}`);
          stats.skipped++;
          continue;
        }
        if (error instanceof CustomizationRejectedError || error instanceof PermanentOracleError) {
          logger.error(`Customization of ${job.jobId} failed: ${error.message}`);
          stats.failed++;
          stats.errors.push(`${job.jobId}: ${error.message}`);
          continue;
        }
        throw error;
      }
    }
  });
}

// ─── Resume parsing ─────────────────────────────────────────────────────────

export interface ResumeParsingDeps extends RunContext {
  loadText: () => Promise<string>;
  parse: (text: string) => Promise<ResumeProfile>;
}

export function runResumeParsing(deps: ResumeParsingDeps): Promise<RunResult> {
  const now = clock(deps);

  return withRunLog(deps, "parse-resume", async (stats) => {
    const text = await deps.loadText();
    stats.processed = 1;

    const profile = await deps.parse(text);

    if (deps.dryRun) {
      logger.info(`[DRY RUN] Would store resume for ${profile.email}`);
      stats.skipped = 1;
      return;
    }

    const id = deps.store.upsertResume(profile, now().toISOString());
    logger.info(`Stored resume ${id} for ${profile.email}`);
    stats.succeeded = 1;
  });
}
