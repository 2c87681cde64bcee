import { logger } from "../logger";
import { ScoreRangeError, ValidationError } from "../errors";
import type { JobFilter, StoreGateway } from "../db/operations";
import {
  OPEN_STATUSES,
  TERMINAL_STATUSES,
  IN_PROGRESS_STATUSES,
  type Interest,
  type Job,
  type JobStatus,
  type RawPosting,
  type ScoreStage,
} from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;
const SWEEP_BATCH = 500;

export function cutoff(now: Date, days: number): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString();
}

export type ManualStatus = "interviewing" | "offer" | "rejected";

// Statuses a manual change may move from, keyed by target
const MANUAL_PREDECESSORS: Record<ManualStatus, readonly JobStatus[]> = {
  interviewing: ["applied"],
  offer: ["applied", "interviewing"],
  rejected: ["applied", "interviewing", "offer"],
};

export function isManualStatus(value: string): value is ManualStatus {
  return value === "interviewing" || value === "offer" || value === "rejected";
}

export interface ApplyScoreResult {
  applied: boolean;
}

function requireText(value: string | null, field: string): string {
  const trimmed = value?.trim() ?? "";
  if (!trimmed) {
    throw new ValidationError(`Posting is missing ${field}`, field);
  }
  return trimmed;
}

/**
 * Owns every job state transition. Each transition is a single guarded
 * update keyed by job_id: if another run already moved the job, the guard
 * fails and the call reports a no-op instead of overwriting.
 */
export class LifecycleEngine {
  constructor(private readonly store: StoreGateway) {}

  getJob(jobId: string): Job | null {
    return this.store.getById(jobId);
  }

  // ── Ingestion ─────────────────────────────────────────────

  ingest(posting: RawPosting, now: Date): "inserted" | "updated" {
    const jobId = requireText(posting.jobId, "job_id");
    const title = requireText(posting.title, "job_title");
    const company = requireText(posting.company, "company");

    return this.store.upsertJob(
      { ...posting, jobId, title, company },
      now.toISOString(),
    );
  }

  knownJobIds(provider?: string): Set<string> {
    return this.store.getKnownJobIds(provider);
  }

  // ── Description formatting ────────────────────────────────

  selectForDescriptionFormatting(limit: number): Job[] {
    return this.store.query(
      {
        isActive: true,
        status: OPEN_STATUSES,
        hasDescription: true,
        hasDescriptionMd: false,
      },
      "scraped_asc",
      { limit },
    );
  }

  /**
   * Stores the Markdown rendering of `description`. Refused when the job was
   * formatted meanwhile or its description changed since it was read.
   */
  recordFormattedDescription(jobId: string, description: string, markdown: string): boolean {
    return this.store.conditionalUpdate(
      jobId,
      { description, hasDescriptionMd: false },
      { descriptionMd: markdown },
    );
  }

  // ── Scoring ───────────────────────────────────────────────

  selectForInitialScoring(limit: number): Job[] {
    return this.store.query(
      { isActive: true, status: ["new"], scored: false },
      "scraped_asc",
      { limit },
    );
  }

  /**
   * Jobs whose customized resume has not been scored yet. Interest must not
   * be an explicit "no"; unknown interest still qualifies.
   */
  selectForRescoring(limit: number): Job[] {
    return this.store.query(
      {
        isActive: true,
        status: OPEN_STATUSES,
        jobState: "new",
        hasCustomizedResume: true,
        customizedResumeLinked: true,
        resumeScoreStage: "initial",
        interest: ["yes", "unknown"],
      },
      "score_desc",
      { limit },
    );
  }

  applyScore(
    jobId: string,
    score: number,
    stage: ScoreStage,
    now: Date,
  ): ApplyScoreResult {
    if (!Number.isInteger(score) || score < 0 || score > 100) {
      throw new ScoreRangeError(jobId, score);
    }

    const guard: JobFilter =
      stage === "initial"
        ? {
            statusNotIn: TERMINAL_STATUSES,
            resumeScoreStage: "initial",
            scored: false,
          }
        : {
            statusNotIn: TERMINAL_STATUSES,
            resumeScoreStage: "initial",
            hasCustomizedResume: true,
          };

    const applied = this.store.conditionalUpdate(jobId, guard, {
      resumeScore: score,
      resumeScoreStage: stage,
      lastChecked: now.toISOString(),
      advanceStatus: { from: "new", to: "scored" },
    });

    if (!applied) {
      logger.debug(`Score ${score} (${stage}) for ${jobId} not applied: state changed`);
    }
    return { applied };
  }

  // ── Interest & customization ──────────────────────────────

  setInterest(jobId: string, value: Interest): boolean {
    return this.store.conditionalUpdate(jobId, {}, { isInterested: value });
  }

  selectForCustomization(minScore: number, limit: number): Job[] {
    return this.store.query(
      {
        isActive: true,
        status: OPEN_STATUSES,
        jobState: "new",
        minScore,
        hasCustomizedResume: false,
        interest: ["yes", "unknown"],
      },
      "interest_then_score",
      { limit },
    );
  }

  /**
   * Links a freshly stored customized resume to its job. When another run
   * linked one first, the new row is deleted and false is returned.
   */
  recordCustomizedResume(jobId: string, resumeId: number): boolean {
    const linked = this.store.conditionalUpdate(
      jobId,
      {
        hasCustomizedResume: false,
        jobState: "new",
        statusNotIn: TERMINAL_STATUSES,
      },
      { customizedResumeId: resumeId },
    );

    if (!linked) {
      this.store.deleteCustomizedResume(resumeId);
      logger.warn(
        `Job ${jobId} already has a customized resume or left the pipeline; discarded resume ${resumeId}`,
      );
    }
    return linked;
  }

  // ── Activity ──────────────────────────────────────────────

  selectForRecheck(now: Date, stalenessDays: number, limit: number): Job[] {
    return this.store.query(
      {
        isActive: true,
        statusNotIn: TERMINAL_STATUSES,
        lastCheckedBefore: cutoff(now, stalenessDays),
      },
      "last_checked_asc",
      { limit },
    );
  }

  markGone(jobId: string, now: Date): boolean {
    return this.store.conditionalUpdate(
      jobId,
      { isActive: true },
      { isActive: false, jobState: "done", lastChecked: now.toISOString() },
    );
  }

  markSeenActive(jobId: string, now: Date): boolean {
    return this.store.conditionalUpdate(
      jobId,
      { isActive: true },
      { lastChecked: now.toISOString() },
    );
  }

  recordCheckFailure(jobId: string, attempts: number, error: string, now: Date): void {
    this.store.recordCheckFailure(jobId, attempts, error, now.toISOString());
  }

  // ── Sweeps ────────────────────────────────────────────────

  expireStale(now: Date, expiryDays: number): number {
    const guard: JobFilter = {
      status: OPEN_STATUSES,
      scrapedBefore: cutoff(now, expiryDays),
      hasApplicationDate: false,
    };
    const expired = this.sweep(guard, { status: "expired", jobState: "done" });
    if (expired > 0) {
      logger.info(`Expired ${expired} job(s) older than ${expiryDays} days`);
    }
    return expired;
  }

  archiveStale(now: Date, archiveDays: number): number {
    const scrapedBefore = cutoff(now, archiveDays);
    const patch = { status: "archived", jobState: "done" } as const;

    const archived =
      this.sweep({ status: ["expired"], scrapedBefore }, patch) +
      this.sweep(
        {
          isActive: false,
          statusNotIn: ["archived", ...IN_PROGRESS_STATUSES],
          scrapedBefore,
        },
        patch,
      );

    if (archived > 0) {
      logger.info(`Archived ${archived} job(s) older than ${archiveDays} days`);
    }
    return archived;
  }

  private sweep(
    guard: JobFilter,
    patch: { status: JobStatus; jobState: "done" },
  ): number {
    let changed = 0;

    while (true) {
      const batch = this.store.query(guard, "scraped_asc", { limit: SWEEP_BATCH });
      let changedInBatch = 0;

      for (const job of batch) {
        if (this.store.conditionalUpdate(job.jobId, guard, patch)) {
          changedInBatch++;
        }
      }

      changed += changedInBatch;
      if (batch.length < SWEEP_BATCH || changedInBatch === 0) break;
    }

    return changed;
  }

  // ── Manual changes ────────────────────────────────────────

  markApplied(jobId: string, now: Date): boolean {
    return this.store.conditionalUpdate(
      jobId,
      { status: OPEN_STATUSES },
      { status: "applied", applicationDate: now.toISOString() },
    );
  }

  setStatus(jobId: string, status: ManualStatus): boolean {
    return this.store.conditionalUpdate(
      jobId,
      { status: MANUAL_PREDECESSORS[status] },
      { status },
    );
  }
}
