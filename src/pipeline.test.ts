import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  runCustomization,
  runDescriptionFormatting,
  runIngestion,
  runLifecycle,
  runResumeParsing,
  runScoring,
  type ScoringDeps,
} from "./pipeline";
import {
  CustomizationRejectedError,
  PermanentOracleError,
  TransientCheckError,
  TransientOracleError,
} from "./errors";
import { createTestContext, daysAgo, makePosting, makeProfile, type TestContext } from "./test-utils";
import type { CandidateSource } from "./connectors";
import type { ResumeCustomizer, CustomizationInput } from "./customization";
import type { DescriptionFormatter } from "./formatting";
import type { ScoreResult, ScoringOracle } from "./scoring";
import type { ActivityChecker, ActivityStatus } from "./lifecycle/recheck";
import type { CustomizedResumeDraft, Job, RawPosting, ResumeProfile } from "./types";

const NOW = new Date("2026-03-01T00:00:00.000Z");
const EMAIL = "alex@example.com";

const SEARCH = {
  queries: ["backend engineer"],
  location: "Singapore",
  geoId: null,
  jobType: "F",
  postedWithin: "",
};

function fakeSource(postings: RawPosting[]): CandidateSource {
  return {
    provider: "linkedin",
    async *fetchCandidates() {
      yield* postings;
    },
  };
}

// Scores the base resume 72 and any customized resume 85
const fixedOracle: ScoringOracle = {
  score: async (profile): Promise<ScoreResult> => ({
    score: "resumeLink" in profile ? 85 : 72,
    rationale: "test",
  }),
};

const tailoringCustomizer: ResumeCustomizer = {
  customize: async (profile: ResumeProfile, job: CustomizationInput) => ({
    ...profile,
    summary: `Tailored for ${job.title}`,
    resumeLink: `artifacts/resumes/resume_${job.jobId}.pdf`,
  }),
  discard: async () => {},
};

describe("pipeline runs", () => {
  let ctx: TestContext;

  const scoringDeps = (overrides: Partial<ScoringDeps> = {}): ScoringDeps => ({
    store: ctx.store,
    engine: ctx.engine,
    dryRun: false,
    now: () => NOW,
    oracle: fixedOracle,
    candidateEmail: EMAIL,
    settings: { jobsToScorePerRun: 20, rescoreLimit: 10, concurrency: 1 },
    requestDelayMs: 0,
    ...overrides,
  });

  const customizationDeps = (customizer: ResumeCustomizer = tailoringCustomizer) => ({
    store: ctx.store,
    engine: ctx.engine,
    dryRun: false,
    now: () => NOW,
    customizer,
    candidateEmail: EMAIL,
    settings: { minScore: 50, limit: 2 },
  });

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe("runIngestion", () => {
    it("stores valid postings and counts rejected ones", async () => {
      const result = await runIngestion({
        store: ctx.store,
        engine: ctx.engine,
        dryRun: false,
        now: () => NOW,
        source: fakeSource([makePosting({ jobId: "j1" }), makePosting({ jobId: "bad", title: null })]),
        search: SEARCH,
      });

      expect(result).toMatchObject({
        runType: "ingest",
        status: "completed",
        processed: 2,
        succeeded: 1,
        failed: 1,
        skipped: 0,
        errors: ["bad: Posting is missing job_title"],
      });
      expect(ctx.engine.getJob("j1")?.scrapedAt).toBe(NOW.toISOString());
      expect(ctx.store.count()).toBe(1);
    });

    it("passes known ids to the source", async () => {
      ctx.engine.ingest(makePosting({ jobId: "known" }), NOW);
      const fetchCandidates = vi.fn(async function* (): AsyncGenerator<RawPosting> {});

      await runIngestion({
        store: ctx.store,
        engine: ctx.engine,
        dryRun: false,
        source: { provider: "linkedin", fetchCandidates },
        search: SEARCH,
      });

      expect(fetchCandidates).toHaveBeenCalledWith("backend engineer", "Singapore", {
        geoId: null,
        jobType: "F",
        postedWithin: "",
        skipJobIds: new Set(["known"]),
      });
    });

    it("writes nothing in a dry run", async () => {
      const result = await runIngestion({
        store: ctx.store,
        engine: ctx.engine,
        dryRun: true,
        source: fakeSource([makePosting({ jobId: "j1" })]),
        search: SEARCH,
      });

      expect(result).toMatchObject({ processed: 1, skipped: 1, succeeded: 0 });
      expect(ctx.store.count()).toBe(0);
      expect(ctx.store.getLastRun("ingest")?.dry_run).toBe(1);
    });
  });

  describe("runScoring", () => {
    it("fails the run when no resume is stored", async () => {
      ctx.engine.ingest(makePosting({ jobId: "j1" }), NOW);

      const result = await runScoring(scoringDeps());

      expect(result.status).toBe("failed");
      expect(result.errors).toEqual([
        "score run failed: No parsed resume stored for alex@example.com; run parse-resume first",
      ]);
      expect(ctx.store.getLastRun("score")?.status).toBe("failed");
      expect(ctx.engine.getJob("j1")?.resumeScore).toBeNull();
    });

    it("defers jobs on transient oracle errors", async () => {
      ctx.store.upsertResume(makeProfile(), NOW.toISOString());
      ctx.engine.ingest(makePosting({ jobId: "j1" }), NOW);
      const oracle: ScoringOracle = {
        score: async () => {
          throw new TransientOracleError("HTTP 429", 4, 429);
        },
      };

      const result = await runScoring(scoringDeps({ oracle }));

      expect(result).toMatchObject({ status: "completed", processed: 1, skipped: 1, failed: 0 });
      expect(ctx.engine.getJob("j1")).toMatchObject({ status: "new", resumeScore: null });
    });

    it("counts an out-of-range score as a failure", async () => {
      ctx.store.upsertResume(makeProfile(), NOW.toISOString());
      ctx.engine.ingest(makePosting({ jobId: "j1" }), NOW);
      const oracle: ScoringOracle = {
        score: async () => ({ score: 120, rationale: "too keen" }),
      };

      const result = await runScoring(scoringDeps({ oracle }));

      expect(result).toMatchObject({ processed: 1, failed: 1, succeeded: 0 });
      expect(result.errors).toEqual([
        "j1: Score for job j1 must be an integer in [0, 100], got 120",
      ]);
      expect(ctx.engine.getJob("j1")?.resumeScore).toBeNull();
    });

    it("waits between oracle requests", async () => {
      ctx.store.upsertResume(makeProfile(), NOW.toISOString());
      ctx.engine.ingest(makePosting({ jobId: "j1" }), NOW);
      ctx.engine.ingest(makePosting({ jobId: "j2" }), NOW);
      const sleep = vi.fn(async (_ms: number) => {});

      await runScoring(scoringDeps({ requestDelayMs: 6000, sleep }));

      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(6000);
    });
  });

  it("scores, customizes and re-scores a job end to end", async () => {
    ctx.store.upsertResume(makeProfile(), NOW.toISOString());
    await runIngestion({
      store: ctx.store,
      engine: ctx.engine,
      dryRun: false,
      now: () => NOW,
      source: fakeSource([makePosting({ jobId: "j1" })]),
      search: SEARCH,
    });

    const first = await runScoring(scoringDeps());
    expect(first).toMatchObject({ processed: 1, succeeded: 1 });
    expect(ctx.engine.getJob("j1")).toMatchObject({
      status: "scored",
      resumeScore: 72,
      resumeScoreStage: "initial",
    });

    expect(ctx.engine.setInterest("j1", "yes")).toBe(true);

    const customized = await runCustomization(customizationDeps());
    expect(customized).toMatchObject({ processed: 1, succeeded: 1 });
    const job = ctx.engine.getJob("j1");
    const resume = job?.customizedResumeId ? ctx.store.getCustomizedResume(job.customizedResumeId) : null;
    expect(resume?.summary).toBe("Tailored for Backend Engineer");
    expect(resume?.resumeLink).toBe("artifacts/resumes/resume_j1.pdf");

    const rescored = await runScoring(scoringDeps());
    expect(rescored).toMatchObject({ processed: 1, succeeded: 1 });
    expect(ctx.engine.getJob("j1")).toMatchObject({
      status: "scored",
      resumeScore: 85,
      resumeScoreStage: "custom",
      isInterested: "yes",
    });

    const idle = await runScoring(scoringDeps());
    expect(idle.processed).toBe(0);
    expect((await runCustomization(customizationDeps())).processed).toBe(0);
  });

  describe("runDescriptionFormatting", () => {
    const formattingDeps = (formatter: DescriptionFormatter, dryRun = false) => ({
      store: ctx.store,
      engine: ctx.engine,
      dryRun,
      now: () => NOW,
      formatter,
      settings: { limit: 10 },
      requestDelayMs: 100,
      sleep: vi.fn(async (_ms: number) => {}),
    });

    beforeEach(() => {
      ctx.engine.ingest(makePosting({ jobId: "j1" }), daysAgo(NOW, 2));
      ctx.engine.ingest(makePosting({ jobId: "j2", description: "Write Go." }), daysAgo(NOW, 1));
    });

    it("stores Markdown and counts reworded answers as failures", async () => {
      const formatter: DescriptionFormatter = {
        format: async (description) => {
          if (description === "Write Go.") {
            throw new PermanentOracleError("Formatted description does not keep the original wording");
          }
          return `**${description}**`;
        },
      };
      const deps = formattingDeps(formatter);

      const result = await runDescriptionFormatting(deps);

      expect(result).toMatchObject({
        runType: "format",
        status: "completed",
        processed: 2,
        succeeded: 1,
        failed: 1,
        skipped: 0,
        errors: ["j2: Formatted description does not keep the original wording"],
      });
      expect(ctx.engine.getJob("j1")?.descriptionMd).toBe(
        "**Build Node.js services backed by PostgreSQL.**",
      );
      expect(ctx.engine.getJob("j2")?.descriptionMd).toBeNull();
      expect(deps.sleep).toHaveBeenCalledTimes(1);
      expect(deps.sleep).toHaveBeenCalledWith(100);
    });

    it("defers transient failures", async () => {
      const formatter: DescriptionFormatter = {
        format: async () => {
          throw new TransientOracleError("HTTP 429", 3, 429);
        },
      };

      const result = await runDescriptionFormatting(formattingDeps(formatter));

      expect(result).toMatchObject({ processed: 2, succeeded: 0, failed: 0, skipped: 2 });
      expect(ctx.engine.getJob("j1")?.descriptionMd).toBeNull();
    });

    it("calls nothing in a dry run", async () => {
      const format = vi.fn(async (description: string) => description);

      const result = await runDescriptionFormatting(formattingDeps({ format }, true));

      expect(result).toMatchObject({ processed: 2, skipped: 2 });
      expect(format).not.toHaveBeenCalled();
    });
  });

  describe("runCustomization", () => {
    beforeEach(() => {
      ctx.store.upsertResume(makeProfile(), NOW.toISOString());
      ctx.engine.ingest(makePosting({ jobId: "j1" }), NOW);
      ctx.engine.applyScore("j1", 72, "initial", NOW);
    });

    it("counts a rejected customization as failed and leaves the job unlinked", async () => {
      const customizer: ResumeCustomizer = {
        customize: async () => {
          throw new CustomizationRejectedError("j1", "summary", "invented a degree");
        },
        discard: async () => {},
      };

      const result = await runCustomization(customizationDeps(customizer));

      expect(result).toMatchObject({
        processed: 1,
        failed: 1,
        errors: ["j1: Customization of summary for job j1 rejected: invented a degree"],
      });
      expect(ctx.engine.getJob("j1")?.customizedResumeId).toBeNull();
    });

    it("discards the draft of a run that lost the race to link a resume", async () => {
      let linkedId = 0;
      const discard = vi.fn(async (_draft: CustomizedResumeDraft) => {});
      const customizer: ResumeCustomizer = {
        customize: async (profile, job) => {
          // an overlapping run links its resume while this one is still working
          linkedId = ctx.store.insertCustomizedResume(
            { ...profile, summary: "First", resumeLink: "artifacts/resumes/first.pdf" },
            NOW.toISOString(),
          );
          ctx.engine.recordCustomizedResume(job.jobId, linkedId);
          return { ...profile, summary: "Second", resumeLink: "artifacts/resumes/second.pdf" };
        },
        discard,
      };

      const result = await runCustomization(customizationDeps(customizer));

      expect(result).toMatchObject({ processed: 1, succeeded: 0, skipped: 1, failed: 0 });
      expect(discard).toHaveBeenCalledTimes(1);
      expect(discard.mock.calls[0][0].resumeLink).toBe("artifacts/resumes/second.pdf");
      expect(ctx.engine.getJob("j1")?.customizedResumeId).toBe(linkedId);
      expect(ctx.store.getCustomizedResume(linkedId)).toMatchObject({
        summary: "First",
        resumeLink: "artifacts/resumes/first.pdf",
      });
      expect(ctx.store.getCustomizedResume(linkedId + 1)).toBeNull();
    });

    it("skips jobs below the score threshold", async () => {
      const result = await runCustomization({
        ...customizationDeps(),
        settings: { minScore: 80, limit: 2 },
      });

      expect(result.processed).toBe(0);
    });
  });

  describe("runLifecycle", () => {
    const checkerFor = (gone: Set<string>): ActivityChecker => ({
      check: async (job: Job): Promise<ActivityStatus> => (gone.has(job.jobId) ? "gone" : "active"),
    });

    const lifecycleDeps = (checker: ActivityChecker, dryRun = false) => ({
      store: ctx.store,
      engine: ctx.engine,
      dryRun,
      now: () => NOW,
      checker,
      activity: {
        stalenessDays: 3,
        checkLimit: 50,
        concurrency: 1,
        timeoutMs: 1000,
        maxRetries: 1,
        retryDelayMs: 0,
      },
      expiry: { expiryDays: 90, archiveDays: 120 },
      sleep: async () => {},
    });

    it("expires, rechecks and archives in one run", async () => {
      ctx.engine.ingest(makePosting({ jobId: "old" }), daysAgo(NOW, 100));
      ctx.engine.ingest(makePosting({ jobId: "closed" }), daysAgo(NOW, 5));
      ctx.engine.ingest(makePosting({ jobId: "ancient" }), daysAgo(NOW, 200));
      ctx.engine.markGone("ancient", daysAgo(NOW, 150));

      const result = await runLifecycle(lifecycleDeps(checkerFor(new Set(["closed"]))));

      // old and ancient expire; closed is rechecked; ancient is then archived
      expect(result).toMatchObject({
        status: "completed",
        processed: 4,
        succeeded: 4,
        failed: 0,
        skipped: 0,
      });
      expect(ctx.engine.getJob("old")?.status).toBe("expired");
      expect(ctx.engine.getJob("closed")).toMatchObject({ isActive: false, status: "new" });
      expect(ctx.engine.getJob("ancient")?.status).toBe("archived");
    });

    it("reports exhausted checks without deactivating", async () => {
      ctx.engine.ingest(makePosting({ jobId: "j1" }), daysAgo(NOW, 5));
      const checker: ActivityChecker = {
        check: async () => {
          throw new TransientCheckError("HTTP 999", 999);
        },
      };

      const result = await runLifecycle(lifecycleDeps(checker));

      expect(result).toMatchObject({
        failed: 1,
        errors: ["1 activity check(s) exhausted their retries"],
      });
      expect(ctx.engine.getJob("j1")?.isActive).toBe(true);
      expect(ctx.store.getCheckFailures("j1")).toHaveLength(1);
    });

    it("only counts recheck candidates in a dry run", async () => {
      ctx.engine.ingest(makePosting({ jobId: "old" }), daysAgo(NOW, 100));
      const check = vi.fn(async (): Promise<ActivityStatus> => "gone");

      const result = await runLifecycle(lifecycleDeps({ check }, true));

      expect(result).toMatchObject({ processed: 1, skipped: 1 });
      expect(check).not.toHaveBeenCalled();
      expect(ctx.engine.getJob("old")).toMatchObject({ status: "new", isActive: true });
    });
  });

  describe("runResumeParsing", () => {
    it("stores the parsed profile", async () => {
      const result = await runResumeParsing({
        store: ctx.store,
        dryRun: false,
        now: () => NOW,
        loadText: async () => "# Alex Example",
        parse: async () => makeProfile(),
      });

      expect(result).toMatchObject({ status: "completed", processed: 1, succeeded: 1 });
      expect(ctx.store.getResume(EMAIL)?.parsedAt).toBe(NOW.toISOString());
    });

    it("lets later runs find the resume when the configured email differs in case", async () => {
      await runResumeParsing({
        store: ctx.store,
        dryRun: false,
        now: () => NOW,
        loadText: async () => "# Alex Example",
        parse: async () => makeProfile(),
      });
      ctx.engine.ingest(makePosting({ jobId: "j1" }), NOW);

      const result = await runScoring(scoringDeps({ candidateEmail: " Alex@Example.com " }));

      expect(result).toMatchObject({ status: "completed", processed: 1, succeeded: 1 });
      expect(ctx.engine.getJob("j1")?.resumeScore).toBe(72);
    });
  });
});
