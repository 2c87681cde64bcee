import { beforeEach, describe, expect, it } from "vitest";
import { ScoreRangeError, ValidationError } from "../errors";
import {
  createTestContext,
  daysAgo,
  makePosting,
  makeProfile,
  type TestContext,
} from "../test-utils";

const NOW = new Date("2026-03-01T00:00:00.000Z");

describe("LifecycleEngine", () => {
  let ctx: TestContext;

  const ingestAt = (jobId: string, ageDays: number) =>
    ctx.engine.ingest(makePosting({ jobId }), daysAgo(NOW, ageDays));

  const rawRow = (jobId: string) =>
    ctx.db.prepare<[string], Record<string, unknown>>("SELECT * FROM jobs WHERE job_id = ?").get(jobId);

  const linkResume = (jobId: string): number => {
    const id = ctx.store.insertCustomizedResume(
      { ...makeProfile(), resumeLink: `artifacts/resumes/resume_${jobId}.md` },
      NOW.toISOString(),
    );
    expect(ctx.engine.recordCustomizedResume(jobId, id)).toBe(true);
    return id;
  };

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe("ingest", () => {
    it("rejects postings without a title", () => {
      const attempt = () => ctx.engine.ingest(makePosting({ title: "   " }), NOW);

      expect(attempt).toThrow(ValidationError);
      expect(attempt).toThrow("Posting is missing job_title");
      expect(ctx.store.count()).toBe(0);
    });

    it("trims identifying fields", () => {
      ctx.engine.ingest(makePosting({ company: "  Acme Robotics " }), NOW);

      expect(ctx.engine.getJob("4000000001")?.company).toBe("Acme Robotics");
    });

    it("never duplicates or reverts a tracked job", () => {
      ingestAt("j1", 5);
      ctx.engine.applyScore("j1", 72, "initial", daysAgo(NOW, 4));
      ctx.engine.setInterest("j1", "yes");
      ctx.engine.markApplied("j1", daysAgo(NOW, 3));

      expect(ctx.engine.ingest(makePosting({ jobId: "j1" }), NOW)).toBe("updated");

      expect(ctx.store.count()).toBe(1);
      expect(ctx.engine.getJob("j1")).toMatchObject({
        status: "applied",
        resumeScore: 72,
        resumeScoreStage: "initial",
        isInterested: "yes",
        applicationDate: daysAgo(NOW, 3).toISOString(),
        scrapedAt: daysAgo(NOW, 5).toISOString(),
        lastChecked: NOW.toISOString(),
      });
    });
  });

  describe("applyScore", () => {
    it("stores an initial score and advances new to scored", () => {
      ingestAt("j1", 1);

      expect(ctx.engine.applyScore("j1", 72, "initial", NOW)).toEqual({ applied: true });
      expect(ctx.engine.getJob("j1")).toMatchObject({
        status: "scored",
        resumeScore: 72,
        resumeScoreStage: "initial",
        lastChecked: NOW.toISOString(),
      });
    });

    it.each([101, -1, 72.5, Number.NaN])("leaves the row untouched for %s", (score) => {
      ingestAt("j1", 1);
      const before = rawRow("j1");

      expect(() => ctx.engine.applyScore("j1", score, "initial", NOW)).toThrow(ScoreRangeError);
      expect(rawRow("j1")).toEqual(before);
    });

    it("does not apply a second initial score", () => {
      ingestAt("j1", 1);
      ctx.engine.applyScore("j1", 72, "initial", NOW);

      expect(ctx.engine.applyScore("j1", 40, "initial", NOW)).toEqual({ applied: false });
      expect(ctx.engine.getJob("j1")?.resumeScore).toBe(72);
    });

    it("keeps an applied job applied", () => {
      ingestAt("j1", 1);
      ctx.engine.markApplied("j1", NOW);

      expect(ctx.engine.applyScore("j1", 80, "initial", NOW)).toEqual({ applied: true });
      expect(ctx.engine.getJob("j1")).toMatchObject({ status: "applied", resumeScore: 80 });
    });

    it("requires a customized resume for the custom stage", () => {
      ingestAt("j1", 1);
      ctx.engine.applyScore("j1", 72, "initial", NOW);

      expect(ctx.engine.applyScore("j1", 85, "custom", NOW)).toEqual({ applied: false });
      expect(ctx.engine.getJob("j1")?.resumeScoreStage).toBe("initial");
    });

    it("never re-selects or re-scores a custom-stage job", () => {
      ingestAt("j1", 1);
      ctx.engine.applyScore("j1", 72, "initial", NOW);
      linkResume("j1");

      expect(ctx.engine.selectForRescoring(10).map((j) => j.jobId)).toEqual(["j1"]);
      expect(ctx.engine.applyScore("j1", 85, "custom", NOW)).toEqual({ applied: true });

      expect(ctx.engine.selectForRescoring(10)).toEqual([]);
      expect(ctx.engine.applyScore("j1", 90, "custom", NOW)).toEqual({ applied: false });
      expect(ctx.engine.getJob("j1")).toMatchObject({
        resumeScore: 85,
        resumeScoreStage: "custom",
        status: "scored",
      });
    });

    it("refuses to score a job expired after selection", () => {
      ingestAt("j2", 100);
      const selected = ctx.engine.selectForInitialScoring(10);
      expect(selected.map((j) => j.jobId)).toEqual(["j2"]);

      expect(ctx.engine.expireStale(NOW, 90)).toBe(1);
      expect(ctx.engine.applyScore("j2", 72, "initial", NOW)).toEqual({ applied: false });
      expect(ctx.engine.getJob("j2")).toMatchObject({
        status: "expired",
        jobState: "done",
        resumeScore: null,
      });
    });
  });

  describe("selection", () => {
    it("selects unscored new jobs oldest first", () => {
      ingestAt("recent", 1);
      ingestAt("old", 3);
      ingestAt("scored", 5);
      ctx.engine.applyScore("scored", 50, "initial", NOW);

      expect(ctx.engine.selectForInitialScoring(10).map((j) => j.jobId)).toEqual([
        "old",
        "recent",
      ]);
    });

    it("orders customization candidates by interest then score", () => {
      const scores: Record<string, number> = { x: 90, y: 60, z: 55, w: 40 };
      for (const [jobId, score] of Object.entries(scores)) {
        ingestAt(jobId, 1);
        ctx.engine.applyScore(jobId, score, "initial", NOW);
      }
      ctx.engine.setInterest("x", "no");
      ctx.engine.setInterest("z", "yes");

      expect(ctx.engine.selectForCustomization(50, 10).map((j) => j.jobId)).toEqual(["z", "y"]);
    });

    it("skips jobs the candidate declined when re-scoring", () => {
      ingestAt("j1", 1);
      ctx.engine.applyScore("j1", 72, "initial", NOW);
      linkResume("j1");
      ctx.engine.setInterest("j1", "no");

      expect(ctx.engine.selectForRescoring(10)).toEqual([]);
    });

    it("selects only active jobs not checked within the staleness window", () => {
      ingestAt("stale", 10);
      ingestAt("fresh", 0);
      ingestAt("gone", 10);
      ctx.engine.markGone("gone", daysAgo(NOW, 10));

      expect(ctx.engine.selectForRecheck(NOW, 7, 10).map((j) => j.jobId)).toEqual(["stale"]);
    });
  });

  describe("description formatting", () => {
    it("selects open active jobs with an unformatted description, oldest first", () => {
      ingestAt("newer", 1);
      ingestAt("older", 5);
      ctx.engine.ingest(makePosting({ jobId: "blank", description: null }), daysAgo(NOW, 9));
      ingestAt("done", 7);
      ctx.engine.recordFormattedDescription(
        "done",
        "Build Node.js services backed by PostgreSQL.",
        "Build **Node.js** services backed by PostgreSQL.",
      );
      ingestAt("gone", 8);
      ctx.engine.markGone("gone", NOW);

      expect(ctx.engine.selectForDescriptionFormatting(10).map((j) => j.jobId)).toEqual([
        "older",
        "newer",
      ]);
    });

    it("refuses Markdown for a description that changed after it was read", () => {
      ingestAt("j1", 1);
      ctx.engine.ingest(makePosting({ jobId: "j1", description: "Build Go services." }), NOW);

      expect(
        ctx.engine.recordFormattedDescription(
          "j1",
          "Build Node.js services backed by PostgreSQL.",
          "Build **Node.js** services backed by PostgreSQL.",
        ),
      ).toBe(false);
      expect(ctx.engine.recordFormattedDescription("j1", "Build Go services.", "Build **Go** services.")).toBe(
        true,
      );
      expect(ctx.engine.recordFormattedDescription("j1", "Build Go services.", "Build Go **services**.")).toBe(
        false,
      );
      expect(ctx.engine.getJob("j1")?.descriptionMd).toBe("Build **Go** services.");
    });
  });

  describe("customized resumes", () => {
    it("keeps the first link and discards a concurrent second one", () => {
      ingestAt("j1", 1);
      ctx.engine.applyScore("j1", 72, "initial", NOW);
      const first = ctx.store.insertCustomizedResume(
        { ...makeProfile(), resumeLink: "a.md" },
        NOW.toISOString(),
      );
      const second = ctx.store.insertCustomizedResume(
        { ...makeProfile(), resumeLink: "b.md" },
        NOW.toISOString(),
      );

      expect(ctx.engine.recordCustomizedResume("j1", first)).toBe(true);
      expect(ctx.engine.recordCustomizedResume("j1", second)).toBe(false);

      expect(ctx.engine.getJob("j1")?.customizedResumeId).toBe(first);
      expect(ctx.store.getCustomizedResume(first)?.resumeLink).toBe("a.md");
      expect(ctx.store.getCustomizedResume(second)).toBeNull();
    });
  });

  describe("interest", () => {
    it("reports a missing job", () => {
      expect(ctx.engine.setInterest("missing", "yes")).toBe(false);
    });

    it("resets interest to unknown", () => {
      ingestAt("j1", 1);
      ctx.engine.setInterest("j1", "yes");
      ctx.engine.setInterest("j1", "unknown");

      expect(ctx.engine.getJob("j1")?.isInterested).toBe("unknown");
    });
  });

  describe("activity", () => {
    it("deactivates a gone job once", () => {
      ingestAt("j1", 10);

      expect(ctx.engine.markGone("j1", NOW)).toBe(true);
      expect(ctx.engine.markGone("j1", NOW)).toBe(false);
      expect(ctx.engine.getJob("j1")).toMatchObject({
        isActive: false,
        jobState: "done",
        status: "new",
        lastChecked: NOW.toISOString(),
      });
    });

    it("only refreshes last_checked for an active job", () => {
      ingestAt("j1", 10);
      ctx.engine.markSeenActive("j1", NOW);

      expect(ctx.engine.getJob("j1")).toMatchObject({
        isActive: true,
        status: "new",
        jobState: "new",
        lastChecked: NOW.toISOString(),
      });
    });
  });

  describe("expireStale", () => {
    it("expires only old pre-application jobs", () => {
      ingestAt("old-new", 100);
      ingestAt("old-scored", 100);
      ctx.engine.applyScore("old-scored", 60, "initial", NOW);
      ingestAt("old-applied", 100);
      ctx.engine.markApplied("old-applied", daysAgo(NOW, 95));
      ingestAt("old-interviewing", 100);
      ctx.engine.markApplied("old-interviewing", daysAgo(NOW, 95));
      ctx.engine.setStatus("old-interviewing", "interviewing");
      ingestAt("recent", 10);

      expect(ctx.engine.expireStale(NOW, 90)).toBe(2);

      const statusOf = (id: string) => ctx.engine.getJob(id)?.status;
      expect(statusOf("old-new")).toBe("expired");
      expect(statusOf("old-scored")).toBe("expired");
      expect(statusOf("old-applied")).toBe("applied");
      expect(statusOf("old-interviewing")).toBe("interviewing");
      expect(statusOf("recent")).toBe("new");
    });

    it("is idempotent", () => {
      ingestAt("j1", 100);

      expect(ctx.engine.expireStale(NOW, 90)).toBe(1);
      expect(ctx.engine.expireStale(NOW, 90)).toBe(0);
    });
  });

  describe("archiveStale", () => {
    it("archives expired and closed jobs but not ones awaiting a decision", () => {
      ingestAt("expired", 100);
      ctx.engine.expireStale(NOW, 90);

      ingestAt("rejected-gone", 100);
      ctx.engine.markApplied("rejected-gone", daysAgo(NOW, 99));
      ctx.engine.setStatus("rejected-gone", "rejected");
      ctx.engine.markGone("rejected-gone", NOW);

      ingestAt("applied-gone", 100);
      ctx.engine.markApplied("applied-gone", daysAgo(NOW, 99));
      ctx.engine.markGone("applied-gone", NOW);

      ingestAt("active-new", 100);

      expect(ctx.engine.archiveStale(NOW, 90)).toBe(2);

      const statusOf = (id: string) => ctx.engine.getJob(id)?.status;
      expect(statusOf("expired")).toBe("archived");
      expect(statusOf("rejected-gone")).toBe("archived");
      expect(statusOf("applied-gone")).toBe("applied");
      expect(statusOf("active-new")).toBe("new");
      expect(ctx.engine.archiveStale(NOW, 90)).toBe(0);
    });
  });

  describe("manual changes", () => {
    it("marks an open job applied once", () => {
      ingestAt("j1", 1);

      expect(ctx.engine.markApplied("j1", NOW)).toBe(true);
      expect(ctx.engine.markApplied("j1", NOW)).toBe(false);
      expect(ctx.engine.getJob("j1")).toMatchObject({
        status: "applied",
        applicationDate: NOW.toISOString(),
      });
    });

    it("follows the application workflow", () => {
      ingestAt("j1", 1);

      expect(ctx.engine.setStatus("j1", "interviewing")).toBe(false);
      ctx.engine.markApplied("j1", NOW);
      expect(ctx.engine.setStatus("j1", "interviewing")).toBe(true);
      expect(ctx.engine.setStatus("j1", "offer")).toBe(true);
      expect(ctx.engine.setStatus("j1", "rejected")).toBe(true);
      expect(ctx.engine.setStatus("j1", "interviewing")).toBe(false);
      expect(ctx.engine.getJob("j1")?.status).toBe("rejected");
    });
  });
});
