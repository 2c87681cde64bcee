import { Hono } from "hono";
import { z } from "zod";
import { logger } from "./logger";
import { getDatabaseStats, quickHealthCheck } from "./db";
import { isManualStatus } from "./lifecycle";
import type { JobFilter } from "./db/operations";
import type { Services } from "./runtime";
import {
  JOB_STATUSES,
  TERMINAL_STATUSES,
  type Interest,
  type JobStatus,
  type RunType,
} from "./types";

const RUN_TYPES: readonly RunType[] = ["ingest", "format", "score", "manage", "customize", "parse-resume"];

const interestBodySchema = z.object({ value: z.boolean().nullable() });
const statusBodySchema = z.object({ status: z.string() });

function toInterest(value: boolean | null): Interest {
  if (value === null) return "unknown";
  return value ? "yes" : "no";
}

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

function parseIntParam(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;
  return Math.min(Math.max(parsed, min), max);
}

async function readJson(req: { json: () => Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    return undefined;
  }
}

export function createApp(services: Pick<Services, "db" | "store" | "engine" | "config">): Hono {
  const { db, store, engine, config } = services;
  const app = new Hono();

  app.get("/health", (c) => {
    const dbOk = quickHealthCheck(db);

    return c.json({
      status: dbOk ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      dryRun: config.env.dryRun,
      database: {
        ok: dbOk,
        stats: getDatabaseStats(db),
      },
    });
  });

  app.get("/status", (c) => {
    const lastRuns: Record<string, { status: string; startedAt: string; finishedAt: string | null } | null> = {};
    for (const runType of RUN_TYPES) {
      const run = store.getLastRun(runType);
      lastRuns[runType] = run
        ? { status: run.status, startedAt: run.started_at, finishedAt: run.finished_at }
        : null;
    }

    return c.json({
      timestamp: new Date().toISOString(),
      dryRun: config.env.dryRun,
      environment: config.env.nodeEnv,
      provider: config.search.provider,
      queries: config.search.queries.length,
      jobsByStatus: store.countByStatus(),
      activeJobs: store.count({ isActive: true }),
      lastRuns,
    });
  });

  app.get("/api/jobs", (c) => {
    const limit = parseIntParam(c.req.query("limit"), 50, 1, 200);
    const offset = parseIntParam(c.req.query("offset"), 0, 0, Number.MAX_SAFE_INTEGER);
    const minScore = Number.parseInt(c.req.query("minScore") ?? "", 10);
    const maxScore = Number.parseInt(c.req.query("maxScore") ?? "", 10);
    const statusRaw = c.req.query("status") ?? "";
    const search = c.req.query("search");

    const statuses = statusRaw
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
    const invalid = statuses.filter((s) => !isJobStatus(s));
    if (invalid.length > 0) {
      return c.json({ error: `Unknown status: ${invalid.join(", ")}` }, 400);
    }

    const filter: JobFilter = {
      isActive: c.req.query("includeInactive") === "true" ? undefined : true,
      scored: true,
      status: statuses.length > 0 ? statuses.filter(isJobStatus) : undefined,
      statusNotIn: statuses.length > 0 ? undefined : TERMINAL_STATUSES,
      minScore: Number.isFinite(minScore) ? minScore : undefined,
      maxScore: Number.isFinite(maxScore) ? maxScore : undefined,
      search: search || undefined,
    };

    const jobs = store.query(filter, "score_desc", { limit, offset });
    return c.json({ count: jobs.length, total: store.count(filter), offset, limit, jobs });
  });

  app.get("/api/jobs/applied", (c) => {
    const limit = parseIntParam(c.req.query("limit"), 50, 1, 200);
    const offset = parseIntParam(c.req.query("offset"), 0, 0, Number.MAX_SAFE_INTEGER);
    const jobs = store.query({ hasApplicationDate: true }, "application_priority", { limit, offset });
    return c.json({ count: jobs.length, offset, limit, jobs });
  });

  app.get("/api/jobs/:id", (c) => {
    const job = engine.getJob(c.req.param("id"));
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }

    const customized =
      job.customizedResumeId === null ? null : store.getCustomizedResume(job.customizedResumeId);
    return c.json({ ...job, resumeLink: customized?.resumeLink ?? null });
  });

  app.post("/api/jobs/:id/interest", async (c) => {
    const id = c.req.param("id");
    const body = interestBodySchema.safeParse(await readJson(c.req));
    if (!body.success) {
      return c.json({ error: "Body must be {\"value\": true | false | null}" }, 400);
    }

    const interest = toInterest(body.data.value);
    if (!engine.setInterest(id, interest)) {
      return c.json({ error: "Job not found" }, 404);
    }
    logger.info(`Interest for ${id} set to ${interest}`);
    return c.json({ success: true, jobId: id, interest });
  });

  app.post("/api/jobs/:id/applied", (c) => {
    const id = c.req.param("id");
    const job = engine.getJob(id);
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }

    if (!engine.markApplied(id, new Date())) {
      return c.json({ error: `Job ${id} is ${job.status} and cannot be marked applied` }, 409);
    }
    logger.info(`Job ${id} marked applied`);
    return c.json({ success: true, action: "applied", jobId: id });
  });

  app.post("/api/jobs/:id/status", async (c) => {
    const id = c.req.param("id");
    const body = statusBodySchema.safeParse(await readJson(c.req));
    if (!body.success || !isManualStatus(body.data.status)) {
      return c.json({ error: "status must be one of interviewing, offer, rejected" }, 400);
    }
    const status = body.data.status;

    const job = engine.getJob(id);
    if (!job) {
      return c.json({ error: "Job not found" }, 404);
    }

    if (!engine.setStatus(id, status)) {
      return c.json({ error: `Job ${id} is ${job.status} and cannot move to ${status}` }, 409);
    }
    logger.info(`Job ${id} moved ${job.status} → ${status}`);
    return c.json({ success: true, jobId: id, status });
  });

  return app;
}
