import type { z } from "zod";
import type { SqliteDatabase } from "./index";
import { StoreUnavailableError } from "../errors";
import {
  stringList,
  educationListSchema,
  experienceListSchema,
  projectListSchema,
  certificationListSchema,
  linksSchema,
  normalizeEmail,
} from "../resume/schema";
import {
  JOB_STATUSES,
  type CustomizedResume,
  type CustomizedResumeDraft,
  type Interest,
  type Job,
  type JobState,
  type JobStatus,
  type RawPosting,
  type ResumeProfile,
  type RunStats,
  type RunType,
  type ScoreStage,
  type StoredResume,
} from "../types";

type SqlValue = string | number | null;

// Row Shapes

interface JobRow {
  job_id: string;
  company: string | null;
  job_title: string | null;
  level: string | null;
  location: string | null;
  description: string | null;
  description_md: string | null;
  provider: string | null;
  posted_at: string | null;
  status: string;
  job_state: string;
  is_active: number;
  is_interested: number | null;
  resume_score: number | null;
  resume_score_stage: string;
  customized_resume_id: number | null;
  application_date: string | null;
  notes: string | null;
  scraped_at: string;
  last_checked: string;
}

interface ProfileRow {
  name: string;
  email: string;
  phone: string | null;
  location: string | null;
  summary: string | null;
  skills_json: string;
  education_json: string;
  experience_json: string;
  projects_json: string;
  certifications_json: string;
  languages_json: string;
  links_json: string | null;
}

interface ResumeRow extends ProfileRow {
  id: number;
  parsed_at: string;
}

interface CustomizedResumeRow extends ProfileRow {
  id: number;
  resume_link: string;
  created_at: string;
  updated_at: string;
}

export interface RunLogRow {
  id: number;
  run_type: string;
  started_at: string;
  finished_at: string | null;
  status: string;
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  errors: string | null;
  dry_run: number;
}

export interface CheckFailureRow {
  id: number;
  job_id: string;
  attempts: number;
  error: string | null;
  failed_at: string;
}

// Row Mapping

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

function toJobStatus(value: string): JobStatus {
  if (!isJobStatus(value)) {
    throw new Error(`Unknown job status in store: ${value}`);
  }
  return value;
}

function toJobState(value: string): JobState {
  if (value !== "new" && value !== "done") {
    throw new Error(`Unknown job_state in store: ${value}`);
  }
  return value;
}

function toScoreStage(value: string): ScoreStage {
  if (value !== "initial" && value !== "custom") {
    throw new Error(`Unknown resume_score_stage in store: ${value}`);
  }
  return value;
}

export function interestToDb(value: Interest): number | null {
  if (value === "yes") return 1;
  if (value === "no") return 0;
  return null;
}

export function interestFromDb(value: number | null): Interest {
  if (value === null) return "unknown";
  return value === 1 ? "yes" : "no";
}

function toJob(row: JobRow): Job {
  return {
    jobId: row.job_id,
    company: row.company,
    title: row.job_title,
    level: row.level,
    location: row.location,
    description: row.description,
    descriptionMd: row.description_md,
    provider: row.provider,
    postedAt: row.posted_at,
    status: toJobStatus(row.status),
    jobState: toJobState(row.job_state),
    isActive: row.is_active === 1,
    isInterested: interestFromDb(row.is_interested),
    resumeScore: row.resume_score,
    resumeScoreStage: toScoreStage(row.resume_score_stage),
    customizedResumeId: row.customized_resume_id,
    applicationDate: row.application_date,
    notes: row.notes,
    scrapedAt: row.scraped_at,
    lastChecked: row.last_checked,
  };
}

function parseJsonColumn<S extends z.ZodTypeAny>(
  raw: string | null,
  schema: S,
): z.output<S> {
  return schema.parse(raw === null ? null : JSON.parse(raw));
}

function toProfile(row: ProfileRow): ResumeProfile {
  return {
    name: row.name,
    email: row.email,
    phone: row.phone,
    location: row.location,
    summary: row.summary,
    skills: parseJsonColumn(row.skills_json, stringList),
    education: parseJsonColumn(row.education_json, educationListSchema),
    experience: parseJsonColumn(row.experience_json, experienceListSchema),
    projects: parseJsonColumn(row.projects_json, projectListSchema),
    certifications: parseJsonColumn(
      row.certifications_json,
      certificationListSchema,
    ),
    languages: parseJsonColumn(row.languages_json, stringList),
    links: row.links_json
      ? parseJsonColumn(row.links_json, linksSchema)
      : null,
  };
}

function profileParams(profile: ResumeProfile): SqlValue[] {
  return [
    profile.name,
    profile.email,
    profile.phone,
    profile.location,
    profile.summary,
    JSON.stringify(profile.skills),
    JSON.stringify(profile.education),
    JSON.stringify(profile.experience),
    JSON.stringify(profile.projects),
    JSON.stringify(profile.certifications),
    JSON.stringify(profile.languages),
    profile.links ? JSON.stringify(profile.links) : null,
  ];
}

// Filters, Ordering, Patches

/**
 * Predicate over job columns. Every field narrows the match; an empty
 * filter matches everything. Used both for selection queries and as the
 * guard of a conditional update.
 */
export interface JobFilter {
  status?: readonly JobStatus[];
  statusNotIn?: readonly JobStatus[];
  jobState?: JobState;
  isActive?: boolean;
  scored?: boolean;
  minScore?: number;
  maxScore?: number;
  resumeScoreStage?: ScoreStage;
  hasCustomizedResume?: boolean;
  customizedResumeLinked?: boolean;
  interest?: readonly Interest[];
  hasApplicationDate?: boolean;
  scrapedBefore?: string;
  lastCheckedBefore?: string;
  /** Matches the exact stored description. */
  description?: string;
  hasDescription?: boolean;
  hasDescriptionMd?: boolean;
  provider?: string;
  search?: string;
}

export type JobOrder =
  | "score_desc"
  | "scraped_asc"
  | "last_checked_asc"
  | "interest_then_score"
  | "application_priority";

const ORDER_SQL: Record<JobOrder, string> = {
  score_desc: "resume_score DESC, scraped_at DESC, job_id ASC",
  scraped_asc: "scraped_at ASC, job_id ASC",
  last_checked_asc: "last_checked ASC, job_id ASC",
  interest_then_score: `CASE
      WHEN is_interested = 1 THEN 1
      WHEN is_interested IS NULL THEN 2
      ELSE 3
    END ASC, resume_score DESC, job_id ASC`,
  application_priority: `CASE status
      WHEN 'offer' THEN 1
      WHEN 'interviewing' THEN 2
      WHEN 'applied' THEN 3
      ELSE 4
    END ASC, application_date DESC, job_id ASC`,
};

export interface Page {
  limit: number;
  offset?: number;
}

export interface JobPatch {
  status?: JobStatus;
  /** Moves status to `to` only when it currently equals `from`. */
  advanceStatus?: { from: JobStatus; to: JobStatus };
  jobState?: JobState;
  isActive?: boolean;
  isInterested?: Interest;
  resumeScore?: number;
  resumeScoreStage?: ScoreStage;
  customizedResumeId?: number;
  applicationDate?: string;
  lastChecked?: string;
  notes?: string | null;
  descriptionMd?: string;
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => "?").join(", ");
}

export function buildWhere(filter: JobFilter): {
  clause: string;
  params: SqlValue[];
} {
  const conditions: string[] = [];
  const params: SqlValue[] = [];

  if (filter.status) {
    if (filter.status.length === 0) {
      conditions.push("0");
    } else {
      conditions.push(`status IN (${placeholders(filter.status)})`);
      params.push(...filter.status);
    }
  }

  if (filter.statusNotIn && filter.statusNotIn.length > 0) {
    conditions.push(`status NOT IN (${placeholders(filter.statusNotIn)})`);
    params.push(...filter.statusNotIn);
  }

  if (filter.jobState) {
    conditions.push("job_state = ?");
    params.push(filter.jobState);
  }

  if (filter.isActive !== undefined) {
    conditions.push("is_active = ?");
    params.push(filter.isActive ? 1 : 0);
  }

  if (filter.scored !== undefined) {
    conditions.push(
      filter.scored ? "resume_score IS NOT NULL" : "resume_score IS NULL",
    );
  }

  if (filter.minScore !== undefined) {
    conditions.push("resume_score >= ?");
    params.push(filter.minScore);
  }

  if (filter.maxScore !== undefined) {
    conditions.push("resume_score <= ?");
    params.push(filter.maxScore);
  }

  if (filter.resumeScoreStage) {
    conditions.push("resume_score_stage = ?");
    params.push(filter.resumeScoreStage);
  }

  if (filter.hasCustomizedResume !== undefined) {
    conditions.push(
      filter.hasCustomizedResume
        ? "customized_resume_id IS NOT NULL"
        : "customized_resume_id IS NULL",
    );
  }

  if (filter.customizedResumeLinked) {
    conditions.push(
      `EXISTS (
        SELECT 1 FROM customized_resumes cr
        WHERE cr.id = jobs.customized_resume_id AND cr.resume_link IS NOT NULL
      )`,
    );
  }

  if (filter.interest) {
    const parts: string[] = [];
    for (const value of filter.interest) {
      if (value === "yes") parts.push("is_interested = 1");
      else if (value === "no") parts.push("is_interested = 0");
      else parts.push("is_interested IS NULL");
    }
    conditions.push(parts.length > 0 ? `(${parts.join(" OR ")})` : "0");
  }

  if (filter.hasApplicationDate !== undefined) {
    conditions.push(
      filter.hasApplicationDate
        ? "application_date IS NOT NULL"
        : "application_date IS NULL",
    );
  }

  if (filter.scrapedBefore) {
    conditions.push("scraped_at < ?");
    params.push(filter.scrapedBefore);
  }

  if (filter.lastCheckedBefore) {
    conditions.push("last_checked < ?");
    params.push(filter.lastCheckedBefore);
  }

  if (filter.description !== undefined) {
    conditions.push("description = ?");
    params.push(filter.description);
  }

  if (filter.hasDescription !== undefined) {
    conditions.push(
      filter.hasDescription ? "description IS NOT NULL" : "description IS NULL",
    );
  }

  if (filter.hasDescriptionMd !== undefined) {
    conditions.push(
      filter.hasDescriptionMd ? "description_md IS NOT NULL" : "description_md IS NULL",
    );
  }

  if (filter.provider) {
    conditions.push("provider = ?");
    params.push(filter.provider);
  }

  if (filter.search) {
    conditions.push("(job_title LIKE ? OR company LIKE ?)");
    const pattern = `%${filter.search}%`;
    params.push(pattern, pattern);
  }

  return {
    clause: conditions.length > 0 ? conditions.join(" AND ") : "1",
    params,
  };
}

export function buildSet(patch: JobPatch): {
  clause: string;
  params: SqlValue[];
} {
  const sets: string[] = [];
  const params: SqlValue[] = [];

  if (patch.status !== undefined && patch.advanceStatus !== undefined) {
    throw new Error("A patch cannot both set and advance status");
  }

  if (patch.status !== undefined) {
    sets.push("status = ?");
    params.push(patch.status);
  }
  if (patch.advanceStatus !== undefined) {
    sets.push("status = CASE WHEN status = ? THEN ? ELSE status END");
    params.push(patch.advanceStatus.from, patch.advanceStatus.to);
  }
  if (patch.jobState !== undefined) {
    sets.push("job_state = ?");
    params.push(patch.jobState);
  }
  if (patch.isActive !== undefined) {
    sets.push("is_active = ?");
    params.push(patch.isActive ? 1 : 0);
  }
  if (patch.isInterested !== undefined) {
    sets.push("is_interested = ?");
    params.push(interestToDb(patch.isInterested));
  }
  if (patch.resumeScore !== undefined) {
    sets.push("resume_score = ?");
    params.push(patch.resumeScore);
  }
  if (patch.resumeScoreStage !== undefined) {
    sets.push("resume_score_stage = ?");
    params.push(patch.resumeScoreStage);
  }
  if (patch.customizedResumeId !== undefined) {
    sets.push("customized_resume_id = ?");
    params.push(patch.customizedResumeId);
  }
  if (patch.applicationDate !== undefined) {
    sets.push("application_date = ?");
    params.push(patch.applicationDate);
  }
  if (patch.lastChecked !== undefined) {
    sets.push("last_checked = ?");
    params.push(patch.lastChecked);
  }
  if (patch.notes !== undefined) {
    sets.push("notes = ?");
    params.push(patch.notes);
  }
  if (patch.descriptionMd !== undefined) {
    sets.push("description_md = ?");
    params.push(patch.descriptionMd);
  }

  if (sets.length === 0) {
    throw new Error("Empty job patch");
  }

  return { clause: sets.join(", "), params };
}

const JOB_COLUMNS = `job_id, company, job_title, level, location, description,
  description_md, provider, posted_at, status, job_state, is_active, is_interested,
  resume_score, resume_score_stage, customized_resume_id, application_date,
  notes, scraped_at, last_checked`;

const PROFILE_COLUMNS = `name, email, phone, location, summary,
  skills_json, education_json, experience_json, projects_json,
  certifications_json, languages_json, links_json`;

/**
 * Typed access to the job store. Every state change goes through
 * `conditionalUpdate`, which only writes when the guard still holds.
 */
export class StoreGateway {
  constructor(private readonly db: SqliteDatabase) {}

  // Jobs

  getById(jobId: string): Job | null {
    const row = this.db
      .prepare<[string], JobRow>(`SELECT ${JOB_COLUMNS} FROM jobs WHERE job_id = ?`)
      .get(jobId);
    return row ? toJob(row) : null;
  }

  upsertJob(posting: RawPosting, now: string): "inserted" | "updated" {
    const upsert = this.db.transaction((): "inserted" | "updated" => {
      const existing = this.db
        .prepare<[string], { job_id: string }>(
          "SELECT job_id FROM jobs WHERE job_id = ?",
        )
        .get(posting.jobId);

      // Scoring, interest and workflow columns are never in the update list
      this.db
        .prepare(
          `INSERT INTO jobs (
            job_id, company, job_title, level, location, description,
            provider, posted_at, status, job_state, is_active,
            resume_score_stage, scraped_at, last_checked
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'new', 'new', 1, 'initial', ?, ?)
          ON CONFLICT(job_id) DO UPDATE SET
            company = COALESCE(excluded.company, jobs.company),
            job_title = COALESCE(excluded.job_title, jobs.job_title),
            level = COALESCE(excluded.level, jobs.level),
            location = COALESCE(excluded.location, jobs.location),
            description_md = CASE
              WHEN excluded.description IS NOT NULL
                AND excluded.description IS NOT jobs.description THEN NULL
              ELSE jobs.description_md
            END,
            description = COALESCE(excluded.description, jobs.description),
            provider = COALESCE(excluded.provider, jobs.provider),
            posted_at = COALESCE(excluded.posted_at, jobs.posted_at),
            last_checked = excluded.last_checked`,
        )
        .run(
          posting.jobId,
          posting.company,
          posting.title,
          posting.level,
          posting.location,
          posting.description,
          posting.provider,
          posting.postedAt,
          now,
          now,
        );

      return existing ? "updated" : "inserted";
    });

    return upsert();
  }

  conditionalUpdate(jobId: string, guard: JobFilter, patch: JobPatch): boolean {
    const set = buildSet(patch);
    const where = buildWhere(guard);
    const result = this.db
      .prepare<SqlValue[]>(
        `UPDATE jobs SET ${set.clause} WHERE job_id = ? AND ${where.clause}`,
      )
      .run(...set.params, jobId, ...where.params);
    return result.changes === 1;
  }

  query(filter: JobFilter, order: JobOrder, page: Page): Job[] {
    const where = buildWhere(filter);
    const rows = this.db
      .prepare<SqlValue[], JobRow>(
        `SELECT ${JOB_COLUMNS}
         FROM jobs
         WHERE ${where.clause}
         ORDER BY ${ORDER_SQL[order]}
         LIMIT ? OFFSET ?`,
      )
      .all(...where.params, page.limit, page.offset ?? 0);
    return rows.map(toJob);
  }

  count(filter: JobFilter = {}): number {
    const where = buildWhere(filter);
    const row = this.db
      .prepare<SqlValue[], { count: number }>(
        `SELECT COUNT(*) as count FROM jobs WHERE ${where.clause}`,
      )
      .get(...where.params);
    return row?.count ?? 0;
  }

  getKnownJobIds(provider?: string): Set<string> {
    const where = buildWhere({ isActive: true, provider });
    const rows = this.db
      .prepare<SqlValue[], { job_id: string }>(
        `SELECT job_id FROM jobs WHERE ${where.clause}`,
      )
      .all(...where.params);
    return new Set(rows.map((r) => r.job_id));
  }

  countByStatus(): Record<string, number> {
    const rows = this.db
      .prepare<[], { status: string; count: number }>(
        "SELECT status, COUNT(*) as count FROM jobs GROUP BY status ORDER BY status",
      )
      .all();
    const counts: Record<string, number> = {};
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  // Resumes

  getResume(email: string): StoredResume | null {
    const row = this.db
      .prepare<[string], ResumeRow>(
        `SELECT id, ${PROFILE_COLUMNS}, parsed_at FROM resumes WHERE email = ?`,
      )
      .get(normalizeEmail(email));
    if (!row) return null;
    return { ...toProfile(row), id: row.id, parsedAt: row.parsed_at };
  }

  upsertResume(profile: ResumeProfile, now: string): number {
    const row = this.db
      .prepare<SqlValue[], { id: number }>(
        `INSERT INTO resumes (${PROFILE_COLUMNS}, parsed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(email) DO UPDATE SET
           name = excluded.name,
           phone = excluded.phone,
           location = excluded.location,
           summary = excluded.summary,
           skills_json = excluded.skills_json,
           education_json = excluded.education_json,
           experience_json = excluded.experience_json,
           projects_json = excluded.projects_json,
           certifications_json = excluded.certifications_json,
           languages_json = excluded.languages_json,
           links_json = excluded.links_json,
           parsed_at = excluded.parsed_at
         RETURNING id`,
      )
      .get(...profileParams({ ...profile, email: normalizeEmail(profile.email) }), now);
    if (!row) {
      throw new StoreUnavailableError(`Resume upsert for ${profile.email} returned no row`);
    }
    return row.id;
  }

  // Customized Resumes

  insertCustomizedResume(draft: CustomizedResumeDraft, now: string): number {
    const result = this.db
      .prepare<SqlValue[]>(
        `INSERT INTO customized_resumes (${PROFILE_COLUMNS}, resume_link, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(...profileParams(draft), draft.resumeLink, now, now);
    return Number(result.lastInsertRowid);
  }

  getCustomizedResume(id: number): CustomizedResume | null {
    const row = this.db
      .prepare<[number], CustomizedResumeRow>(
        `SELECT id, ${PROFILE_COLUMNS}, resume_link, created_at, updated_at
         FROM customized_resumes WHERE id = ?`,
      )
      .get(id);
    if (!row) return null;
    return {
      ...toProfile(row),
      id: row.id,
      resumeLink: row.resume_link,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  deleteCustomizedResume(id: number): boolean {
    const result = this.db
      .prepare<[number]>("DELETE FROM customized_resumes WHERE id = ?")
      .run(id);
    return result.changes === 1;
  }

  // Run Log

  createRun(runType: RunType, dryRun: boolean): number {
    const result = this.db
      .prepare<[string, number]>(
        "INSERT INTO run_log (run_type, dry_run) VALUES (?, ?)",
      )
      .run(runType, dryRun ? 1 : 0);
    return Number(result.lastInsertRowid);
  }

  finishRun(runId: number, status: "completed" | "failed", stats: RunStats): void {
    this.db
      .prepare<SqlValue[]>(
        `UPDATE run_log SET
          finished_at = strftime('%Y-%m-%dT%H:%M:%fZ', 'now'),
          status = ?,
          processed = ?,
          succeeded = ?,
          failed = ?,
          skipped = ?,
          errors = ?
        WHERE id = ?`,
      )
      .run(
        status,
        stats.processed,
        stats.succeeded,
        stats.failed,
        stats.skipped,
        stats.errors.length > 0 ? JSON.stringify(stats.errors) : null,
        runId,
      );
  }

  getLastRun(runType?: RunType): RunLogRow | null {
    const row = runType
      ? this.db
          .prepare<[string], RunLogRow>(
            "SELECT * FROM run_log WHERE run_type = ? ORDER BY id DESC LIMIT 1",
          )
          .get(runType)
      : this.db
          .prepare<[], RunLogRow>("SELECT * FROM run_log ORDER BY id DESC LIMIT 1")
          .get();
    return row ?? null;
  }

  getLastSuccessfulRunTime(runType: RunType): string | null {
    const row = this.db
      .prepare<[string], { finished_at: string }>(
        `SELECT finished_at FROM run_log
         WHERE run_type = ? AND status = 'completed'
         ORDER BY finished_at DESC LIMIT 1`,
      )
      .get(runType);
    return row?.finished_at ?? null;
  }

  // Activity Check Failures

  recordCheckFailure(
    jobId: string,
    attempts: number,
    error: string,
    now: string,
  ): void {
    this.db
      .prepare<SqlValue[]>(
        `INSERT INTO activity_check_failures (job_id, attempts, error, failed_at)
         VALUES (?, ?, ?, ?)`,
      )
      .run(jobId, attempts, error, now);
  }

  getCheckFailures(jobId: string): CheckFailureRow[] {
    return this.db
      .prepare<[string], CheckFailureRow>(
        `SELECT id, job_id, attempts, error, failed_at
         FROM activity_check_failures
         WHERE job_id = ?
         ORDER BY id ASC`,
      )
      .all(jobId);
  }

  countCheckFailuresSince(since: string): number {
    const row = this.db
      .prepare<[string], { count: number }>(
        "SELECT COUNT(*) as count FROM activity_check_failures WHERE failed_at >= ?",
      )
      .get(since);
    return row?.count ?? 0;
  }
}
