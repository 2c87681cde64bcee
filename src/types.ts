export type JobStatus =
  | "new"
  | "scored"
  | "applied"
  | "interviewing"
  | "offer"
  | "rejected"
  | "expired"
  | "archived";

export const JOB_STATUSES: readonly JobStatus[] = [
  "new",
  "scored",
  "applied",
  "interviewing",
  "offer",
  "rejected",
  "expired",
  "archived",
];

// Pre-application statuses still owned by the automated pipeline
export const OPEN_STATUSES: readonly JobStatus[] = ["new", "scored"];

export const TERMINAL_STATUSES: readonly JobStatus[] = ["expired", "archived"];

// A human decision is still pending on these
export const IN_PROGRESS_STATUSES: readonly JobStatus[] = [
  "applied",
  "interviewing",
  "offer",
];

export type JobState = "new" | "done";

export type ScoreStage = "initial" | "custom";

export type Interest = "yes" | "no" | "unknown";

export interface Job {
  jobId: string;
  company: string | null;
  title: string | null;
  level: string | null;
  location: string | null;
  description: string | null;
  /** Markdown rendering of `description`, cleared when the description changes. */
  descriptionMd: string | null;
  provider: string | null;
  postedAt: string | null;
  status: JobStatus;
  jobState: JobState;
  isActive: boolean;
  isInterested: Interest;
  resumeScore: number | null;
  resumeScoreStage: ScoreStage;
  customizedResumeId: number | null;
  applicationDate: string | null;
  notes: string | null;
  scrapedAt: string;
  lastChecked: string;
}

/** Posting as produced by a source, before it becomes a tracked Job. */
export interface RawPosting {
  jobId: string;
  provider: string;
  company: string | null;
  title: string | null;
  level: string | null;
  location: string | null;
  description: string | null;
  postedAt: string | null;
}

// Resume profile

export interface Education {
  degree: string;
  fieldOfStudy: string | null;
  institution: string;
  startYear: string | null;
  endYear: string | null;
}

export interface Experience {
  jobTitle: string;
  company: string;
  location: string | null;
  startDate: string | null;
  endDate: string | null;
  description: string | null;
}

export interface Project {
  name: string;
  description: string | null;
  technologies: string[];
}

export interface Certification {
  name: string;
  issuer: string | null;
  year: string | null;
}

export interface ResumeLinks {
  linkedin: string | null;
  github: string | null;
  portfolio: string | null;
}

export interface ResumeProfile {
  name: string;
  email: string;
  phone: string | null;
  location: string | null;
  summary: string | null;
  skills: string[];
  education: Education[];
  experience: Experience[];
  projects: Project[];
  certifications: Certification[];
  languages: string[];
  links: ResumeLinks | null;
}

export interface StoredResume extends ResumeProfile {
  id: number;
  parsedAt: string;
}

export interface CustomizedResumeDraft extends ResumeProfile {
  resumeLink: string;
}

export interface CustomizedResume extends CustomizedResumeDraft {
  id: number;
  createdAt: string;
  updatedAt: string;
}

// Runs

export type RunType = "ingest" | "format" | "score" | "manage" | "customize" | "parse-resume";

export interface RunStats {
  processed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  errors: string[];
}

export interface RunResult extends RunStats {
  runId: number;
  runType: RunType;
  status: "completed" | "failed";
  durationMs: number;
}
