import { initializeDatabase, openDatabase, type SqliteDatabase } from "./db";
import { StoreGateway } from "./db/operations";
import { LifecycleEngine } from "./lifecycle";
import type { Job, RawPosting, ResumeProfile } from "./types";

export interface TestContext {
  db: SqliteDatabase;
  store: StoreGateway;
  engine: LifecycleEngine;
}

export function createTestContext(): TestContext {
  const db = openDatabase(":memory:");
  initializeDatabase(db);
  const store = new StoreGateway(db);
  return { db, store, engine: new LifecycleEngine(store) };
}

export function daysAgo(now: Date, days: number): Date {
  return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}

export function makePosting(overrides: Partial<RawPosting> = {}): RawPosting {
  return {
    jobId: "4000000001",
    provider: "linkedin",
    company: "Acme Robotics",
    title: "Backend Engineer",
    level: "Mid-Senior level",
    location: "Singapore",
    description: "Build Node.js services backed by PostgreSQL.",
    postedAt: null,
    ...overrides,
  };
}

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    jobId: "4000000001",
    company: "Acme Robotics",
    title: "Backend Engineer",
    level: "Mid-Senior level",
    location: "Singapore",
    description: "Build Node.js services backed by PostgreSQL.",
    descriptionMd: null,
    provider: "linkedin",
    postedAt: null,
    status: "new",
    jobState: "new",
    isActive: true,
    isInterested: "unknown",
    resumeScore: null,
    resumeScoreStage: "initial",
    customizedResumeId: null,
    applicationDate: null,
    notes: null,
    scrapedAt: "2026-03-01T00:00:00.000Z",
    lastChecked: "2026-03-01T00:00:00.000Z",
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<ResumeProfile> = {}): ResumeProfile {
  return {
    name: "Alex Example",
    email: "alex@example.com",
    phone: null,
    location: "Singapore",
    summary: "Backend engineer with 4 years of TypeScript experience.",
    skills: ["TypeScript", "Node.js", "PostgreSQL"],
    education: [
      {
        degree: "B.Sc.",
        fieldOfStudy: "Computer Science",
        institution: "Example University",
        startYear: "2016",
        endYear: "2020",
      },
    ],
    experience: [
      {
        jobTitle: "Software Engineer",
        company: "Example Logistics",
        location: "Singapore",
        startDate: "Jan 2022",
        endDate: null,
        description: "Built order-tracking APIs\nMoved batch jobs to a queue",
      },
    ],
    projects: [
      {
        name: "Route Planner",
        description: "Route optimisation demo",
        technologies: ["TypeScript", "PostgreSQL"],
      },
    ],
    certifications: [],
    languages: ["English"],
    links: null,
    ...overrides,
  };
}
