import { join } from "path";
import { getDb, type SqliteDatabase } from "./db";
import { StoreGateway } from "./db/operations";
import { LifecycleEngine } from "./lifecycle";
import { createAIClient } from "./ai";
import { AIScoringOracle } from "./scoring";
import { AIResumeCustomizer } from "./customization";
import { AIDescriptionFormatter } from "./formatting";
import { loadResumeText, parseResume } from "./resume/parser";
import { createActivityChecker, createSource } from "./connectors";
import {
  runCustomization,
  runDescriptionFormatting,
  runIngestion,
  runLifecycle,
  runResumeParsing,
  runScoring,
} from "./pipeline";
import { CONFIG_DIR, type AppConfig } from "./config";
import type { RunResult, RunType } from "./types";

export interface Services {
  config: AppConfig;
  db: SqliteDatabase;
  store: StoreGateway;
  engine: LifecycleEngine;
}

export type Triggers = Record<RunType, () => Promise<RunResult>>;

export const RESUME_PATH = join(CONFIG_DIR, "resume.md");

export function createServices(config: AppConfig): Services {
  const db = getDb(config.env.dbPath);
  const store = new StoreGateway(db);
  return { config, db, store, engine: new LifecycleEngine(store) };
}

/** Wires every trigger to its production adapters. */
export function createTriggers(services: Services): Triggers {
  const { config, store, engine } = services;
  const { env, search, lifecycle } = config;
  const dryRun = env.dryRun;

  const client = createAIClient(env, {
    maxRetries: lifecycle.scoring.maxRetries,
    backoffStartMs: lifecycle.scoring.backoffStartMs,
    timeoutMs: lifecycle.scoring.timeoutMs,
  });

  return {
    ingest: () =>
      runIngestion({ store, engine, dryRun, source: createSource(search), search }),

    format: () =>
      runDescriptionFormatting({
        store,
        engine,
        dryRun,
        formatter: new AIDescriptionFormatter(client),
        settings: lifecycle.formatting,
        requestDelayMs: env.aiRequestDelayMs,
      }),

    score: () =>
      runScoring({
        store,
        engine,
        dryRun,
        oracle: new AIScoringOracle(client),
        candidateEmail: env.candidateEmail,
        settings: lifecycle.scoring,
        requestDelayMs: env.aiRequestDelayMs,
      }),

    manage: () =>
      runLifecycle({
        store,
        engine,
        dryRun,
        checker: createActivityChecker(search.provider, lifecycle.activity.timeoutMs),
        activity: lifecycle.activity,
        expiry: lifecycle.expiry,
      }),

    customize: () =>
      runCustomization({
        store,
        engine,
        dryRun,
        customizer: new AIResumeCustomizer(client, {
          artifactsDir: lifecycle.customization.artifactsDir,
          writeMarkdown: lifecycle.customization.writeMarkdown,
        }),
        candidateEmail: env.candidateEmail,
        settings: lifecycle.customization,
      }),

    "parse-resume": () =>
      runResumeParsing({
        store,
        dryRun,
        loadText: () => loadResumeText(RESUME_PATH),
        parse: (text) => parseResume(client, text, env.candidateEmail || undefined),
      }),
  };
}
