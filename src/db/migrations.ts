import type BetterSqlite3 from "better-sqlite3";
import { ADD_DESCRIPTION_MD_SQL, CREATE_CHECK_FAILURES_SQL, CREATE_TABLES_SQL } from "./schema";
import { logger } from "../logger";

interface Migration {
  id: string;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    id: "0001_init_schema",
    description: "Jobs, resumes, customized resumes and run log",
    sql: CREATE_TABLES_SQL,
  },
  {
    id: "0002_activity_check_failures",
    description: "Record exhausted activity rechecks for operator review",
    sql: CREATE_CHECK_FAILURES_SQL,
  },
  {
    id: "0003_jobs_description_md",
    description: "Markdown rendering of job descriptions",
    sql: ADD_DESCRIPTION_MD_SQL,
  },
];

function ensureMigrationTable(db: BetterSqlite3.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);
}

function isApplied(db: BetterSqlite3.Database, id: string): boolean {
  const row = db
    .prepare<[string], { id: string }>(
      "SELECT id FROM _migrations WHERE id = ? LIMIT 1",
    )
    .get(id);
  return !!row;
}

export function runMigrations(db: BetterSqlite3.Database): number {
  ensureMigrationTable(db);
  let applied = 0;

  for (const migration of MIGRATIONS) {
    if (isApplied(db, migration.id)) {
      continue;
    }

    logger.info(`Applying migration ${migration.id}: ${migration.description}`);
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare("INSERT INTO _migrations (id, description) VALUES (?, ?)").run(
        migration.id,
        migration.description,
      );
    });

    try {
      apply();
      applied++;
      logger.info(`Applied migration ${migration.id}`);
    } catch (error) {
      logger.error(`Migration ${migration.id} failed:`, error);
      throw error;
    }
  }

  return applied;
}

export const MIGRATION_IDS = MIGRATIONS.map((m) => m.id);
