import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { runMigrations } from "./migrations";
import { logger } from "../logger";

export type SqliteDatabase = Database.Database;

const EXPECTED_TABLES = [
  "jobs",
  "resumes",
  "customized_resumes",
  "run_log",
  "activity_check_failures",
  "_migrations",
];

export function openDatabase(path: string): SqliteDatabase {
  const inMemory = path === ":memory:";

  if (!inMemory) {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
      logger.info(`Created data directory: ${dataDir}`);
    }
  }

  const db = new Database(path);

  // WAL lets a scheduled run write while another one reads
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  return db;
}

export function initializeDatabase(db: SqliteDatabase): void {
  logger.info("Initializing database...");

  try {
    runMigrations(db);

    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all();

    const tableNames = tables
      .map((t) => t.name)
      .filter((n) => n !== "sqlite_sequence");
    logger.info(
      `Database initialized with ${tableNames.length} tables: ${tableNames.join(", ")}`,
    );

    const missing = EXPECTED_TABLES.filter((t) => !tableNames.includes(t));
    if (missing.length > 0) {
      logger.warn(`Missing tables after migration: ${missing.join(", ")}`);
    }
  } catch (error) {
    logger.error("Failed to initialize database:", error);
    throw error;
  }
}

export function checkDatabaseIntegrity(db: SqliteDatabase): {
  ok: boolean;
  result: string;
} {
  try {
    const result = db
      .prepare<[], { integrity_check: string }>("PRAGMA integrity_check")
      .get();
    const isOk = result?.integrity_check === "ok";

    if (!isOk) {
      logger.error(
        `Database integrity check FAILED: ${result?.integrity_check}`,
      );
    } else {
      logger.info("Database integrity check passed");
    }

    return { ok: isOk, result: result?.integrity_check ?? "unknown" };
  } catch (error) {
    logger.error("Database integrity check threw error:", error);
    return { ok: false, result: String(error) };
  }
}

export function getDatabaseStats(db: SqliteDatabase): Record<string, number> {
  const stats: Record<string, number> = {};

  for (const table of EXPECTED_TABLES) {
    try {
      const result = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`)
        .get();
      stats[table] = result?.count ?? 0;
    } catch {
      stats[table] = -1; // Table doesn't exist
    }
  }

  return stats;
}

export function quickHealthCheck(db: SqliteDatabase): boolean {
  try {
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return result?.ok === 1;
  } catch {
    return false;
  }
}

let _db: SqliteDatabase | null = null;

export function getDb(path: string): SqliteDatabase {
  if (!_db) {
    _db = openDatabase(path);
    initializeDatabase(_db);
  }
  return _db;
}
