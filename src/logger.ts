import { existsSync, mkdirSync, appendFileSync } from "fs";
import { fileURLToPath } from "url";

const LOGS_DIR = fileURLToPath(new URL("../logs", import.meta.url));
const LOG_FILE = fileURLToPath(new URL("../logs/app.log", import.meta.url));
const LOG_TO_FILE = process.env.LOG_TO_FILE !== "false";
const LOG_TIMEZONE = process.env.TZ || "UTC";

if (LOG_TO_FILE && !existsSync(LOGS_DIR)) {
  mkdirSync(LOGS_DIR, { recursive: true });
}

type LogLevel = "info" | "warn" | "error" | "debug";

const LOG_COLORS: Record<LogLevel, string> = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
};

const RESET = "\x1b[0m";

function getTimestamp(): string {
  return new Date().toLocaleString("en-CA", {
    timeZone: LOG_TIMEZONE,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = getTimestamp();
  const extraArgs =
    args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${extraArgs}`;
}

function writeToFile(entry: string): void {
  if (!LOG_TO_FILE) return;
  try {
    appendFileSync(LOG_FILE, entry + "\n", "utf-8");
  } catch {
    // Console output already carries the entry
  }
}

function log(level: LogLevel, message: string, ...args: unknown[]): void {
  const entry = formatLogEntry(level, message, ...args);
  const color = LOG_COLORS[level];

  if (level === "error") {
    console.error(`${color}${entry}${RESET}`);
  } else if (level === "warn") {
    console.warn(`${color}${entry}${RESET}`);
  } else {
    console.log(`${color}${entry}${RESET}`);
  }

  writeToFile(entry);
}

export const logger = {
  info: (message: string, ...args: unknown[]) => log("info", message, ...args),
  warn: (message: string, ...args: unknown[]) => log("warn", message, ...args),
  error: (message: string, ...args: unknown[]) =>
    log("error", message, ...args),
  debug: (message: string, ...args: unknown[]) =>
    log("debug", message, ...args),
};
