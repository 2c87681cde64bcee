import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { logger } from "./logger";

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const searchConfigSchema = z.object({
  description: z.string().default(""),
  provider: z.string().min(1),
  queries: z.array(z.string().min(1)).min(1),
  location: z.string().min(1),
  geoId: z.number().int().nullable(),
  jobType: z.string(),
  postedWithin: z.string(),
  maxStart: nonNegativeInt,
  pageSize: positiveInt,
  requestTimeoutMs: positiveInt,
  maxRetries: nonNegativeInt,
  backoffStartMs: nonNegativeInt,
  delayBetweenRequestsMs: nonNegativeInt,
});

const scoringSettingsSchema = z.object({
  jobsToScorePerRun: positiveInt,
  rescoreLimit: nonNegativeInt,
  concurrency: positiveInt,
  maxRetries: nonNegativeInt,
  backoffStartMs: nonNegativeInt,
  timeoutMs: positiveInt,
});

const activitySettingsSchema = z.object({
  stalenessDays: nonNegativeInt,
  checkLimit: positiveInt,
  concurrency: positiveInt,
  timeoutMs: positiveInt,
  maxRetries: nonNegativeInt,
  retryDelayMs: nonNegativeInt,
});

const expirySettingsSchema = z
  .object({
    expiryDays: positiveInt,
    archiveDays: positiveInt,
  })
  .refine((e) => e.archiveDays >= e.expiryDays, {
    message: "archiveDays must not be shorter than expiryDays",
  });

const formattingSettingsSchema = z.object({
  limit: positiveInt,
});

const customizationSettingsSchema = z.object({
  minScore: z.number().int().min(0).max(100),
  limit: positiveInt,
  artifactsDir: z.string().min(1),
  writeMarkdown: z.boolean().default(true),
});

const scheduleSettingsSchema = z.object({
  ingest: z.string(),
  format: z.string(),
  score: z.string(),
  manage: z.string(),
  customize: z.string(),
});

const lifecycleConfigSchema = z.object({
  description: z.string().default(""),
  formatting: formattingSettingsSchema,
  scoring: scoringSettingsSchema,
  activity: activitySettingsSchema,
  expiry: expirySettingsSchema,
  customization: customizationSettingsSchema,
  schedules: scheduleSettingsSchema,
});

export type SearchConfig = z.infer<typeof searchConfigSchema>;
export type ScoringSettings = z.infer<typeof scoringSettingsSchema>;
export type ActivitySettings = z.infer<typeof activitySettingsSchema>;
export type ExpirySettings = z.infer<typeof expirySettingsSchema>;
export type FormattingSettings = z.infer<typeof formattingSettingsSchema>;
export type CustomizationSettings = z.infer<typeof customizationSettingsSchema>;
export type ScheduleSettings = z.infer<typeof scheduleSettingsSchema>;
export type LifecycleConfig = z.infer<typeof lifecycleConfigSchema>;

export interface EnvConfig {
  groqApiKey: string;
  groqModel: string;
  aiEndpoint: string;
  aiRequestDelayMs: number;
  candidateEmail: string;
  dryRun: boolean;
  timezone: string;
  nodeEnv: string;
  port: number;
  dbPath: string;
}

export interface AppConfig {
  env: EnvConfig;
  search: SearchConfig;
  lifecycle: LifecycleConfig;
}

const CONFIG_DIR = fileURLToPath(new URL("../config", import.meta.url));
const DEFAULT_DB_PATH = fileURLToPath(
  new URL("../data/jobhunt.db", import.meta.url),
);

export function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

export function stripJsonComments(raw: string): string {
  // Strip comments while preserving string contents (avoid corrupting URLs).
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match: string, comment: string | undefined) => (comment ? "" : match),
  );
}

export function loadJsonConfig<S extends z.ZodTypeAny>(
  configDir: string,
  filename: string,
  schema: S,
): z.output<S> {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new Error(`Config file not found: ${filepath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(readFileSync(filepath, "utf-8")));
  } catch (error) {
    throw new Error(`Failed to parse config file ${filename}: ${error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${filename}: ${issues}`);
  }
  return result.data;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    groqApiKey: env.GROQ_API_KEY ?? "",
    groqModel: env.GROQ_MODEL ?? "llama-3.3-70b-versatile",
    aiEndpoint:
      env.AI_ENDPOINT ?? "https://api.groq.com/openai/v1/chat/completions",
    aiRequestDelayMs: parseEnvInt(env.AI_REQUEST_DELAY_MS, 6000, 0),
    candidateEmail: env.CANDIDATE_EMAIL ?? "",
    dryRun: env.DRY_RUN === "true",
    timezone: env.TZ ?? "UTC",
    nodeEnv: env.NODE_ENV ?? "development",
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
    dbPath: env.DB_PATH || DEFAULT_DB_PATH,
  };
}

export function loadConfig(configDir: string = CONFIG_DIR): AppConfig {
  logger.info("Loading configuration...");

  const env = loadEnvConfig();
  const search = loadJsonConfig(configDir, "search.json", searchConfigSchema);
  const lifecycle = loadJsonConfig(
    configDir,
    "lifecycle.json",
    lifecycleConfigSchema,
  );

  if (!env.groqApiKey) {
    logger.warn("GROQ_API_KEY not set — scoring and customization will fail");
  }
  if (!env.candidateEmail) {
    logger.warn("CANDIDATE_EMAIL not set — no resume can be looked up");
  }
  if (env.dryRun) {
    logger.info("🧪 DRY RUN MODE — no job records will be modified");
  }

  logger.info(`Config loaded successfully:`);
  logger.info(`  - ${search.queries.length} search queries (${search.provider})`);
  logger.info(`  - Location: ${search.location}`);
  logger.info(
    `  - Expiry: ${lifecycle.expiry.expiryDays}d, archive: ${lifecycle.expiry.archiveDays}d, recheck after ${lifecycle.activity.stalenessDays}d`,
  );
  logger.info(
    `  - Scoring: ${lifecycle.scoring.jobsToScorePerRun}/run, customization threshold ${lifecycle.customization.minScore}`,
  );
  logger.info(`  - Environment: ${env.nodeEnv}`);
  logger.info(`  - Database: ${env.dbPath}`);

  return { env, search, lifecycle };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

export { CONFIG_DIR };
