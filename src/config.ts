/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";

import { ConfigError } from "./core/exceptions.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import type { RecordSource } from "./source/backend.js";
import { FileRecordSource } from "./source/file.js";
import { HttpRecordSource } from "./source/http.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const SourceConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("http"),
    config: z.object({
      url: z.string().url(),
      apiKey: z.string().optional(),
      method: z.enum(["GET", "POST"]).default("POST"),
      timeoutMs: z.number().int().positive().default(30_000),
      headers: z.record(z.string()).optional(),
    }),
  }),
  z.object({
    provider: z.literal("file"),
    config: z.object({ path: z.string().min(1) }),
  }),
]);

const DbConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("sqlite"),
    config: z.object({ path: z.string().default(":memory:") }).default({}),
  }),
  z.object({
    provider: z.literal("postgres"),
    config: z.object({ connectionString: z.string().min(1) }),
  }),
]);

export const PipelineConfigSchema = z.object({
  startPage: z.number().int().positive().default(1),
  pageSize: z.number().int().positive().default(100),
  maxPages: z.number().int().positive().default(1000),
  /** Tries per page; kept small on purpose. */
  attempts: z.number().int().min(1).max(10).default(3),
  retryDelayMs: z.number().int().min(0).default(250),
  maxConsecutiveFailures: z.number().int().positive().default(3),
  batchSize: z.number().int().positive().default(500),
  startDate: IsoDate.optional(),
  endDate: IsoDate.optional(),
});

export const ConfigSchema = z.object({
  source: SourceConfigSchema.optional(),
  db: DbConfigSchema.default({ provider: "sqlite", config: {} }),
  pipeline: PipelineConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type DbConfig = z.infer<typeof DbConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Backend factories
// ---------------------------------------------------------------------------

export function buildSource(config: SourceConfig): RecordSource {
  switch (config.provider) {
    case "http":
      return new HttpRecordSource(config.config);
    case "file":
      return new FileRecordSource(config.config.path);
  }
}

export function buildDb(config: DbConfig): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.config.path);
    case "postgres":
      return new PostgresBackend(config.config.connectionString);
  }
}

// ---------------------------------------------------------------------------
// Environment → raw config
// ---------------------------------------------------------------------------

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

function postgresUrl(env: NodeJS.ProcessEnv): string | undefined {
  if (env.DATABASE_URL) return env.DATABASE_URL;
  if (!env.DB_HOST && !env.DB_NAME) return undefined;
  const user = encodeURIComponent(env.DB_USER ?? "postgres");
  const password = env.DB_PASSWORD ? `:${encodeURIComponent(env.DB_PASSWORD)}` : "";
  const host = env.DB_HOST ?? "localhost";
  const port = env.DB_PORT ?? "5432";
  return `postgres://${user}${password}@${host}:${port}/${env.DB_NAME ?? "postgres"}`;
}

/**
 * Raw config from environment variables. The result still goes through
 * `parseConfig`, so bad values are reported there.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};

  if (env.API_URL) {
    raw.source = {
      provider: "http",
      config: { url: env.API_URL, apiKey: env.API_KEY || undefined },
    };
  } else if (env.SOURCE_FILE) {
    raw.source = { provider: "file", config: { path: env.SOURCE_FILE } };
  }

  const pgUrl = postgresUrl(env);
  if (pgUrl) {
    raw.db = { provider: "postgres", config: { connectionString: pgUrl } };
  } else if (env.SQLITE_PATH) {
    raw.db = { provider: "sqlite", config: { path: env.SQLITE_PATH } };
  }

  const pipeline: Record<string, unknown> = {
    pageSize: envNumber(env.PAGE_SIZE),
    batchSize: envNumber(env.BATCH_SIZE),
    startDate: env.START_DATE || undefined,
    endDate: env.END_DATE || undefined,
  };
  raw.pipeline = Object.fromEntries(
    Object.entries(pipeline).filter(([, v]) => v !== undefined),
  );

  return raw;
}
