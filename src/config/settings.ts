import { z } from "zod";

import { ConfigurationError } from "../errors.js";
import type { LogLevel } from "../logger.js";
import { parseRedactionDirectives } from "../logger.js";
import {
  type EnvSource,
  readBool,
  readEnum,
  readInt,
  readList,
  readOptionalString,
  readString,
} from "./env.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const trackerSettingsSchema = z.object({
  baseUrl: z
    .string({ required_error: "JIRA_URL is required" })
    .url("JIRA_URL must be an absolute URL")
    .transform((value) => value.replace(/\/+$/, "")),
  username: z.string({ required_error: "JIRA_USER is required" }).min(1),
  token: z.string({ required_error: "JIRA_TOKEN is required" }).min(1),
  verifyTls: z.boolean(),
  timeoutMs: z.number().int().positive(),
  parentLinkField: z.string().regex(/^customfield_\d+$/, "JIRA_PARENT_LINK_FIELD must look like customfield_<id>"),
  screenFieldIds: z.array(z.string().min(1)),
  pageSize: z.number().int().min(1).max(1000),
});

const databaseSettingsSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  database: z.string().min(1),
  user: z.string().min(1),
  password: z.string().optional(),
});

const settingsSchema = z.object({
  tracker: trackerSettingsSchema,
  database: databaseSettingsSchema,
  concurrency: z.number().int().min(1).max(32),
  retry: z
    .object({
      attempts: z.number().int().min(1).max(10),
      baseDelayMs: z.number().int().min(0),
      maxDelayMs: z.number().int().min(0),
    })
    .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
      message: "PROVISION_RETRY_MAX_MS must not be lower than PROVISION_RETRY_BASE_MS",
    }),
  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]),
    file: z.string().min(1).nullable(),
    redactionEnabled: z.boolean(),
    redactTokens: z.array(z.string()),
  }),
});

export type TrackerSettings = z.infer<typeof trackerSettingsSchema>;
export type DatabaseSettings = z.infer<typeof databaseSettingsSchema>;
export type Settings = z.infer<typeof settingsSchema>;

/**
 * Assembles the run configuration from {@link source}. The returned value is
 * passed explicitly to the orchestrator and the clients; nothing below the CLI
 * reads the environment.
 *
 * @throws ConfigurationError when a required variable is missing or invalid.
 */
export function loadSettings(source: EnvSource): Settings {
  const redaction = parseRedactionDirectives(readString(source, "PROVISION_LOG_REDACT", "on"));
  const token = readOptionalString(source, "JIRA_TOKEN");
  const password = readOptionalString(source, "DB_PASSWORD");

  const candidate = {
    tracker: {
      baseUrl: readOptionalString(source, "JIRA_URL"),
      username: readOptionalString(source, "JIRA_USER"),
      token,
      verifyTls: readBool(source, "JIRA_VERIFY_SSL", true),
      timeoutMs: readInt(source, "JIRA_TIMEOUT_MS", 30_000, { min: 1 }),
      parentLinkField: readString(source, "JIRA_PARENT_LINK_FIELD", "customfield_10108"),
      screenFieldIds: readList(source, "JIRA_SCREEN_FIELDS"),
      pageSize: readInt(source, "JIRA_PAGE_SIZE", 50, { min: 1, max: 1000 }),
    },
    database: {
      host: readString(source, "DB_HOST", "localhost"),
      port: readInt(source, "DB_PORT", 5432, { min: 1, max: 65535 }),
      database: readString(source, "DB_NAME", "governance"),
      user: readString(source, "DB_USER", "postgres"),
      ...(password === undefined ? {} : { password }),
    },
    concurrency: readInt(source, "PROVISION_CONCURRENCY", 4, { min: 1, max: 32 }),
    retry: {
      attempts: readInt(source, "PROVISION_RETRY_ATTEMPTS", 4, { min: 1, max: 10 }),
      baseDelayMs: readInt(source, "PROVISION_RETRY_BASE_MS", 250, { min: 0 }),
      maxDelayMs: readInt(source, "PROVISION_RETRY_MAX_MS", 10_000, { min: 0 }),
    },
    logging: {
      level: readEnum(source, "PROVISION_LOG_LEVEL", LOG_LEVELS, "info"),
      file: readOptionalString(source, "PROVISION_LOG_FILE") ?? null,
      redactionEnabled: redaction.enabled,
      // The tracker token is always scrubbed from free-form strings.
      redactTokens: [...redaction.tokens, ...(token === undefined ? [] : [token])],
    },
  };

  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`invalid configuration (${issues.join("; ")})`, { issues });
  }
  return parsed.data;
}

/** Copy of {@link settings} safe to print: secrets are masked. */
export function describeSettings(settings: Settings): Record<string, unknown> {
  return {
    tracker: { ...settings.tracker, token: maskSecret(settings.tracker.token) },
    database: {
      ...settings.database,
      password: settings.database.password === undefined ? null : maskSecret(settings.database.password),
    },
    concurrency: settings.concurrency,
    retry: settings.retry,
    logging: {
      level: settings.logging.level,
      file: settings.logging.file,
      redactionEnabled: settings.logging.redactionEnabled,
    },
  };
}

/** Keeps the last four characters of long secrets, masks short ones entirely. */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return "****";
  }
  return `****${secret.slice(-4)}`;
}
