/**
 * Process configuration. Loaded once at startup into a frozen AppConfig and passed down;
 * nothing below src/server.ts reads process.env or argv.
 */

import { config as loadDotenv } from "dotenv";
import { parseArgs } from "node:util";
import { z } from "zod";
import { DEFAULT_BASE_URL, DEFAULT_LANGUAGE } from "../../services/news/article.fetcher.ts";
import { DEFAULT_PAGE_SIZE } from "../../services/news/pagination.ts";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const EnvSchema = z.object({
  NEWS_API_KEY: z.string().min(1, "is required (or pass --apikey)"),
  NEWS_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  NEWS_API_LANGUAGE: z.string().min(2).default(DEFAULT_LANGUAGE),
  NEWS_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PORT: z.coerce.number().int().min(0).max(65_535).default(2000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AppConfig {
  newsApi: {
    apiKey: string;
    baseUrl: string;
    language: string;
    pageSize: number;
    timeoutMs: number;
  };
  port: number;
  host: string;
  logLevel: (typeof LOG_LEVELS)[number];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/** --apikey <key> overrides NEWS_API_KEY. Unknown flags are ignored. */
function readArgs(argv: string[]): { apiKey?: string } {
  const { values } = parseArgs({
    args: argv,
    options: { apikey: { type: "string" } },
    strict: false,
    allowPositionals: true,
  });
  return typeof values.apikey === "string" ? { apiKey: values.apikey } : {};
}

/** Validate env + argv into an AppConfig; throws ConfigError listing every problem. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  argv: string[] = process.argv.slice(2)
): AppConfig {
  const args = readArgs(argv);
  const parsed = EnvSchema.safeParse({
    ...env,
    ...(args.apiKey !== undefined ? { NEWS_API_KEY: args.apiKey } : {}),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((e) => `${e.path.length ? e.path.join(".") : "env"}: ${e.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return Object.freeze({
    newsApi: Object.freeze({
      apiKey: e.NEWS_API_KEY,
      baseUrl: e.NEWS_API_BASE_URL,
      language: e.NEWS_API_LANGUAGE,
      pageSize: DEFAULT_PAGE_SIZE,
      timeoutMs: e.NEWS_API_TIMEOUT_MS,
    }),
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
  });
}

/** Read .env into process.env (existing variables win). */
export function loadEnvFile(): void {
  loadDotenv();
}
