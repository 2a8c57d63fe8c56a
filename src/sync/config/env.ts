import { z } from "zod";
import { ConfigError } from "@/sync/errors";

const positiveInt = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((v) => Number.parseInt(v, 10))
    .pipe(z.number().int().positive());

const envSchema = z
  .object({
    LINEAR_API_KEY: z.string().min(1, "LINEAR_API_KEY is required"),

    // One of the two must be present; a key file path wins when both are set
    GOOGLE_APPLICATION_CREDENTIALS: z.string().min(1).optional(),
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(1).optional(),

    GCAL_CALENDAR_ID: z.string().min(1).default("primary"),
    TIMEZONE: z.string().min(1).default("UTC"),
    SEARCH_WINDOW_DAYS: positiveInt("365"),

    LINEAR_ISSUE_LIMIT: positiveInt("200"),
    LINEAR_PROJECT_LIMIT: positiveInt("100"),

    SYNC_MAX_ATTEMPTS: positiveInt("3"),
    SYNC_RETRY_BASE_MS: positiveInt("500"),

    SYNC_LOG_LEVEL: z
      .enum(["debug", "info", "warn", "error"])
      .default("info"),
    SYNC_DRY_RUN: z
      .string()
      .default("false")
      .transform((v) => v === "true"),
  })
  .refine(
    (env) => Boolean(env.GOOGLE_APPLICATION_CREDENTIALS || env.GOOGLE_SERVICE_ACCOUNT_JSON),
    {
      message: "Set GOOGLE_APPLICATION_CREDENTIALS (path) or GOOGLE_SERVICE_ACCOUNT_JSON (content)",
      path: ["GOOGLE_APPLICATION_CREDENTIALS"],
    },
  );

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

/** Parse an environment map without touching the memoized process config. */
export function parseEnv(source: NodeJS.ProcessEnv): SyncEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const missing = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigError(
      `Sync environment validation failed:\n${missing}\n\nCopy .env.example to .env.local and fill in the values.`
    );
  }
  return result.data;
}

export function getEnv(): SyncEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
