import { z } from "zod";

const booleanFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const normalized = value.trim().toLowerCase();
      if (["true", "1", "yes"].includes(normalized)) return true;
      if (["false", "0", "no"].includes(normalized)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Expected boolean-like value (true/false).",
      });
      return z.NEVER;
    });

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const EnvSchema = z.object({
  WEBHOOK_VERIFY_TOKEN: optionalSecret,
  GRAPH_API_TOKEN: optionalSecret,
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  GRAPH_API_BASE_URL: z.string().url().default("https://graph.facebook.com"),
  GRAPH_API_VERSION: z.string().regex(/^v\d+\.\d+$/, "Expected a version like v18.0").default("v18.0"),
  IMAGES_DIR: z.string().min(1).default("images"),
  MEDIA_MAX_BYTES: z.coerce.number().int().positive().default(25 * 1024 * 1024),
  LOG_LEVEL: z.enum(logLevels).default("info"),
  WA_APP_SECRET: optionalSecret,
  ENFORCE_WA_SIG: booleanFromEnv(false),
  DEBUG_ENDPOINT: booleanFromEnv(true),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
});

export type LogLevel = (typeof logLevels)[number];

export interface Config {
  port: number;
  verifyToken?: string;
  graph: {
    token?: string;
    baseUrl: string;
    version: string;
  };
  imagesDir: string;
  mediaMaxBytes: number;
  logLevel: LogLevel;
  signature: {
    appSecret?: string;
    enforce: boolean;
  };
  debugEndpoint: boolean;
  rateLimit: {
    windowMs: number;
    max: number;
  };
  /** Raw PORT value as given, surfaced by /debug. */
  rawPort: string | null;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    verifyToken: e.WEBHOOK_VERIFY_TOKEN,
    graph: {
      token: e.GRAPH_API_TOKEN,
      baseUrl: e.GRAPH_API_BASE_URL.replace(/\/+$/, ""),
      version: e.GRAPH_API_VERSION,
    },
    imagesDir: e.IMAGES_DIR,
    mediaMaxBytes: e.MEDIA_MAX_BYTES,
    logLevel: e.LOG_LEVEL,
    signature: {
      appSecret: e.WA_APP_SECRET,
      enforce: e.ENFORCE_WA_SIG,
    },
    debugEndpoint: e.DEBUG_ENDPOINT,
    rateLimit: {
      windowMs: e.RATE_LIMIT_WINDOW_MS,
      max: e.RATE_LIMIT_MAX,
    },
    rawPort: env.PORT ?? null,
  };
}
