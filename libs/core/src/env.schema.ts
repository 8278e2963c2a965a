import { z } from "zod";

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    if (typeof v === "boolean") return v;
    const s = String(v).trim().toLowerCase();
    if (["true", "1", "yes", "y", "on"].includes(s)) return true;
    if (["false", "0", "no", "n", "off"].includes(s)) return false;
    return v;
  }, z.boolean());

const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s.split(",").map((x) => x.trim()).filter(Boolean);
  }, z.array(z.string()));

const clockTime = z
  .string()
  .trim()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:mm");

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const envObject = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    APP_NAME: z.string().trim().default("stock-alert-engine"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
    PORT: toInt(3001).pipe(z.number().int().min(1).max(65535)),

    REDIS_URL: z.string().trim().optional(),
    REDIS_HOST: z.string().trim().default("localhost"),
    REDIS_PORT: toInt(6379).pipe(z.number().int().min(1).max(65535)),
    REDIS_PASSWORD: z.string().optional().default(""),
    REDIS_KEY_PREFIX: z.string().trim().default("stock-alerts:"),
    REDIS_COMMAND_TIMEOUT_MS: toInt(2000).pipe(z.number().int().min(100).max(60_000)),

    TELEGRAM_BOT_TOKEN: z.string().trim().min(1, "TELEGRAM_BOT_TOKEN is required"),
    TELEGRAM_PARSE_MODE: z.enum(["HTML", "MarkdownV2", "Markdown"]).default("HTML"),
    TELEGRAM_DISABLE_WEB_PAGE_PREVIEW: toBool(true).default(true),

    PRICE_FEED_BASE_URL: z.string().trim().default("https://query1.finance.yahoo.com"),
    PRICE_FEED_TIMEOUT_MS: toInt(5000).pipe(z.number().int().min(500).max(60_000)),
    PRICE_FEED_RETRY_ATTEMPTS: toInt(2).pipe(z.number().int().min(1).max(5)),
    SYMBOL_EXCHANGE_SUFFIX: z.string().trim().default(".NS"),

    PRICE_FAST_CACHE_TTL_SECONDS: toInt(60).pipe(z.number().int().min(1).max(3600)),
    PRICE_SLOW_CACHE_TTL_SECONDS: toInt(300).pipe(z.number().int().min(1).max(24 * 3600)),
    PRICE_SLOW_CACHE_RETENTION_SECONDS: toInt(86_400).pipe(
      z.number().int().min(60).max(30 * 24 * 3600),
    ),

    ALERT_ENGINE_ENABLED: toBool(true).default(true),
    ALERT_EVALUATION_INTERVAL_SECONDS: toInt(300).pipe(z.number().int().min(5).max(3600)),
    PRICE_SAMPLE_INTERVAL_SECONDS: toInt(60).pipe(z.number().int().min(10).max(60)),
    ALERT_COOLDOWN_SECONDS: toInt(3600).pipe(z.number().int().min(0).max(7 * 24 * 3600)),
    ALERT_FETCH_CONCURRENCY: toInt(4).pipe(z.number().int().min(1).max(50)),
    ALERT_CYCLE_DEADLINE_SECONDS: z.preprocess(
      (v) => (v === null || v === "" ? undefined : v),
      toInt().pipe(z.number().int().min(5).max(7200)).optional(),
    ),
    ALERT_REPOSITORY_TIMEOUT_MS: toInt(3000).pipe(z.number().int().min(100).max(60_000)),
    ALERT_EVENT_HISTORY_LIMIT: toInt(50).pipe(z.number().int().min(1).max(1000)),
    NOTIFICATION_SEND_TIMEOUT_MS: toInt(10_000).pipe(z.number().int().min(500).max(120_000)),

    ROLLING_WINDOW_DURATIONS_MINUTES: csv(["60", "120"]).default(["60", "120"]),
    SESSION_OPEN_WINDOW_MINUTES: toInt(5).pipe(z.number().int().min(1).max(120)),
    GAP_REFERENCE: z.enum(["PREVIOUS_CLOSE", "SESSION_OPEN"]).default("PREVIOUS_CLOSE"),

    MARKET_TIME_ZONE: z.string().trim().default("Asia/Kolkata"),
    MARKET_OPEN: clockTime.default("09:15"),
    MARKET_CLOSE: clockTime.default("15:30"),
    MARKET_TRADING_DAYS: csv(["MON", "TUE", "WED", "THU", "FRI"]).default([
      "MON",
      "TUE",
      "WED",
      "THU",
      "FRI",
    ]),
    MARKET_HOLIDAYS: csv([]).pipe(z.array(isoDate)).default([]),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  if (env.MARKET_OPEN >= env.MARKET_CLOSE) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["MARKET_CLOSE"],
      message: "MARKET_CLOSE must be later than MARKET_OPEN",
    });
  }

  if (env.ALERT_EVALUATION_INTERVAL_SECONDS > env.SESSION_OPEN_WINDOW_MINUTES * 60) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["ALERT_EVALUATION_INTERVAL_SECONDS"],
      message: "ALERT_EVALUATION_INTERVAL_SECONDS must not exceed SESSION_OPEN_WINDOW_MINUTES",
    });
  }

  const durations = env.ROLLING_WINDOW_DURATIONS_MINUTES.map(Number);
  if (durations.some((value) => !Number.isInteger(value) || value <= 0)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["ROLLING_WINDOW_DURATIONS_MINUTES"],
      message: "ROLLING_WINDOW_DURATIONS_MINUTES must be a list of positive integers",
    });
  }
});

export type Env = z.infer<typeof envSchemaWithRefinements>;
