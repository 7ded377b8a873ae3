import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import path from "node:path";
import { ConfigError, UnknownSettingError } from "./errors.js";

const count = (fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = (fallback: boolean) =>
  z
    .string()
    .default(String(fallback))
    .transform((v) => v.toLowerCase() === "true");

const browserName = z.enum(["chromium", "firefox"]);
export type BrowserName = z.infer<typeof browserName>;

const shape = {
  DATA_DIR: z.string().min(1).default("./data"),
  HISTORY_FILE: z.string().min(1).optional(),
  TARGETS_FILE: z.string().min(1).optional(),
  RETENTION_CAP: count(5, 1),
  DWELL_TIME_SECONDS: count(45),
  MAX_OPEN_TABS: count(0),
  COMPRESSION_TOLERANCE: count(300),
  SCREENSHOT_CONFIDENCE: count(60, 0, 100),
  SCREENSHOT_TOLERANCE: count(3, 0, 64),
  KEEP_LOCAL_RECORDS: flag(true),
  LOCAL_PAGES_KEPT: count(2, 1),
  ARCHIVE_CONCURRENCY: count(3, 1),
  BROWSER: browserName.default("chromium"),
  PLAYWRIGHT_HEADLESS: flag(true),
  VIEWPORT_WIDTH: count(1080, 1),
  VIEWPORT_HEIGHT: count(2000, 1),
  PAGE_LOAD_TIMEOUT_SECONDS: count(15, 1),
  SCRIPT_TIMEOUT_SECONDS: count(15, 1),
  DOWNLOAD_TIMEOUT_SECONDS: count(30, 1),
  CRON_SCHEDULE: z.string().default("0 6 * * *"),
};

const schema = z.object(shape).transform((c) => ({
  ...c,
  HISTORY_FILE: c.HISTORY_FILE ?? path.join(c.DATA_DIR, "history.json"),
}));

export type AppConfig = z.output<typeof schema>;

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new ConfigError(`Invalid configuration: ${errs}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

let cachedConfig: AppConfig | null = null;

/** Reads `.env` and the process environment once; later calls return the same object. */
export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;
  loadDotenv();
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

const NUMERIC_SETTINGS = [
  "RETENTION_CAP",
  "DWELL_TIME_SECONDS",
  "MAX_OPEN_TABS",
  "COMPRESSION_TOLERANCE",
  "SCREENSHOT_CONFIDENCE",
  "SCREENSHOT_TOLERANCE",
  "LOCAL_PAGES_KEPT",
  "ARCHIVE_CONCURRENCY",
  "VIEWPORT_WIDTH",
  "VIEWPORT_HEIGHT",
  "PAGE_LOAD_TIMEOUT_SECONDS",
  "SCRIPT_TIMEOUT_SECONDS",
  "DOWNLOAD_TIMEOUT_SECONDS",
] as const;

const BOOLEAN_SETTINGS = ["KEEP_LOCAL_RECORDS", "PLAYWRIGHT_HEADLESS"] as const;

const TEXT_SETTINGS = ["TARGETS_FILE", "CRON_SCHEDULE"] as const;

type NumericSetting = (typeof NUMERIC_SETTINGS)[number];
type BooleanSetting = (typeof BOOLEAN_SETTINGS)[number];
type TextSetting = (typeof TEXT_SETTINGS)[number];

export type SettingUpdate =
  | { key: NumericSetting; value: number }
  | { key: BooleanSetting; value: boolean }
  | { key: TextSetting; value: string }
  | { key: "BROWSER"; value: BrowserName };

function isNumericSetting(key: string): key is NumericSetting {
  return NUMERIC_SETTINGS.some((k) => k === key);
}

function isBooleanSetting(key: string): key is BooleanSetting {
  return BOOLEAN_SETTINGS.some((k) => k === key);
}

function isTextSetting(key: string): key is TextSetting {
  return TEXT_SETTINGS.some((k) => k === key);
}

export function parseSettingUpdate(key: string, value: string): SettingUpdate {
  if (isNumericSetting(key)) {
    const parsed = shape[key].safeParse(value);
    if (!parsed.success) {
      throw new ConfigError(`Invalid value for ${key}: ${value}`, { key, value });
    }
    return { key, value: parsed.data };
  }
  if (isBooleanSetting(key)) {
    if (!/^(true|false)$/i.test(value)) {
      throw new ConfigError(`Invalid value for ${key}: ${value}`, { key, value });
    }
    return { key, value: value.toLowerCase() === "true" };
  }
  if (key === "BROWSER") {
    const parsed = browserName.safeParse(value);
    if (!parsed.success) {
      throw new ConfigError(`Invalid value for ${key}: ${value}`, { key, value });
    }
    return { key, value: parsed.data };
  }
  if (isTextSetting(key)) {
    return { key, value };
  }
  throw new UnknownSettingError(key);
}

function withField<K extends keyof AppConfig>(config: AppConfig, key: K, value: AppConfig[K]): AppConfig {
  return { ...config, [key]: value };
}

export function applySetting(config: AppConfig, update: SettingUpdate): AppConfig {
  return withField(config, update.key, update.value);
}

/** Parses `KEY=VALUE` pairs as given on the command line. */
export function applySettingArgs(config: AppConfig, pairs: string[]): AppConfig {
  return pairs.reduce((acc, pair) => {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ConfigError(`Expected KEY=VALUE, got: ${pair}`);
    }
    return applySetting(acc, parseSettingUpdate(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim()));
  }, config);
}
