import path from "path";
import dotenv from "dotenv";
import cron from "node-cron";
import { ConfigurationError } from "./errors";

dotenv.config();

const REQUIRED_ENV = ["UPRN"] as const;

// Two years
export const MAX_HORIZON_WEEKS = 104;

const defaultOutputPath = path.join("docs", "bin_collections.ics");

export interface AppConfig {
  uprn: string;
  apiUrl: string;
  outputPath: string;
  requestTimeoutMs: number;
  userAgent: string;
  horizonWeeks: number;
  reminderHoursBefore: number;
  calendarName: string;
  timezone: string;
  cronPattern?: string;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  { allowZero = false, max }: { allowZero?: boolean; max?: number } = {}
): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || (value === 0 && !allowZero)) {
    throw new ConfigurationError(
      `Invalid value for ${key}: expected a ${allowZero ? "non-negative" : "positive"} number, got "${raw}"`
    );
  }
  if (max !== undefined && value > max) {
    throw new ConfigurationError(
      `Invalid value for ${key}: must be at most ${max}, got "${raw}"`
    );
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  REQUIRED_ENV.forEach((key) => {
    if (!env[key]?.trim()) {
      throw new ConfigurationError(
        `Missing required environment variable: ${key}`
      );
    }
  });

  const config: AppConfig = {
    uprn: env.UPRN?.trim() ?? "",
    apiUrl:
      env.API_URL?.trim() ||
      "https://api.southglos.gov.uk/wastecomp/GetCollectionDetails",
    outputPath: path.resolve(env.OUTPUT_PATH?.trim() || defaultOutputPath),
    requestTimeoutMs: readNumber(env, "REQUEST_TIMEOUT_MS", 15000),
    userAgent:
      env.USER_AGENT?.trim() || "Mozilla/5.0 (compatible; BinCalendarBot/1.0)",
    horizonWeeks: readNumber(env, "HORIZON_WEEKS", 26, {
      max: MAX_HORIZON_WEEKS,
    }),
    reminderHoursBefore: readNumber(env, "REMINDER_HOURS_BEFORE", 12, {
      allowZero: true,
    }),
    calendarName: env.CALENDAR_NAME?.trim() || "Bin Collections",
    timezone: env.TZ?.trim() || "Europe/London",
  };

  try {
    new URL(config.apiUrl);
  } catch (error) {
    throw new ConfigurationError(`Invalid API_URL: ${config.apiUrl}`);
  }

  const cronPattern = env.CRON_PATTERN?.trim();
  if (cronPattern) {
    if (!cron.validate(cronPattern)) {
      throw new ConfigurationError(`Invalid CRON_PATTERN: "${cronPattern}"`);
    }
    config.cronPattern = cronPattern;
  }

  return config;
}
