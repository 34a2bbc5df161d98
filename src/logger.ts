type LogLevel = "info" | "warn" | "error" | "debug";

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const REDACTED = "[redacted]";

// Household identifiers and the like; replaced wherever they show up in output
const secrets = new Set<string>();

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

const requestedLevel = process.env.LOG_LEVEL?.trim().toLowerCase() ?? "";
const currentLevel: LogLevel = isLogLevel(requestedLevel)
  ? requestedLevel
  : "info";

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[currentLevel];
}

function scrub(text: string): string {
  let result = text;
  secrets.forEach((secret) => {
    result = result.split(secret).join(REDACTED);
  });
  return result;
}

function format(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${scrub(message)}`;
}

function describeError(error: unknown): unknown {
  if (error === undefined) {
    return "";
  }
  if (error instanceof Error) {
    return scrub(error.stack ?? `${error.name}: ${error.message}`);
  }
  return typeof error === "string" ? scrub(error) : error;
}

export const logger = {
  /** Masks `value` in every later log line. Blank values are ignored. */
  redact: (value: string): void => {
    const trimmed = value.trim();
    if (trimmed) {
      secrets.add(trimmed);
    }
  },
  info: (message: string): void => {
    if (shouldLog("info")) {
      console.log(format("info", message));
    }
  },
  warn: (message: string): void => {
    if (shouldLog("warn")) {
      console.warn(format("warn", message));
    }
  },
  error: (message: string, error?: unknown): void => {
    if (shouldLog("error")) {
      console.error(format("error", message), describeError(error));
    }
  },
  debug: (message: string): void => {
    if (shouldLog("debug")) {
      console.debug(format("debug", message));
    }
  },
};
