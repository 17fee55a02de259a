export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogDetails = Record<string, unknown>;

export type Logger = {
  debug: (event: string, details?: LogDetails) => void;
  info: (event: string, details?: LogDetails) => void;
  warn: (event: string, details?: LogDetails) => void;
  error: (event: string, details?: LogDetails) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

function formatLine(scope: string, event: string, details: LogDetails | undefined): string {
  if (!details || Object.keys(details).length === 0) {
    return `[${scope}] ${event}`;
  }
  return `[${scope}] ${event} ${JSON.stringify(details)}`;
}

/**
 * Scoped console logger. Lines read `[scope] event {json}`.
 * The threshold is read from LOG_LEVEL on every call unless pinned by `level`,
 * so tests can stub the environment after module load.
 */
export function createLogger(scope: string, options: { level?: LogLevel } = {}): Logger {
  const enabled = (level: LogLevel) => {
    const threshold = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
  };

  const write = (level: LogLevel, event: string, details?: LogDetails) => {
    if (!enabled(level)) {
      return;
    }
    const line = formatLine(scope, event, details);
    if (level === "error") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  };

  return {
    debug: (event, details) => write("debug", event, details),
    info: (event, details) => write("info", event, details),
    warn: (event, details) => write("warn", event, details),
    error: (event, details) => write("error", event, details),
  };
}

export function describeError(err: unknown): LogDetails {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return { message: String(err) };
}
