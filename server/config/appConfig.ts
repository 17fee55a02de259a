import fs from "node:fs";
import path from "node:path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { envFlag, resolveProviderSettings, type ProviderSettings } from "../providers/providerConfig.js";
import type { LogLevel } from "./logger.js";

export type AppConfig = {
  server: {
    port: number;
    host: string;
    corsOrigin: string;
  };
  database: {
    path: string;
  };
  auth: {
    secret: string;
    tokenTtlMinutes: number;
  };
  chat: {
    pacingMs: number;
    serializeSessionTurns: boolean;
  };
  providers: ProviderSettings;
  logLevel: LogLevel;
};

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_DATABASE_PATH = "./data/chat.db";

export class ConfigError extends Error {
  readonly issues: string[];
  /** The .env file that contributed to the rejected environment, if any. */
  readonly envFile: string | null;

  constructor(issues: string[], envFile: string | null = null) {
    const source = envFile ? ` (environment + ${envFile})` : "";
    super(`Invalid configuration${source}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
    this.envFile = envFile;
  }
}

export type LoadedConfig = {
  config: AppConfig;
  envFile: string | null;
};

function integerVar(fallback: number, min: number) {
  return z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be an integer >= ${min}` });
        return z.NEVER;
      }
      return parsed;
    });
}

function textVar(fallback: string) {
  return z
    .string()
    .trim()
    .optional()
    .transform((value) => value || fallback);
}

const envSchema = z.object({
  PORT: integerVar(DEFAULT_PORT, 1),
  HOST: textVar(DEFAULT_HOST),
  CORS_ORIGIN: textVar("*"),
  DATABASE_PATH: textVar(DEFAULT_DATABASE_PATH),
  AUTH_SECRET: z.string({ required_error: "is required" }).trim().min(1, "is required"),
  AUTH_TOKEN_TTL_MINUTES: integerVar(30, 1),
  CHAT_STREAM_PACING_MS: integerVar(10, 0),
  CHAT_SERIALIZE_SESSION_TURNS: z
    .string()
    .optional()
    .transform((value) => envFlag(value)),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((value) => value || "info")
    .pipe(z.enum(["debug", "info", "warn", "error"])),
});

/**
 * Fills `env` from `<cwd>/.env` without overriding values already set, then
 * validates the result. Returns the .env path that was read, or null.
 */
export function loadAppConfig(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const envFile = readDotenvFile(options.cwd ?? process.cwd(), env);
  return { config: resolveAppConfig(env, envFile), envFile };
}

function readDotenvFile(cwd: string, env: NodeJS.ProcessEnv): string | null {
  const envPath = path.join(cwd, ".env");
  if (!fs.existsSync(envPath)) {
    return null;
  }

  let contents: Buffer;
  try {
    contents = fs.readFileSync(envPath);
  } catch (err) {
    throw new ConfigError([`could not read .env: ${err instanceof Error ? err.message : String(err)}`], envPath);
  }
  for (const [key, value] of Object.entries(parseDotenv(contents))) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  return envPath;
}

export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env, envFile: string | null = null): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"} ${issue.message}`),
      envFile,
    );
  }

  const vars = parsed.data;
  return {
    server: {
      port: vars.PORT,
      host: vars.HOST,
      corsOrigin: vars.CORS_ORIGIN,
    },
    database: {
      path: vars.DATABASE_PATH,
    },
    auth: {
      secret: vars.AUTH_SECRET,
      tokenTtlMinutes: vars.AUTH_TOKEN_TTL_MINUTES,
    },
    chat: {
      pacingMs: vars.CHAT_STREAM_PACING_MS,
      serializeSessionTurns: vars.CHAT_SERIALIZE_SESSION_TURNS,
    },
    providers: resolveProviderSettings(env),
    logLevel: vars.LOG_LEVEL,
  };
}
