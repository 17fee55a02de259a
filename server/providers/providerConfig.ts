export const BUILTIN_PROVIDER_IDS = ["openai", "gemini", "anthropic", "ollama"] as const;

export type BuiltinProviderId = (typeof BUILTIN_PROVIDER_IDS)[number];

export type ProviderEndpoint = {
  apiKey: string | null;
  baseUrl: string | null;
};

export type ProviderSettings = {
  openai: ProviderEndpoint;
  anthropic: ProviderEndpoint & { maxTokens: number };
  gemini: ProviderEndpoint;
  ollama: ProviderEndpoint & { baseUrl: string };
  enableMock: boolean;
};

// First non-empty variable wins.
const PROVIDER_API_KEY_ENV: Record<BuiltinProviderId, string[]> = {
  openai: ["OPENAI_API_KEY"],
  anthropic: ["ANTHROPIC_API_KEY"],
  gemini: ["GEMINI_API_KEY", "GOOGLE_API_KEY"],
  ollama: ["OLLAMA_API_KEY"],
};

const PROVIDER_BASE_URL_ENV: Record<BuiltinProviderId, string> = {
  openai: "OPENAI_BASE_URL",
  anthropic: "ANTHROPIC_BASE_URL",
  gemini: "GEMINI_BASE_URL",
  ollama: "OLLAMA_BASE_URL",
};

export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";
export const DEFAULT_ANTHROPIC_MAX_TOKENS = 1024;

export function envFlag(value: string | undefined, defaultValue = false): boolean {
  if (!value?.trim()) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

function firstNonEmpty(env: NodeJS.ProcessEnv, names: string[]): string | null {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

function parsePositiveInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function resolveEndpoint(env: NodeJS.ProcessEnv, provider: BuiltinProviderId): ProviderEndpoint {
  return {
    apiKey: firstNonEmpty(env, PROVIDER_API_KEY_ENV[provider]),
    baseUrl: firstNonEmpty(env, [PROVIDER_BASE_URL_ENV[provider]]),
  };
}

export function resolveProviderSettings(env: NodeJS.ProcessEnv = process.env): ProviderSettings {
  const ollama = resolveEndpoint(env, "ollama");
  return {
    openai: resolveEndpoint(env, "openai"),
    anthropic: {
      ...resolveEndpoint(env, "anthropic"),
      maxTokens: parsePositiveInteger(env.ANTHROPIC_MAX_TOKENS?.trim(), DEFAULT_ANTHROPIC_MAX_TOKENS),
    },
    gemini: resolveEndpoint(env, "gemini"),
    ollama: {
      ...ollama,
      baseUrl: ollama.baseUrl ?? DEFAULT_OLLAMA_BASE_URL,
    },
    enableMock: envFlag(env.CHAT_ENABLE_MOCK_PROVIDER),
  };
}

/** Which backends have a credential configured; Ollama runs without one. */
export function describeProviderAvailability(settings: ProviderSettings): Record<BuiltinProviderId, boolean> {
  return {
    openai: Boolean(settings.openai.apiKey),
    gemini: Boolean(settings.gemini.apiKey),
    anthropic: Boolean(settings.anthropic.apiKey),
    ollama: true,
  };
}
