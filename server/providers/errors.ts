export type ProviderErrorCode =
  | "missing_credentials"
  | "auth_failed"
  | "rate_limited"
  | "model_not_found"
  | "invalid_request"
  | "provider_unavailable"
  | "network_error"
  | "malformed_response"
  | "unknown";

export class ProviderError extends Error {
  readonly code: ProviderErrorCode;
  readonly provider: string;
  readonly statusCode?: number;

  constructor(params: {
    code: ProviderErrorCode;
    provider: string;
    message: string;
    statusCode?: number;
    cause?: unknown;
  }) {
    super(params.message);
    this.name = "ProviderError";
    this.code = params.code;
    this.provider = params.provider;
    if (typeof params.statusCode === "number") {
      this.statusCode = params.statusCode;
    }
    if (params.cause !== undefined) {
      this.cause = params.cause;
    }
  }
}

export class UnsupportedProviderError extends Error {
  readonly provider: string;

  constructor(provider: string) {
    super(`Unsupported provider: ${provider}`);
    this.name = "UnsupportedProviderError";
    this.provider = provider;
  }
}

const PROVIDER_LABELS: Record<string, string> = {
  openai: "OpenAI",
  anthropic: "Anthropic",
  gemini: "Gemini",
  ollama: "Ollama",
};

export function providerLabel(provider: string): string {
  return PROVIDER_LABELS[provider] ?? provider;
}

export function missingCredentialsError(provider: string, envName: string): ProviderError {
  return new ProviderError({
    code: "missing_credentials",
    provider,
    message: `${providerLabel(provider)} API key is not configured (set ${envName}).`,
  });
}

export function malformedResponseError(provider: string, cause?: unknown): ProviderError {
  return new ProviderError({
    code: "malformed_response",
    provider,
    message: `${providerLabel(provider)} returned a response that could not be read.`,
    cause,
  });
}

function readField(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function readStatus(error: unknown): number | undefined {
  for (const candidate of [readField(error, "status"), readField(error, "statusCode"), readField(error, "code")]) {
    if (typeof candidate === "number" && candidate >= 100 && candidate <= 599) {
      return candidate;
    }
  }
  return undefined;
}

const NETWORK_ERROR_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT", "EPIPE", "UND_ERR_SOCKET"]);

function isNetworkFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (/connection|fetch failed|socket|network/i.test(`${error.name} ${error.message}`)) {
    return true;
  }
  const code = readField(error.cause, "code") ?? readField(error, "code");
  return typeof code === "string" && NETWORK_ERROR_CODES.has(code);
}

function classifyStatus(status: number): { code: ProviderErrorCode; reason: string } {
  if (status === 401 || status === 403) {
    return { code: "auth_failed", reason: "credentials were rejected" };
  }
  if (status === 429) {
    return { code: "rate_limited", reason: "rate limit or quota exceeded" };
  }
  if (status === 404) {
    return { code: "model_not_found", reason: "model or endpoint not found" };
  }
  if (status >= 500) {
    return { code: "provider_unavailable", reason: "service is unavailable" };
  }
  return { code: "invalid_request", reason: "request was rejected" };
}

/**
 * Maps any upstream failure to a ProviderError whose message is safe to show
 * to clients. The raw error is kept only as `cause`.
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const label = providerLabel(provider);
  const status = readStatus(error);
  if (status !== undefined) {
    const { code, reason } = classifyStatus(status);
    return new ProviderError({
      code,
      provider,
      statusCode: status,
      message: `${label} request failed: ${reason} (HTTP ${status}).`,
      cause: error,
    });
  }

  if (isNetworkFailure(error)) {
    return new ProviderError({
      code: "network_error",
      provider,
      message: `${label} request failed: connection lost or refused.`,
      cause: error,
    });
  }

  if (error instanceof SyntaxError) {
    return malformedResponseError(provider, error);
  }

  return new ProviderError({
    code: "unknown",
    provider,
    message: `${label} request failed unexpectedly.`,
    cause: error,
  });
}
