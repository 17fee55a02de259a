import { createLogger, type Logger } from "../config/logger.js";
import { malformedResponseError, ProviderError, toProviderError } from "./errors.js";
import type { ProviderEndpoint } from "./providerConfig.js";
import type { ProviderAdapter, ProviderStreamRequest } from "./types.js";

type FetchLike = typeof fetch;

const STREAM_END = Symbol("ollama.streamEnd");

type OllamaLine =
  | { kind: "text"; text: string }
  | { kind: "empty" }
  | { kind: "done" }
  | { kind: "error"; message: string }
  | { kind: "malformed" };

export type OllamaAdapterOptions = {
  fetch?: FetchLike;
  logger?: Logger;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decodes one NDJSON line of `/api/chat` output. `/api/generate` lines
 * (`response` instead of `message.content`) are accepted too.
 */
export function decodeOllamaLine(line: string): OllamaLine {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return { kind: "malformed" };
  }
  if (!isRecord(parsed)) {
    return { kind: "malformed" };
  }

  if (typeof parsed.error === "string") {
    return { kind: "error", message: parsed.error };
  }

  const message = parsed.message;
  const text = isRecord(message) && typeof message.content === "string" ? message.content : parsed.response;
  if (typeof text === "string" && text.length > 0) {
    return { kind: "text", text };
  }
  if (parsed.done === true) {
    return { kind: "done" };
  }
  if (typeof text === "string" || "done" in parsed) {
    return { kind: "empty" };
  }
  return { kind: "malformed" };
}

export class OllamaAdapter implements ProviderAdapter {
  readonly id = "ollama";
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: ProviderEndpoint & { baseUrl: string },
    options: OllamaAdapterOptions = {},
  ) {
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger("provider:ollama");
  }

  async *streamChat(request: ProviderStreamRequest): AsyncGenerator<string> {
    const controller = new AbortController();
    const url = `${this.endpoint.baseUrl.replace(/\/+$/, "")}/api/chat`;
    const headers: Record<string, string> = { "content-type": "application/json" };
    if (this.endpoint.apiKey) {
      headers.authorization = `Bearer ${this.endpoint.apiKey}`;
    }

    let validLines = 0;
    let malformedLines = 0;

    try {
      const response = await this.fetchImpl(url, {
        method: "POST",
        headers,
        body: JSON.stringify({
          model: request.model,
          messages: [
            ...request.history.map((turn) => ({ role: turn.role, content: turn.content })),
            { role: "user", content: request.prompt },
          ],
          stream: true,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw toProviderError(this.id, { status: response.status });
      }
      if (!response.body) {
        throw malformedResponseError(this.id);
      }

      const body: AsyncIterable<Uint8Array> = response.body;
      const decoder = new TextDecoder();
      let buffer = "";

      const handle = (rawLine: string): string | typeof STREAM_END | null => {
        const line = rawLine.trim();
        if (!line) {
          return null;
        }
        const decoded = decodeOllamaLine(line);
        if (decoded.kind === "malformed") {
          malformedLines += 1;
          this.logger.warn("payload.malformed", { model: request.model, preview: line.slice(0, 120) });
          return null;
        }
        validLines += 1;
        if (decoded.kind === "error") {
          this.logger.warn("payload.error", { model: request.model, upstream: decoded.message.slice(0, 200) });
          throw new ProviderError({
            code: /not found/i.test(decoded.message) ? "model_not_found" : "provider_unavailable",
            provider: this.id,
            message: "Ollama reported an error while generating the response.",
          });
        }
        if (decoded.kind === "done") {
          return STREAM_END;
        }
        return decoded.kind === "text" ? decoded.text : null;
      };

      for await (const chunk of body) {
        buffer += decoder.decode(chunk, { stream: true });
        let newlineIndex = buffer.indexOf("\n");
        while (newlineIndex >= 0) {
          const result = handle(buffer.slice(0, newlineIndex));
          buffer = buffer.slice(newlineIndex + 1);
          if (result === STREAM_END) {
            return;
          }
          if (result) {
            yield result;
          }
          newlineIndex = buffer.indexOf("\n");
        }
      }

      const tail = handle(buffer + decoder.decode());
      if (typeof tail === "string") {
        yield tail;
      }

      if (validLines === 0 && malformedLines > 0) {
        throw malformedResponseError(this.id);
      }
    } catch (err) {
      throw toProviderError(this.id, err);
    } finally {
      // Releases the connection when the consumer stops early.
      controller.abort();
    }
  }
}
