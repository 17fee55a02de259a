import { GoogleGenAI, type Content } from "@google/genai";
import { missingCredentialsError, toProviderError } from "./errors.js";
import type { ProviderEndpoint } from "./providerConfig.js";
import type { ProviderAdapter, ProviderStreamRequest } from "./types.js";

export function toGeminiContents(request: ProviderStreamRequest): Content[] {
  const contents: Content[] = request.history.map((turn) => ({
    role: turn.role === "assistant" ? "model" : "user",
    parts: [{ text: turn.content }],
  }));
  contents.push({ role: "user", parts: [{ text: request.prompt }] });
  return contents;
}

export class GeminiAdapter implements ProviderAdapter {
  readonly id = "gemini";

  constructor(private readonly endpoint: ProviderEndpoint) {}

  async *streamChat(request: ProviderStreamRequest): AsyncGenerator<string> {
    if (!this.endpoint.apiKey) {
      throw missingCredentialsError(this.id, "GEMINI_API_KEY");
    }

    const client = new GoogleGenAI({
      apiKey: this.endpoint.apiKey,
      ...(this.endpoint.baseUrl ? { httpOptions: { baseUrl: this.endpoint.baseUrl } } : {}),
    });

    try {
      const stream = await client.models.generateContentStream({
        model: request.model,
        contents: toGeminiContents(request),
      });

      for await (const chunk of stream) {
        // Safety-only and finish-reason chunks have no text.
        const text = chunk.text;
        if (text) {
          yield text;
        }
      }
    } catch (err) {
      throw toProviderError(this.id, err);
    }
  }
}
