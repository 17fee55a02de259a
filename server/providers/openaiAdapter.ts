import OpenAI from "openai";
import { missingCredentialsError, toProviderError } from "./errors.js";
import type { ProviderEndpoint } from "./providerConfig.js";
import type { ProviderAdapter, ProviderStreamRequest } from "./types.js";

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;

export function toOpenAIMessages(request: ProviderStreamRequest): OpenAIMessage[] {
  const messages: OpenAIMessage[] = request.history.map((turn) =>
    turn.role === "assistant"
      ? { role: "assistant", content: turn.content }
      : { role: "user", content: turn.content },
  );
  messages.push({ role: "user", content: request.prompt });
  return messages;
}

/** Chat Completions streaming; also serves OpenAI-compatible gateways through `baseUrl`. */
export class OpenAIAdapter implements ProviderAdapter {
  readonly id = "openai";

  constructor(private readonly endpoint: ProviderEndpoint) {}

  async *streamChat(request: ProviderStreamRequest): AsyncGenerator<string> {
    if (!this.endpoint.apiKey) {
      throw missingCredentialsError(this.id, "OPENAI_API_KEY");
    }

    const client = new OpenAI({
      apiKey: this.endpoint.apiKey,
      ...(this.endpoint.baseUrl ? { baseURL: this.endpoint.baseUrl } : {}),
      maxRetries: 0,
    });

    try {
      const stream = await client.chat.completions.create({
        model: request.model,
        messages: toOpenAIMessages(request),
        stream: true,
      });

      // Leaving this loop early aborts the SDK's underlying request.
      for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
    } catch (err) {
      throw toProviderError(this.id, err);
    }
  }
}
