import Anthropic from "@anthropic-ai/sdk";
import { missingCredentialsError, toProviderError } from "./errors.js";
import type { ProviderEndpoint } from "./providerConfig.js";
import type { ProviderAdapter, ProviderStreamRequest } from "./types.js";

export function toAnthropicMessages(request: ProviderStreamRequest): Anthropic.MessageParam[] {
  return [
    ...request.history.map((turn): Anthropic.MessageParam => ({ role: turn.role, content: turn.content })),
    { role: "user", content: request.prompt },
  ];
}

export class AnthropicAdapter implements ProviderAdapter {
  readonly id = "anthropic";

  constructor(private readonly endpoint: ProviderEndpoint & { maxTokens: number }) {}

  async *streamChat(request: ProviderStreamRequest): AsyncGenerator<string> {
    if (!this.endpoint.apiKey) {
      throw missingCredentialsError(this.id, "ANTHROPIC_API_KEY");
    }

    const client = new Anthropic({
      apiKey: this.endpoint.apiKey,
      ...(this.endpoint.baseUrl ? { baseURL: this.endpoint.baseUrl } : {}),
      maxRetries: 0,
    });

    try {
      const stream = await client.messages.create({
        model: request.model,
        max_tokens: this.endpoint.maxTokens,
        messages: toAnthropicMessages(request),
        stream: true,
      });

      for await (const event of stream) {
        // message_start, ping, content_block_start/stop and message_delta carry no text.
        if (event.type !== "content_block_delta" || event.delta.type !== "text_delta") {
          continue;
        }
        if (event.delta.text) {
          yield event.delta.text;
        }
      }
    } catch (err) {
      throw toProviderError(this.id, err);
    }
  }
}
