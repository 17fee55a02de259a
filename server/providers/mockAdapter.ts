import type { ProviderAdapter, ProviderStreamRequest } from "./types.js";

/** Local development backend: echoes the prompt back one word at a time. */
export class MockAdapter implements ProviderAdapter {
  readonly id = "mock";

  async *streamChat(request: ProviderStreamRequest): AsyncGenerator<string> {
    const reply = `[${request.model}] (${request.history.length} prior messages) You said: ${request.prompt}`;
    for (const piece of reply.split(/(?=\s)/)) {
      if (piece) {
        yield piece;
      }
    }
  }
}
