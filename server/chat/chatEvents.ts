export type ChatStreamEvent =
  | { type: "delta"; text: string }
  | { type: "error"; message: string }
  | { type: "done" };

export const DONE_SENTINEL = "[DONE]";

/** One SSE frame: `data: <payload>\n\n`. */
export function encodeStreamEvent(event: ChatStreamEvent): string {
  switch (event.type) {
    case "delta":
      return `data: ${JSON.stringify({ delta: event.text })}\n\n`;
    case "error":
      return `data: ${JSON.stringify({ error: event.message })}\n\n`;
    case "done":
      return `data: ${DONE_SENTINEL}\n\n`;
  }
}

/**
 * Where the orchestrator writes a turn's events. `isConnected` is polled
 * between fragments; `close` ends the response.
 */
export interface ChatStreamSink {
  isConnected(): boolean | Promise<boolean>;
  send(event: ChatStreamEvent): void;
  close(): void;
}

/** Collects events in memory; `disconnect()` simulates the client going away. */
export class BufferedStreamSink implements ChatStreamSink {
  readonly events: ChatStreamEvent[] = [];
  closed = false;
  private connected = true;

  isConnected(): boolean {
    return this.connected;
  }

  disconnect(): void {
    this.connected = false;
  }

  send(event: ChatStreamEvent): void {
    if (this.closed) {
      throw new Error(`event after close: ${event.type}`);
    }
    this.events.push(event);
  }

  close(): void {
    this.closed = true;
  }

  encoded(): string {
    return this.events.map(encodeStreamEvent).join("");
  }
}
