import type { ChatRole } from "../chat/chatTypes.js";

export type ChatTurn = {
  role: ChatRole;
  content: string;
};

export type ProviderStreamRequest = {
  prompt: string;
  model: string;
  /** Prior turns, oldest first, excluding `prompt`. */
  history: ChatTurn[];
};

/**
 * One upstream text-generation backend.
 *
 * `streamChat` yields non-empty fragments in generation order and throws only
 * `ProviderError`. Stopping iteration early must release any upstream connection.
 */
export interface ProviderAdapter {
  readonly id: string;
  streamChat(request: ProviderStreamRequest): AsyncIterable<string>;
}

export type ProviderFactory = () => ProviderAdapter;
