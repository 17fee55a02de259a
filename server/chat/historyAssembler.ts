import type { ChatTurn } from "../providers/types.js";
import type { ConversationStore } from "./chatTypes.js";

export type HistoryOptions = {
  /** Message id of the current turn's user message; history stops strictly before it. */
  before?: string;
};

export class HistoryAssembler {
  constructor(private readonly store: ConversationStore) {}

  async load(sessionId: string, actingUserId: string, options: HistoryOptions = {}): Promise<ChatTurn[]> {
    const messages = await this.store.loadMessages(sessionId, actingUserId);
    const turns: ChatTurn[] = [];
    for (const message of messages) {
      if (message.id === options.before) {
        break;
      }
      turns.push({ role: message.role, content: message.content });
    }
    return turns;
  }
}
