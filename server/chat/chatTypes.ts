export type ChatRole = "user" | "assistant";

export type ChatMessage = {
  id: string;
  sessionId: string;
  role: ChatRole;
  content: string;
  createdAt: string;
};

export type ChatSession = {
  id: string;
  userId: string;
  title: string;
  createdAt: string;
};

export type ChatSessionDetail = ChatSession & {
  messages: ChatMessage[];
};

export type ChatRequest = {
  sessionId: string;
  prompt: string;
  provider: string;
  model: string;
};

export const DEFAULT_SESSION_TITLE = "New Chat";

/**
 * Append-only message log. Every call is scoped to the acting user and fails
 * with NotFoundError for sessions that are missing or owned by someone else.
 */
export interface ConversationStore {
  appendMessage(sessionId: string, role: ChatRole, content: string, actingUserId: string): Promise<ChatMessage>;
  /** Creation order; equal timestamps keep insertion order. */
  loadMessages(sessionId: string, actingUserId: string): Promise<ChatMessage[]>;
}

export interface SessionStore {
  createSession(userId: string, title?: string | null): Promise<ChatSession>;
  listSessions(userId: string): Promise<ChatSession[]>;
  getSession(sessionId: string, userId: string): Promise<ChatSession | null>;
  getSessionDetail(sessionId: string, userId: string): Promise<ChatSessionDetail>;
  renameSession(sessionId: string, userId: string, title: string): Promise<ChatSession>;
  deleteSession(sessionId: string, userId: string): Promise<void>;
}
