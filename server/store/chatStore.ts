import { randomUUID } from "node:crypto";
import { and, asc, desc, eq, sql } from "drizzle-orm";
import {
  DEFAULT_SESSION_TITLE,
  type ChatMessage,
  type ChatRole,
  type ChatSession,
  type ChatSessionDetail,
  type ConversationStore,
  type SessionStore,
} from "../chat/chatTypes.js";
import { NotFoundError } from "../errors.js";
import { guard, type DatabaseHandle } from "./database.js";
import { messages, sessions, type MessageRow, type SessionRow } from "./schema.js";

function toChatSession(row: SessionRow): ChatSession {
  return {
    id: row.id,
    userId: row.userId,
    title: row.title,
    createdAt: row.createdAt.toISOString(),
  };
}

function toChatMessage(row: Omit<MessageRow, "seq">): ChatMessage {
  return {
    id: row.id,
    sessionId: row.sessionId,
    role: row.role,
    content: row.content,
    createdAt: row.createdAt.toISOString(),
  };
}

export function normalizeTitle(title: string | null | undefined): string {
  const trimmed = title?.trim();
  return trimmed ? trimmed : DEFAULT_SESSION_TITLE;
}

export class SqliteChatStore implements ConversationStore, SessionStore {
  constructor(private readonly database: DatabaseHandle) {}

  private get db() {
    return this.database.db;
  }

  private write<T>(operation: string, run: () => T): T {
    return guard(operation, () => {
      const result = run();
      this.database.persist();
      return result;
    });
  }

  async createSession(userId: string, title?: string | null): Promise<ChatSession> {
    return this.write("create session", () => {
      const row: SessionRow = {
        id: randomUUID(),
        userId,
        title: normalizeTitle(title),
        createdAt: new Date(),
      };
      this.db.insert(sessions).values(row).run();
      return toChatSession(row);
    });
  }

  async listSessions(userId: string): Promise<ChatSession[]> {
    return guard("list sessions", () =>
      this.db
        .select()
        .from(sessions)
        .where(eq(sessions.userId, userId))
        .orderBy(asc(sessions.createdAt), asc(sql`rowid`))
        .all()
        .map(toChatSession),
    );
  }

  async getSession(sessionId: string, userId: string): Promise<ChatSession | null> {
    return guard("load session", () => {
      const row = this.findOwnedSession(sessionId, userId);
      return row ? toChatSession(row) : null;
    });
  }

  async getSessionDetail(sessionId: string, userId: string): Promise<ChatSessionDetail> {
    return guard("load session", () => {
      const row = this.requireOwnedSession(sessionId, userId);
      return { ...toChatSession(row), messages: this.selectMessages(sessionId) };
    });
  }

  async renameSession(sessionId: string, userId: string, title: string): Promise<ChatSession> {
    return this.write("rename session", () => {
      const row = this.db
        .update(sessions)
        .set({ title: normalizeTitle(title) })
        .where(and(eq(sessions.id, sessionId), eq(sessions.userId, userId)))
        .returning()
        .get();
      if (!row) {
        throw new NotFoundError();
      }
      return toChatSession(row);
    });
  }

  async deleteSession(sessionId: string, userId: string): Promise<void> {
    this.write("delete session", () => {
      const removed = this.db
        .delete(sessions)
        .where(and(eq(sessions.id, sessionId), eq(sessions.userId, userId)))
        .returning({ id: sessions.id })
        .all();
      if (removed.length === 0) {
        throw new NotFoundError();
      }
    });
  }

  async appendMessage(sessionId: string, role: ChatRole, content: string, actingUserId: string): Promise<ChatMessage> {
    return this.write(`save ${role} message`, () =>
      this.db.transaction((tx) => {
        const owned = tx
          .select({ id: sessions.id })
          .from(sessions)
          .where(and(eq(sessions.id, sessionId), eq(sessions.userId, actingUserId)))
          .get();
        if (!owned) {
          throw new NotFoundError();
        }

        // Timestamps never run backwards within a session, even if the clock does.
        const previous = tx
          .select({ createdAt: messages.createdAt })
          .from(messages)
          .where(eq(messages.sessionId, sessionId))
          .orderBy(desc(messages.seq))
          .limit(1)
          .get();
        const createdAt = new Date(Math.max(Date.now(), previous?.createdAt.getTime() ?? 0));

        const row = { id: randomUUID(), sessionId, role, content, createdAt };
        tx.insert(messages).values(row).run();
        return toChatMessage(row);
      }),
    );
  }

  async loadMessages(sessionId: string, actingUserId: string): Promise<ChatMessage[]> {
    return guard("load messages", () => {
      this.requireOwnedSession(sessionId, actingUserId);
      return this.selectMessages(sessionId);
    });
  }

  private findOwnedSession(sessionId: string, userId: string): SessionRow | undefined {
    return this.db
      .select()
      .from(sessions)
      .where(and(eq(sessions.id, sessionId), eq(sessions.userId, userId)))
      .get();
  }

  private requireOwnedSession(sessionId: string, userId: string): SessionRow {
    const row = this.findOwnedSession(sessionId, userId);
    if (!row) {
      throw new NotFoundError();
    }
    return row;
  }

  private selectMessages(sessionId: string): ChatMessage[] {
    return this.db
      .select()
      .from(messages)
      .where(eq(messages.sessionId, sessionId))
      .orderBy(asc(messages.createdAt), asc(messages.seq))
      .all()
      .map(toChatMessage);
  }
}
