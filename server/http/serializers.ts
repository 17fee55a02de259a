import type { ChatMessage, ChatSession, ChatSessionDetail } from "../chat/chatTypes.js";
import type { User } from "../store/userStore.js";

// Wire bodies use snake_case keys.

export type UserBody = {
  id: string;
  username: string;
  email: string;
  created_at: string;
};

export type CurrentUserBody = UserBody & {
  last_login_at: string | null;
};

export type SessionBody = {
  id: string;
  title: string;
  created_at: string;
};

export type MessageBody = {
  id: string;
  session_id: string;
  role: ChatMessage["role"];
  content: string;
  created_at: string;
};

export type SessionDetailBody = SessionBody & {
  messages: MessageBody[];
};

export function toUserBody(user: User): UserBody {
  return { id: user.id, username: user.username, email: user.email, created_at: user.createdAt };
}

export function toCurrentUserBody(user: User): CurrentUserBody {
  return { ...toUserBody(user), last_login_at: user.lastLoginAt };
}

export function toSessionBody(session: ChatSession): SessionBody {
  return { id: session.id, title: session.title, created_at: session.createdAt };
}

export function toMessageBody(message: ChatMessage): MessageBody {
  return {
    id: message.id,
    session_id: message.sessionId,
    role: message.role,
    content: message.content,
    created_at: message.createdAt,
  };
}

export function toSessionDetailBody(detail: ChatSessionDetail): SessionDetailBody {
  return { ...toSessionBody(detail), messages: detail.messages.map(toMessageBody) };
}
