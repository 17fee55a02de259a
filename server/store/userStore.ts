import { randomUUID } from "node:crypto";
import { eq, or } from "drizzle-orm";
import { ConflictError } from "../errors.js";
import { guard, type DatabaseHandle } from "./database.js";
import { users, type UserRow } from "./schema.js";

export type User = {
  id: string;
  username: string;
  email: string;
  createdAt: string;
  lastLoginAt: string | null;
};

export type UserWithPassword = User & { passwordHash: string };

export type NewUser = {
  username: string;
  email: string;
  passwordHash: string;
};

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    createdAt: row.createdAt.toISOString(),
    lastLoginAt: row.lastLoginAt ? row.lastLoginAt.toISOString() : null,
  };
}

export class UserStore {
  constructor(private readonly database: DatabaseHandle) {}

  private get db() {
    return this.database.db;
  }

  async createUser(input: NewUser): Promise<User> {
    const email = input.email.trim().toLowerCase();
    return guard("create user", () => {
      const existing = this.db
        .select({ username: users.username, email: users.email })
        .from(users)
        .where(or(eq(users.username, input.username), eq(users.email, email)))
        .get();
      if (existing) {
        throw new ConflictError(existing.email === email ? "Email already registered" : "Username already taken");
      }

      const row: UserRow = {
        id: randomUUID(),
        username: input.username,
        email,
        passwordHash: input.passwordHash,
        createdAt: new Date(),
        lastLoginAt: null,
      };
      this.db.insert(users).values(row).run();
      this.database.persist();
      return toUser(row);
    });
  }

  async findByEmail(email: string): Promise<UserWithPassword | null> {
    return guard("load user", () => {
      const row = this.db
        .select()
        .from(users)
        .where(eq(users.email, email.trim().toLowerCase()))
        .get();
      return row ? { ...toUser(row), passwordHash: row.passwordHash } : null;
    });
  }

  async findById(userId: string): Promise<User | null> {
    return guard("load user", () => {
      const row = this.db.select().from(users).where(eq(users.id, userId)).get();
      return row ? toUser(row) : null;
    });
  }

  async recordLogin(userId: string, at: Date = new Date()): Promise<void> {
    guard("record login", () => {
      this.db.update(users).set({ lastLoginAt: at }).where(eq(users.id, userId)).run();
      this.database.persist();
    });
  }
}
