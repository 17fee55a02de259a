import type { Server } from "node:http";
import type express from "express";
import { createApp } from "../../server/app.js";
import { AuthService } from "../../server/auth/authService.js";
import { TokenService } from "../../server/auth/tokens.js";
import type { ChatRouterOptions } from "../../server/chat/chatRouter.js";
import { HistoryAssembler } from "../../server/chat/historyAssembler.js";
import { ChatStreamOrchestrator } from "../../server/chat/streamOrchestrator.js";
import { createLogger } from "../../server/config/logger.js";
import { resolveProviderSettings } from "../../server/providers/providerConfig.js";
import { ProviderRegistry } from "../../server/providers/registry.js";
import type { ProviderAdapter, ProviderStreamRequest } from "../../server/providers/types.js";
import { SqliteChatStore } from "../../server/store/chatStore.js";
import { openDatabase, type DatabaseHandle } from "../../server/store/database.js";
import { UserStore, type User } from "../../server/store/userStore.js";

export async function withServer(run: (baseUrl: string) => Promise<void>, appFactory: () => express.Express) {
  const app = appFactory();
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });

  const addr = server.address();
  if (!addr || typeof addr === "string") {
    server.close();
    throw new Error("Failed to resolve server address");
  }

  try {
    await run(`http://127.0.0.1:${addr.port}`);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

export type TestStores = {
  handle: DatabaseHandle;
  chatStore: SqliteChatStore;
  users: UserStore;
};

export async function openTestStores(): Promise<TestStores> {
  const handle = await openDatabase(":memory:");
  return { handle, chatStore: new SqliteChatStore(handle), users: new UserStore(handle) };
}

export function createTestUser(users: UserStore, username = "alice"): Promise<User> {
  return users.createUser({ username, email: `${username}@example.com`, passwordHash: "scrypt$00$00" });
}

/** Yields its script in order; an Error entry is thrown at that point. */
export class ScriptedAdapter implements ProviderAdapter {
  readonly requests: ProviderStreamRequest[] = [];
  finalized = 0;

  constructor(
    readonly id: string,
    private readonly script: Array<string | Error>,
  ) {}

  async *streamChat(request: ProviderStreamRequest): AsyncGenerator<string> {
    this.requests.push(request);
    try {
      for (const step of this.script) {
        if (step instanceof Error) {
          throw step;
        }
        yield step;
      }
    } finally {
      this.finalized += 1;
    }
  }
}

/** Splits an SSE body into its `data:` payloads. */
export function ssePayloads(body: string): string[] {
  return body
    .split("\n\n")
    .filter((frame) => frame.startsWith("data: "))
    .map((frame) => frame.slice("data: ".length));
}

export const TEST_SECRET = "test-secret";

export type TestApp = {
  app: express.Express;
  tokens: TokenService;
  providers: ProviderRegistry;
  bearer: (user: User) => Record<string, string>;
};

/** The full application on in-memory stores, without pacing and, unless asked for, keep-alive comments. */
export function buildTestApp(
  stores: TestStores,
  providers = new ProviderRegistry(),
  chat: ChatRouterOptions = { keepAliveMs: 0 },
): TestApp {
  const tokens = new TokenService(TEST_SECRET, 30);
  const auth = new AuthService(stores.users, tokens);
  const orchestrator = new ChatStreamOrchestrator(
    {
      sessions: stores.chatStore,
      conversations: stores.chatStore,
      history: new HistoryAssembler(stores.chatStore),
      providers,
    },
    { pacingMs: 0, logger: createLogger("chat", { level: "error" }) },
  );
  const app = createApp({
    auth,
    sessions: stores.chatStore,
    orchestrator,
    providers,
    providerSettings: resolveProviderSettings({}),
    chat,
  });
  return {
    app,
    tokens,
    providers,
    bearer: (user) => ({
      authorization: `Bearer ${tokens.issue(user.id).accessToken}`,
      "content-type": "application/json",
    }),
  };
}

/** An async sequence of `items`; an Error entry is thrown at that point. */
export async function* fromItems<T>(items: Array<T | Error>): AsyncGenerator<T> {
  for (const item of items) {
    if (item instanceof Error) {
      throw item;
    }
    yield item;
  }
}

export type Drained = {
  fragments: string[];
  error: unknown;
};

/** Collects fragments until the sequence ends or throws. */
export async function drain(iterable: AsyncIterable<string>): Promise<Drained> {
  const fragments: string[] = [];
  try {
    for await (const fragment of iterable) {
      fragments.push(fragment);
    }
  } catch (error) {
    return { fragments, error };
  }
  return { fragments, error: null };
}
