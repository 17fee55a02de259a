import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BufferedStreamSink, type ChatStreamEvent } from "../../../server/chat/chatEvents.js";
import type { ChatRequest, ConversationStore } from "../../../server/chat/chatTypes.js";
import { HistoryAssembler } from "../../../server/chat/historyAssembler.js";
import { SessionTurnQueue } from "../../../server/chat/sessionTurnQueue.js";
import {
  ChatStreamOrchestrator,
  GENERIC_STREAM_ERROR,
  IllegalTransitionError,
  PERSISTENCE_STREAM_ERROR,
  TurnStateMachine,
  type OrchestratorOptions,
} from "../../../server/chat/streamOrchestrator.js";
import { createLogger } from "../../../server/config/logger.js";
import { NotFoundError, PersistenceError } from "../../../server/errors.js";
import { ProviderError } from "../../../server/providers/errors.js";
import { ProviderRegistry } from "../../../server/providers/registry.js";
import type { User } from "../../../server/store/userStore.js";
import { createTestUser, openTestStores, ScriptedAdapter, type TestStores } from "../helpers.js";

const quietLogger = createLogger("chat", { level: "error" });

class DisconnectAfter extends BufferedStreamSink {
  constructor(private readonly sends: number) {
    super();
  }

  send(event: ChatStreamEvent): void {
    super.send(event);
    if (this.events.length >= this.sends) {
      this.disconnect();
    }
  }
}

let stores: TestStores;
let alice: User;
let sessionId: string;

beforeEach(async () => {
  stores = await openTestStores();
  alice = await createTestUser(stores.users, "alice");
  sessionId = (await stores.chatStore.createSession(alice.id)).id;
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  stores.handle.close();
  vi.restoreAllMocks();
});

function build(
  adapter: ScriptedAdapter,
  options: OrchestratorOptions = {},
  conversations: ConversationStore = stores.chatStore,
): ChatStreamOrchestrator {
  const providers = new ProviderRegistry().register(adapter.id, () => adapter);
  return new ChatStreamOrchestrator(
    {
      sessions: stores.chatStore,
      conversations,
      history: new HistoryAssembler(stores.chatStore),
      providers,
    },
    { pacingMs: 0, logger: quietLogger, ...options },
  );
}

function request(prompt: string, overrides: Partial<ChatRequest> = {}): ChatRequest {
  return { sessionId, prompt, provider: "scripted", model: "test-model", ...overrides };
}

async function storedMessages(userId = alice.id) {
  const messages = await stores.chatStore.loadMessages(sessionId, userId);
  return messages.map((message) => ({ role: message.role, content: message.content }));
}

describe("ChatStreamOrchestrator", () => {
  it("relays every fragment, saves the reply and ends with [DONE]", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a", "b", "c"]);
    const sink = new BufferedStreamSink();

    const outcome = await build(adapter).run(request("hi"), alice.id, sink);

    expect(sink.events).toEqual([
      { type: "delta", text: "a" },
      { type: "delta", text: "b" },
      { type: "delta", text: "c" },
      { type: "done" },
    ]);
    expect(sink.encoded()).toBe('data: {"delta":"a"}\n\ndata: {"delta":"b"}\n\ndata: {"delta":"c"}\n\ndata: [DONE]\n\n');
    expect(sink.closed).toBe(true);
    expect(outcome.state).toBe("COMPLETED");
    expect(outcome.assistantText).toBe("abc");
    expect(outcome.states).toEqual(["INIT", "USER_SAVED", "STREAMING", "COMPLETED"]);
    expect(await storedMessages()).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "abc" },
    ]);
  });

  it("saves no assistant message when the provider yields nothing", async () => {
    const adapter = new ScriptedAdapter("scripted", []);
    const sink = new BufferedStreamSink();

    const outcome = await build(adapter).run(request("hi"), alice.id, sink);

    expect(sink.events).toEqual([{ type: "done" }]);
    expect(outcome.assistantMessageId).toBeNull();
    expect(await storedMessages()).toEqual([{ role: "user", content: "hi" }]);
  });

  it("keeps the partial reply and stops relaying when the client disconnects", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a", "b", "c"]);
    const sink = new DisconnectAfter(1);

    const outcome = await build(adapter).run(request("hi"), alice.id, sink);

    expect(sink.events).toEqual([{ type: "delta", text: "a" }]);
    expect(outcome.state).toBe("DISCONNECTED");
    expect(outcome.assistantText).toBe("a");
    expect(adapter.finalized).toBe(1);
    expect(await storedMessages()).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "a" },
    ]);
  });

  it("reports a provider failure after saving the partial reply", async () => {
    const failure = new ProviderError({
      code: "provider_unavailable",
      provider: "scripted",
      message: "Scripted request failed: service is unavailable (HTTP 503).",
      statusCode: 503,
    });
    const adapter = new ScriptedAdapter("scripted", ["a", failure]);
    const sink = new BufferedStreamSink();

    const outcome = await build(adapter).run(request("hi"), alice.id, sink);

    expect(sink.events).toEqual([
      { type: "delta", text: "a" },
      { type: "error", message: "Scripted request failed: service is unavailable (HTTP 503)." },
    ]);
    expect(outcome.state).toBe("FAILED");
    expect(await storedMessages()).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "a" },
    ]);
  });

  it("hides the message of unexpected errors", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a", new Error("socket details from upstream")]);
    const sink = new BufferedStreamSink();

    const outcome = await build(adapter).run(request("hi"), alice.id, sink);

    expect(sink.events[1]).toEqual({ type: "error", message: GENERIC_STREAM_ERROR });
    expect(outcome.errorMessage).toBe(GENERIC_STREAM_ERROR);
  });

  it("fails an unknown provider without invoking any adapter", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a"]);
    const sink = new BufferedStreamSink();

    const outcome = await build(adapter).run(request("hi", { provider: "nope" }), alice.id, sink);

    expect(adapter.requests).toHaveLength(0);
    expect(sink.events).toEqual([{ type: "error", message: "Unsupported provider: nope" }]);
    expect(outcome.states).toEqual(["INIT", "USER_SAVED", "FAILED"]);
    expect(await storedMessages()).toEqual([{ role: "user", content: "hi" }]);
  });

  it("rejects a session owned by someone else before writing anything", async () => {
    const bob = await createTestUser(stores.users, "bob");
    const adapter = new ScriptedAdapter("scripted", ["a"]);

    await expect(build(adapter).begin(request("hi"), bob.id)).rejects.toBeInstanceOf(NotFoundError);

    expect(adapter.requests).toHaveLength(0);
    expect(await storedMessages()).toEqual([]);
  });

  it("rejects a missing session", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a"]);

    await expect(
      build(adapter).begin(request("hi", { sessionId: "missing-session" }), alice.id),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("passes exactly the prior messages as history", async () => {
    const adapter = new ScriptedAdapter("scripted", ["ok"]);
    const orchestrator = build(adapter);

    await orchestrator.run(request("one"), alice.id, new BufferedStreamSink());
    await orchestrator.run(request("two"), alice.id, new BufferedStreamSink());
    await orchestrator.run(request("three"), alice.id, new BufferedStreamSink());

    expect(adapter.requests.map((item) => item.history.length)).toEqual([0, 2, 4]);
    expect(adapter.requests[2]).toEqual({
      prompt: "three",
      model: "test-model",
      history: [
        { role: "user", content: "one" },
        { role: "assistant", content: "ok" },
        { role: "user", content: "two" },
        { role: "assistant", content: "ok" },
      ],
    });
  });

  it("replaces [DONE] with an error event when the reply cannot be saved", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a"]);
    const conversations: ConversationStore = {
      appendMessage: (id, role, content, userId) =>
        role === "assistant"
          ? Promise.reject(new PersistenceError("Failed to save assistant message"))
          : stores.chatStore.appendMessage(id, role, content, userId),
      loadMessages: (id, userId) => stores.chatStore.loadMessages(id, userId),
    };
    const sink = new BufferedStreamSink();

    const outcome = await build(adapter, {}, conversations).run(request("hi"), alice.id, sink);

    expect(sink.events).toEqual([
      { type: "delta", text: "a" },
      { type: "error", message: PERSISTENCE_STREAM_ERROR },
    ]);
    expect(outcome.state).toBe("COMPLETED");
    expect(outcome.assistantText).toBe("");
    expect(outcome.assistantMessageId).toBeNull();
  });

  it("keeps the provider failure as the only error when the partial reply cannot be saved", async () => {
    const failure = new ProviderError({ code: "rate_limited", provider: "scripted", message: "Slow down." });
    const adapter = new ScriptedAdapter("scripted", ["a", failure]);
    const conversations: ConversationStore = {
      appendMessage: (id, role, content, userId) =>
        role === "assistant"
          ? Promise.reject(new PersistenceError("Failed to save assistant message"))
          : stores.chatStore.appendMessage(id, role, content, userId),
      loadMessages: (id, userId) => stores.chatStore.loadMessages(id, userId),
    };
    const sink = new BufferedStreamSink();

    await build(adapter, {}, conversations).run(request("hi"), alice.id, sink);

    expect(sink.events).toEqual([
      { type: "delta", text: "a" },
      { type: "error", message: "Slow down." },
    ]);
  });

  it("aborts before streaming when the user message cannot be saved", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a"]);
    const conversations: ConversationStore = {
      appendMessage: () => Promise.reject(new PersistenceError("Failed to save user message")),
      loadMessages: (id, userId) => stores.chatStore.loadMessages(id, userId),
    };

    await expect(build(adapter, {}, conversations).begin(request("hi"), alice.id)).rejects.toBeInstanceOf(
      PersistenceError,
    );
    expect(adapter.requests).toHaveLength(0);
  });

  it("waits the pacing delay after each relayed fragment", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a", "b", "c"]);
    const sleep = vi.fn(async (_ms: number) => undefined);

    await build(adapter, { pacingMs: 25, sleep }).run(request("hi"), alice.id, new BufferedStreamSink());

    expect(sleep.mock.calls).toEqual([[25], [25], [25]]);
  });

  it("streams an accepted turn only once", async () => {
    const adapter = new ScriptedAdapter("scripted", ["a"]);
    const turn = await build(adapter).begin(request("hi"), alice.id);

    await turn.stream(new BufferedStreamSink());

    await expect(turn.stream(new BufferedStreamSink())).rejects.toThrow(`Turn ${turn.turnId} was already streamed`);
  });

  it("runs turns of one session one after another when the turn queue is on", async () => {
    const adapter = new ScriptedAdapter("scripted", ["ok"]);
    const orchestrator = build(adapter, { turnQueue: new SessionTurnQueue() });

    const first = await orchestrator.begin(request("one"), alice.id);
    let secondAccepted = false;
    const secondPending = orchestrator.begin(request("two"), alice.id).then((turn) => {
      secondAccepted = true;
      return turn;
    });
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(secondAccepted).toBe(false);

    await first.stream(new BufferedStreamSink());
    const second = await secondPending;
    await second.stream(new BufferedStreamSink());

    expect(adapter.requests[1]?.history).toEqual([
      { role: "user", content: "one" },
      { role: "assistant", content: "ok" },
    ]);
  });

  it("never logs prompt or reply text", async () => {
    const lines: string[] = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      lines.push(line);
    });
    const adapter = new ScriptedAdapter("scripted", ["private ", "reply"]);
    const orchestrator = build(adapter, { logger: createLogger("chat", { level: "debug" }) });

    await orchestrator.run(request("private prompt"), alice.id, new BufferedStreamSink());

    expect(lines.filter((line) => line.startsWith("[chat] turn.state "))).toHaveLength(3);
    expect(lines.find((line) => line.startsWith("[chat] turn.end "))).toContain('"assistantChars":13');
    expect(lines.filter((line) => line.includes("private"))).toEqual([]);
  });
});

describe("TurnStateMachine", () => {
  it("rejects transitions that skip a state", () => {
    const machine = new TurnStateMachine("turn-1", quietLogger);

    expect(() => machine.to("STREAMING")).toThrow(IllegalTransitionError);
    expect(() => machine.to("STREAMING")).toThrow("Illegal stream transition INIT -> STREAMING");
  });

  it("does not leave a terminal state", () => {
    const machine = new TurnStateMachine("turn-1", quietLogger);
    machine.to("USER_SAVED");
    machine.to("STREAMING");
    machine.to("COMPLETED");

    expect(() => machine.to("FAILED")).toThrow("Illegal stream transition COMPLETED -> FAILED");
    expect(machine.state).toBe("COMPLETED");
  });
});
