import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import { createLogger, describeError, type Logger } from "../config/logger.js";
import { HttpError, NotFoundError, PersistenceError } from "../errors.js";
import { ProviderError, UnsupportedProviderError } from "../providers/errors.js";
import type { ProviderRegistry } from "../providers/registry.js";
import type { ChatStreamSink } from "./chatEvents.js";
import type { ChatMessage, ChatRequest, ConversationStore, SessionStore } from "./chatTypes.js";
import type { HistoryAssembler } from "./historyAssembler.js";
import type { ReleaseTurn, SessionTurnQueue } from "./sessionTurnQueue.js";

export type StreamState = "INIT" | "USER_SAVED" | "STREAMING" | "COMPLETED" | "DISCONNECTED" | "FAILED";

export type TerminalState = Extract<StreamState, "COMPLETED" | "DISCONNECTED" | "FAILED">;

const TRANSITIONS: Record<StreamState, readonly StreamState[]> = {
  INIT: ["USER_SAVED"],
  USER_SAVED: ["STREAMING", "FAILED"],
  STREAMING: ["COMPLETED", "DISCONNECTED", "FAILED"],
  COMPLETED: [],
  DISCONNECTED: [],
  FAILED: [],
};

export const GENERIC_STREAM_ERROR = "The response could not be completed.";
export const PERSISTENCE_STREAM_ERROR = "Failed to save the conversation.";

export class IllegalTransitionError extends Error {
  constructor(from: StreamState, to: StreamState) {
    super(`Illegal stream transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/** One-directional state holder for a single turn. */
export class TurnStateMachine {
  private current: StreamState = "INIT";
  private readonly visited: StreamState[] = ["INIT"];

  constructor(
    private readonly turnId: string,
    private readonly log: Logger,
  ) {}

  get state(): StreamState {
    return this.current;
  }

  get history(): readonly StreamState[] {
    return this.visited;
  }

  to(next: StreamState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.log.debug("turn.state", { turnId: this.turnId, from: this.current, to: next });
    this.current = next;
    this.visited.push(next);
  }
}

export type StreamOutcome = {
  turnId: string;
  state: TerminalState;
  /** What was persisted as the assistant message; empty when nothing was saved. */
  assistantText: string;
  assistantMessageId: string | null;
  /** Message of the error event sent to the client, if any. */
  errorMessage: string | null;
  states: readonly StreamState[];
};

export type AcceptedTurn = {
  turnId: string;
  userMessage: ChatMessage;
  /** Runs the streaming phase. Callable once. */
  stream(sink: ChatStreamSink): Promise<StreamOutcome>;
};

export type OrchestratorDeps = {
  sessions: Pick<SessionStore, "getSession">;
  conversations: ConversationStore;
  history: HistoryAssembler;
  providers: ProviderRegistry;
};

export type OrchestratorOptions = {
  /** Delay after each relayed fragment; 0 disables. */
  pacingMs?: number;
  /** When set, turns of one session run one after another. */
  turnQueue?: SessionTurnQueue | null;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

type TurnContext = {
  turnId: string;
  request: ChatRequest;
  actingUserId: string;
  userMessage: ChatMessage;
  machine: TurnStateMachine;
  startedAtMs: number;
  release: ReleaseTurn;
};

/** Message for the stream error event. Only errors built to be shown are passed through. */
export function clientErrorMessage(err: unknown): string {
  if (err instanceof ProviderError || err instanceof UnsupportedProviderError) {
    return err.message;
  }
  if (err instanceof PersistenceError) {
    return PERSISTENCE_STREAM_ERROR;
  }
  if (err instanceof HttpError && err.status < 500) {
    return err.message;
  }
  return GENERIC_STREAM_ERROR;
}

function failureDetails(err: unknown): Record<string, unknown> {
  if (err instanceof ProviderError) {
    return { provider: err.provider, code: err.code, statusCode: err.statusCode, cause: describeError(err.cause) };
  }
  return describeError(err);
}

export class ChatStreamOrchestrator {
  private readonly pacingMs: number;
  private readonly turnQueue: SessionTurnQueue | null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions = {},
  ) {
    this.pacingMs = Math.max(0, options.pacingMs ?? 10);
    this.turnQueue = options.turnQueue ?? null;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.log = options.logger ?? createLogger("chat");
  }

  /**
   * Validates the session and saves the user message. Throws NotFoundError or
   * PersistenceError before any stream exists; the caller maps those to HTTP.
   */
  async begin(request: ChatRequest, actingUserId: string): Promise<AcceptedTurn> {
    const turnId = randomUUID();
    const startedAtMs = Date.now();
    const release = this.turnQueue ? await this.turnQueue.acquire(request.sessionId) : () => undefined;

    try {
      const machine = new TurnStateMachine(turnId, this.log);
      this.log.info("turn.start", {
        turnId,
        sessionId: request.sessionId,
        provider: request.provider,
        model: request.model,
        promptChars: request.prompt.length,
      });

      const session = await this.deps.sessions.getSession(request.sessionId, actingUserId);
      if (!session) {
        throw new NotFoundError();
      }
      const userMessage = await this.deps.conversations.appendMessage(
        request.sessionId,
        "user",
        request.prompt,
        actingUserId,
      );
      machine.to("USER_SAVED");

      const context: TurnContext = { turnId, request, actingUserId, userMessage, machine, startedAtMs, release };
      let started = false;
      return {
        turnId,
        userMessage,
        stream: (sink) => {
          if (started) {
            return Promise.reject(new Error(`Turn ${turnId} was already streamed`));
          }
          started = true;
          return this.streamTurn(context, sink);
        },
      };
    } catch (err) {
      release();
      this.log.warn("turn.rejected", { turnId, sessionId: request.sessionId, ...describeError(err) });
      throw err;
    }
  }

  /** `begin` followed by `stream`. */
  async run(request: ChatRequest, actingUserId: string, sink: ChatStreamSink): Promise<StreamOutcome> {
    const turn = await this.begin(request, actingUserId);
    return turn.stream(sink);
  }

  private async streamTurn(context: TurnContext, sink: ChatStreamSink): Promise<StreamOutcome> {
    const { turnId, request, actingUserId, userMessage, machine } = context;
    let accumulated = "";
    let fragments = 0;
    let terminal: TerminalState = "COMPLETED";
    let failure: unknown = null;

    try {
      const history = await this.deps.history.load(request.sessionId, actingUserId, { before: userMessage.id });
      const adapter = this.deps.providers.resolve(request.provider);
      machine.to("STREAMING");

      const fragmentsIn = adapter.streamChat({ prompt: request.prompt, model: request.model, history });
      for await (const fragment of fragmentsIn) {
        if (!(await sink.isConnected())) {
          terminal = "DISCONNECTED";
          break;
        }
        sink.send({ type: "delta", text: fragment });
        accumulated += fragment;
        fragments += 1;
        if (this.pacingMs > 0) {
          await this.sleep(this.pacingMs);
        }
      }
    } catch (err) {
      terminal = "FAILED";
      failure = err;
      this.log.warn("turn.provider_failed", { turnId, provider: request.provider, ...failureDetails(err) });
    }
    machine.to(terminal);

    let assistantMessageId: string | null = null;
    let saveFailure: unknown = null;
    if (accumulated) {
      try {
        const saved = await this.deps.conversations.appendMessage(
          request.sessionId,
          "assistant",
          accumulated,
          actingUserId,
        );
        assistantMessageId = saved.id;
      } catch (err) {
        saveFailure = err;
        accumulated = "";
        this.log.error("turn.save_failed", { turnId, state: terminal, ...describeError(err) });
      }
    }

    let errorMessage: string | null = null;
    try {
      if (terminal === "COMPLETED") {
        if (saveFailure) {
          errorMessage = clientErrorMessage(saveFailure);
          sink.send({ type: "error", message: errorMessage });
        } else {
          sink.send({ type: "done" });
        }
      } else if (terminal === "FAILED") {
        errorMessage = clientErrorMessage(failure);
        sink.send({ type: "error", message: errorMessage });
      }
    } finally {
      sink.close();
      context.release();
    }

    this.log.info("turn.end", {
      turnId,
      state: terminal,
      fragments,
      assistantChars: accumulated.length,
      persisted: assistantMessageId !== null,
      elapsedMs: Date.now() - context.startedAtMs,
    });

    return {
      turnId,
      state: terminal,
      assistantText: accumulated,
      assistantMessageId,
      errorMessage,
      states: machine.history,
    };
  }
}
