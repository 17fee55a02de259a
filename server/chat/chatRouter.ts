import { Router, type Response } from "express";
import { z } from "zod";
import { actingUser } from "../auth/authMiddleware.js";
import { asyncHandler } from "../http/errorHandler.js";
import { encodeStreamEvent, type ChatStreamEvent, type ChatStreamSink } from "./chatEvents.js";
import type { ChatStreamOrchestrator } from "./streamOrchestrator.js";

const streamRequestSchema = z.object({
  session_id: z.string().trim().min(1),
  prompt: z.string().min(1),
  provider: z.string().trim().min(1),
  model: z.string().trim().min(1),
});

export type ChatRouterOptions = {
  /** Interval of SSE comment lines that keep idle proxies from dropping the stream; 0 disables. */
  keepAliveMs?: number;
};

/** Writes events to an SSE response; a closed connection turns writes into no-ops. */
export class ResponseStreamSink implements ChatStreamSink {
  private closed = false;
  private keepAlive: NodeJS.Timeout | null = null;

  constructor(
    private readonly res: Response,
    keepAliveMs: number,
  ) {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    if (keepAliveMs > 0) {
      this.keepAlive = setInterval(() => {
        this.safeWrite(":keepalive\n\n");
      }, keepAliveMs);
    }

    // The request's own "close" fires once its body is read, so only the response is watched.
    res.on("close", () => this.cleanup());
    res.on("error", () => this.cleanup());
  }

  isConnected(): boolean {
    return !this.closed && !this.res.destroyed && !this.res.writableEnded;
  }

  send(event: ChatStreamEvent): void {
    this.safeWrite(encodeStreamEvent(event));
  }

  close(): void {
    this.cleanup();
    if (!this.res.writableEnded) {
      this.res.end();
    }
  }

  private safeWrite(chunk: string): boolean {
    if (!this.isConnected()) {
      return false;
    }
    try {
      this.res.write(chunk);
      return true;
    } catch {
      return false;
    }
  }

  private cleanup(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.keepAlive) {
      clearInterval(this.keepAlive);
      this.keepAlive = null;
    }
  }
}

export function buildChatRouter(orchestrator: ChatStreamOrchestrator, options: ChatRouterOptions = {}): Router {
  const router = Router();
  const keepAliveMs = options.keepAliveMs ?? 15_000;

  router.post(
    "/stream",
    asyncHandler(async (req, res) => {
      const parsed = streamRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "Invalid request payload", details: parsed.error.issues });
        return;
      }

      // Ownership and the user-message write are settled before the stream opens.
      const turn = await orchestrator.begin(
        {
          sessionId: parsed.data.session_id,
          prompt: parsed.data.prompt,
          provider: parsed.data.provider,
          model: parsed.data.model,
        },
        actingUser(req).id,
      );

      await turn.stream(new ResponseStreamSink(res, keepAliveMs));
    }),
  );

  return router;
}
