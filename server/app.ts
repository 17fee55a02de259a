import cors from "cors";
import express, { type Express } from "express";
import { requireUser } from "./auth/authMiddleware.js";
import { buildAuthRouter } from "./auth/authRouter.js";
import type { AuthService } from "./auth/authService.js";
import { buildChatRouter, type ChatRouterOptions } from "./chat/chatRouter.js";
import type { SessionStore } from "./chat/chatTypes.js";
import { buildSessionRouter } from "./chat/sessionRouter.js";
import type { ChatStreamOrchestrator } from "./chat/streamOrchestrator.js";
import { errorHandler, notFoundHandler } from "./http/errorHandler.js";
import { requestLogger } from "./http/requestLogger.js";
import { describeProviderAvailability, type ProviderSettings } from "./providers/providerConfig.js";
import type { ProviderRegistry } from "./providers/registry.js";

export type AppContext = {
  auth: AuthService;
  sessions: SessionStore;
  orchestrator: ChatStreamOrchestrator;
  providers: ProviderRegistry;
  providerSettings: ProviderSettings;
  corsOrigin?: string;
  chat?: ChatRouterOptions;
};

export type ProviderHealth = {
  id: string;
  configured: boolean;
};

export function createApp(context: AppContext): Express {
  const app = express();
  const availability: Record<string, boolean> = describeProviderAvailability(context.providerSettings);

  app.use(requestLogger());
  app.use(cors({ origin: context.corsOrigin ?? "*" }));
  app.use(express.json({ limit: "2mb" }));

  app.get("/health", (_req, res) => {
    const providers: ProviderHealth[] = context.providers
      .list()
      .map((id) => ({ id, configured: availability[id] ?? true }));
    res.json({ ok: true, providers });
  });

  const authenticated = requireUser(context.auth);
  app.use("/auth", buildAuthRouter(context.auth));
  app.use("/sessions", authenticated, buildSessionRouter(context.sessions));
  app.use("/chat", authenticated, buildChatRouter(context.orchestrator, context.chat));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
