import { Router } from "express";
import { z } from "zod";
import { actingUser } from "../auth/authMiddleware.js";
import { asyncHandler } from "../http/errorHandler.js";
import { toSessionBody, toSessionDetailBody } from "../http/serializers.js";
import type { SessionStore } from "./chatTypes.js";

export const MAX_TITLE_LENGTH = 200;

const createSessionSchema = z.object({
  title: z.string().max(MAX_TITLE_LENGTH).nullish(),
});

const renameSessionSchema = z.object({
  title: z.string().max(MAX_TITLE_LENGTH),
});

export function buildSessionRouter(sessions: SessionStore): Router {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const list = await sessions.listSessions(actingUser(req).id);
      res.json(list.map(toSessionBody));
    }),
  );

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const parsed = createSessionSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(400).json({ error: "Invalid request payload", details: parsed.error.issues });
        return;
      }
      const session = await sessions.createSession(actingUser(req).id, parsed.data.title);
      res.status(201).json(toSessionBody(session));
    }),
  );

  router.get(
    "/:sessionId",
    asyncHandler(async (req, res) => {
      const detail = await sessions.getSessionDetail(req.params.sessionId, actingUser(req).id);
      res.json(toSessionDetailBody(detail));
    }),
  );

  router.patch(
    "/:sessionId",
    asyncHandler(async (req, res) => {
      const parsed = renameSessionSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "Invalid request payload", details: parsed.error.issues });
        return;
      }
      const session = await sessions.renameSession(req.params.sessionId, actingUser(req).id, parsed.data.title);
      res.json(toSessionBody(session));
    }),
  );

  router.delete(
    "/:sessionId",
    asyncHandler(async (req, res) => {
      await sessions.deleteSession(req.params.sessionId, actingUser(req).id);
      res.status(204).end();
    }),
  );

  return router;
}
