import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../http/errorHandler.js";
import { toCurrentUserBody, toUserBody } from "../http/serializers.js";
import { actingUser, requireUser } from "./authMiddleware.js";
import type { AuthService } from "./authService.js";

export const MIN_PASSWORD_LENGTH = 8;

const registerSchema = z.object({
  username: z.string().trim().min(3).max(50),
  email: z.string().trim().max(100).email(),
  password: z.string().min(MIN_PASSWORD_LENGTH).max(256),
});

const tokenSchema = z.object({
  email: z.string().trim().min(1),
  password: z.string().min(1),
});

export function buildAuthRouter(auth: AuthService): Router {
  const router = Router();

  router.post(
    "/register",
    asyncHandler(async (req, res) => {
      const parsed = registerSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "Invalid request payload", details: parsed.error.issues });
        return;
      }
      const user = await auth.register(parsed.data);
      res.status(201).json(toUserBody(user));
    }),
  );

  router.post(
    "/token",
    asyncHandler(async (req, res) => {
      const parsed = tokenSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "Invalid request payload", details: parsed.error.issues });
        return;
      }
      const issued = await auth.login(parsed.data.email, parsed.data.password);
      res.json({ access_token: issued.accessToken, token_type: "bearer", expires_in: issued.expiresIn });
    }),
  );

  router.get("/me", requireUser(auth), (req, res) => {
    res.json(toCurrentUserBody(actingUser(req)));
  });

  return router;
}
