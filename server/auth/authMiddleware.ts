import type { Request, RequestHandler } from "express";
import { UnauthorizedError } from "../errors.js";
import { asyncHandler } from "../http/errorHandler.js";
import type { User } from "../store/userStore.js";
import type { AuthService } from "./authService.js";

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

export function readBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const [scheme, token] = header.trim().split(/\s+/, 2);
  if (scheme?.toLowerCase() !== "bearer" || !token) {
    return null;
  }
  return token;
}

export function requireUser(auth: AuthService): RequestHandler {
  return asyncHandler(async (req, _res, next) => {
    const token = readBearerToken(req.get("authorization"));
    if (!token) {
      throw new UnauthorizedError("Could not validate credentials, no proper token provided");
    }
    req.user = await auth.getCurrentUser(token);
    next();
  });
}

/** The user attached by `requireUser`. */
export function actingUser(req: Request): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
