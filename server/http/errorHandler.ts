import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError } from "zod";
import { createLogger, describeError } from "../config/logger.js";
import { HttpError } from "../errors.js";

const log = createLogger("http");

export type ErrorBody = {
  error: string;
  details?: unknown;
};

const BODY_ERROR_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Malformed JSON body",
  "entity.too.large": "Request body too large",
  "encoding.unsupported": "Unsupported content encoding",
  "charset.unsupported": "Unsupported charset",
};

type BodyParserError = { type: string; status: number };

/** Client-side failures raised by express.json() while reading the body. */
function asBodyParserError(err: unknown): BodyParserError | null {
  if (typeof err !== "object" || err === null || !("type" in err) || !("status" in err)) {
    return null;
  }
  const { type, status } = err;
  if (typeof type !== "string" || typeof status !== "number" || status < 400 || status >= 500) {
    return null;
  }
  return { type, status };
}

/** Express 4 does not route promise rejections to error middleware on its own. */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export const notFoundHandler: RequestHandler = (req, res) => {
  const body: ErrorBody = { error: `Cannot ${req.method} ${req.path}` };
  res.status(404).json(body);
};

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (res.headersSent) {
    // Streaming responses report their own failures in-band.
    log.error("error.after_headers", { method: req.method, path: req.path, ...describeError(err) });
    if (!res.writableEnded) {
      res.end();
    }
    return;
  }

  if (err instanceof ZodError) {
    const body: ErrorBody = { error: "Invalid request payload", details: err.issues };
    res.status(400).json(body);
    return;
  }

  const bodyError = asBodyParserError(err);
  if (bodyError) {
    const body: ErrorBody = { error: BODY_ERROR_MESSAGES[bodyError.type] ?? "Invalid request body" };
    res.status(bodyError.status).json(body);
    return;
  }

  if (err instanceof HttpError) {
    if (err.status >= 500) {
      log.error("request.failed", { method: req.method, path: req.path, status: err.status, ...describeError(err) });
    }
    const body: ErrorBody = err.details === undefined ? { error: err.message } : { error: err.message, details: err.details };
    res.status(err.status).json(body);
    return;
  }

  log.error("request.unhandled", { method: req.method, path: req.path, ...describeError(err) });
  const body: ErrorBody = { error: "Internal server error" };
  res.status(500).json(body);
};
