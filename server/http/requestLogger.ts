import type { RequestHandler } from "express";
import { createLogger, type Logger } from "../config/logger.js";

/** One line per request, written when the response finishes or the client goes away. */
export function requestLogger(logger: Logger = createLogger("http")): RequestHandler {
  return (req, res, next) => {
    const startedAtMs = Date.now();
    let logged = false;

    const done = (outcome: "finished" | "closed") => {
      if (logged) {
        return;
      }
      logged = true;
      logger.info("request", {
        method: req.method,
        path: req.originalUrl.split("?")[0],
        status: res.statusCode,
        outcome,
        elapsedMs: Date.now() - startedAtMs,
      });
    };

    res.on("finish", () => done("finished"));
    res.on("close", () => done(res.writableFinished ? "finished" : "closed"));
    next();
  };
}
