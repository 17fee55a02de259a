import express from "express";
import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { BadRequestError, PersistenceError } from "../../../server/errors.js";
import { asyncHandler, errorHandler, notFoundHandler } from "../../../server/http/errorHandler.js";
import { requestLogger } from "../../../server/http/requestLogger.js";
import { withServer } from "../helpers.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function buildApp(): express.Express {
  const app = express();
  app.use(express.json({ limit: "1kb" }));
  app.post("/echo", (req, res) => {
    res.json(req.body);
  });
  app.get(
    "/bad",
    asyncHandler(async () => {
      throw new BadRequestError("Title is too long", { max: 200 });
    }),
  );
  app.get(
    "/zod",
    asyncHandler(async () => {
      z.object({ name: z.string() }).parse({});
    }),
  );
  app.get(
    "/store",
    asyncHandler(async () => {
      throw new PersistenceError("Failed to load session", { cause: new Error("SQLITE_BUSY") });
    }),
  );
  app.get(
    "/crash",
    asyncHandler(async () => {
      throw new Error("secret internals");
    }),
  );
  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}

describe("errorHandler", () => {
  it("maps HttpErrors to their status and body", async () => {
    await withServer(async (baseUrl) => {
      const res = await fetch(`${baseUrl}/bad`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Title is too long", details: { max: 200 } });
    }, buildApp);
  });

  it("answers validation failures with the zod issues", async () => {
    await withServer(async (baseUrl) => {
      const res = await fetch(`${baseUrl}/zod`);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "Invalid request payload", details: [{ path: ["name"] }] });
    }, buildApp);
  });

  it("logs server-side failures and hides unknown messages", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await withServer(async (baseUrl) => {
      const store = await fetch(`${baseUrl}/store`);
      expect(store.status).toBe(500);
      expect(await store.json()).toEqual({ error: "Failed to load session" });

      const crash = await fetch(`${baseUrl}/crash`);
      expect(crash.status).toBe(500);
      expect(await crash.json()).toEqual({ error: "Internal server error" });
    }, buildApp);

    const events = error.mock.calls.map(([line]) => String(line).split(" ").slice(0, 2).join(" "));
    expect(events).toEqual(["[http] request.failed", "[http] request.unhandled"]);
  });

  it("answers oversized and undecodable bodies with the client status", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    await withServer(async (baseUrl) => {
      const large = await fetch(`${baseUrl}/echo`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ prompt: "x".repeat(2048) }),
      });
      expect(large.status).toBe(413);
      expect(await large.json()).toEqual({ error: "Request body too large" });

      const charset = await fetch(`${baseUrl}/echo`, {
        method: "POST",
        headers: { "Content-Type": "application/json; charset=latin1" },
        body: "{}",
      });
      expect(charset.status).toBe(415);
      expect(await charset.json()).toEqual({ error: "Unsupported charset" });

      const small = await fetch(`${baseUrl}/echo`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ prompt: "hi" }),
      });
      expect(await small.json()).toEqual({ prompt: "hi" });
    }, buildApp);

    expect(error).not.toHaveBeenCalled();
  });

  it("answers unknown routes with 404", async () => {
    await withServer(async (baseUrl) => {
      const res = await fetch(`${baseUrl}/nope`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Cannot GET /nope" });
    }, buildApp);
  });
});

describe("requestLogger", () => {
  it("logs one line per finished request", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await withServer(
      async (baseUrl) => {
        await fetch(`${baseUrl}/ping?verbose=1`);
      },
      () => {
        const app = express();
        app.use(requestLogger());
        app.get("/ping", (_req, res) => {
          res.json({ ok: true });
        });
        return app;
      },
    );

    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toMatch(
      /^\[http\] request \{"method":"GET","path":"\/ping","status":200,"outcome":"finished","elapsedMs":\d+\}$/,
    );
  });
});
