import type { Server } from "node:http";
import express, { NextFunction, Request, RequestHandler, Response } from "express";
import { AppEnvironment } from "../config/env.js";
import { ZodiacLookupError } from "../insight/errors.js";
import { InsightDeps } from "../insight/resolveInsight.js";
import { errorMessage, insightLog } from "../logging/insightLog.js";
import { handleHealth, handleInsight, handleZodiacLookup, HandlerResult } from "./handlers.js";

export type AppOptions = {
  appEnv: AppEnvironment;
};

function route<T>(handler: (req: Request) => HandlerResult<T> | Promise<HandlerResult<T>>): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req))
      .then((result) => {
        res.status(result.status).json(result.body);
      })
      .catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      insightLog({
        event: "http.request",
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - startedAt,
      });
    });
    next();
  };
}

/**
 * HTTP surface. The cache and LLM settings come in through deps, so every
 * app instance (and every test) owns its own state.
 */
export function createApp(deps: InsightDeps, options: AppOptions): express.Express {
  const app = express();

  if (options.appEnv === "development") {
    app.use(requestLogger());
  }

  app.use(express.json());

  app.get("/health", route(() => handleHealth()));

  app.get(
    "/api/zodiac",
    route((req) => handleZodiacLookup({ date: req.query.date, language: req.query.language }, deps))
  );

  app.post("/api/insight", route((req) => handleInsight(req.body, deps)));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: "Invalid JSON body" });
      return;
    }

    insightLog({
      event: "http.request.failed",
      method: req.method,
      path: req.path,
      error_message: errorMessage(err),
    });

    if (err instanceof ZodiacLookupError) {
      res.status(500).json({ error: "Failed to get zodiac information" });
      return;
    }

    res.status(500).json({ error: `Internal server error: ${errorMessage(err)}` });
  });

  return app;
}

/** Listen on host:port. Rejects when the socket cannot be bound (e.g. EADDRINUSE). */
export function startServer(app: express.Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
    server.once("error", reject);
  });
}
