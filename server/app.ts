/**
 * Express application factory.
 * Kept separate from index.ts so tests can mount the app without listening.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import type { ActivityProcessor } from "./bot/connector";
import { registerBotRoutes } from "./bot/routes";
import { addSecurityHeaders } from "./middleware/security";
import { handleRouteError } from "./utils/errorHandler";

export type AppDeps = {
  processor: ActivityProcessor;
};

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable("x-powered-by");
  app.use(addSecurityHeaders);

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  registerBotRoutes(app, deps.processor);

  // Errors passed to next() by middleware (415, validation, JSON parse)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, err, "HTTP");
  });

  return app;
}
