/**
 * Bot Routes Registration
 *
 * Purpose:
 * Registers the Bot Framework messaging endpoint. Requests must be JSON;
 * the envelope is validated before it reaches the adapter.
 *
 * Layer: Bot (route setup)
 */

import type { Express } from "express";
import express from "express";
import { activityEnvelopeSchema, type ActivityEnvelope } from "@shared/schema";
import { requireJsonContent } from "../middleware/security";
import { validate } from "../middleware/validation";
import { logError } from "../utils/errorHandler";
import type { ActivityProcessor } from "./connector";

export function registerBotRoutes(app: Express, processor: ActivityProcessor) {
  app.post(
    "/api/messages",
    requireJsonContent,
    express.json(),
    validate({ body: activityEnvelopeSchema }),
    async (req, res) => {
      const activity: ActivityEnvelope = req.body;
      const authHeader = req.get("Authorization") ?? "";

      try {
        const outcome = await processor.process(activity, authHeader);
        if (outcome.body !== undefined) {
          return res.status(outcome.status).json(outcome.body);
        }
        return res.status(outcome.status).end();
      } catch (error) {
        logError("BotRoutes", error);
        return res.status(500).end();
      }
    },
  );
}
