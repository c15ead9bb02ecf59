import { Router } from "express";
import { z } from "zod";
import { ProductParserService } from "../crawlers/productParser";
import { Logger } from "../lib/logger";

const urlParam = z.string().trim().min(1, "url is required");

// Limits pass through as sent; the collector clamps them and falls back on bad input.
const offersQuerySchema = z.object({
  url: urlParam,
  timeout_limit: z.unknown().optional(),
  count_limit: z.unknown().optional(),
  sort: z.unknown().optional()
});

const commentsQuerySchema = z.object({
  url: urlParam,
  date_to: z.string().optional()
});

export function createProductRouter(parser: ProductParserService, logger: Logger): Router {
  const router = Router();
  const routeLogger = logger.child("routes");

  router.get("/health", async (_request, response) => {
    const health = await parser.health();
    routeLogger.debug("health_requested", { ...health });
    response.status(health.ok ? 200 : 503).json(health);
  });

  router.get("/product/offers", async (request, response) => {
    const parsed = offersQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      routeLogger.warn("offers_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      routeLogger.info("offers_requested", { ...parsed.data });
      const view = await parser.getOffers(parsed.data.url, {
        timeoutLimit: parsed.data.timeout_limit,
        countLimit: parsed.data.count_limit,
        priceSort: parsed.data.sort
      });
      response.json(view);
    } catch (error) {
      const message = error instanceof Error ? error.message : "failed to parse offers";
      routeLogger.error("offers_request_failed", { url: parsed.data.url, error, message });
      response.status(500).json({ error: message });
    }
  });

  router.get("/product/comments", async (request, response) => {
    const parsed = commentsQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      routeLogger.warn("comments_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      routeLogger.info("comments_requested", { ...parsed.data });
      const view = await parser.getComments(parsed.data.url, { dateTo: parsed.data.date_to });
      response.json(view);
    } catch (error) {
      const message = error instanceof Error ? error.message : "failed to parse comments";
      routeLogger.error("comments_request_failed", { url: parsed.data.url, error, message });
      response.status(500).json({ error: message });
    }
  });

  return router;
}
