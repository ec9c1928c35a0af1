import { Router, Request, Response } from "express";
import { z } from "zod";
import { answerQuery } from "../services/qa-engine.service";
import { ENV } from "../config/env";

const router = Router();

const exchangeSchema = z.object({
  query: z.string(),
  response: z.string(),
});

const queryBodySchema = z.object({
  query: z.unknown(),
  history: z.array(exchangeSchema).optional(),
  debug: z.boolean().optional(),
});

/**
 * POST /api/query
 */
router.post("/query", async (req: Request, res: Response) => {
  try {
    const body = queryBodySchema.safeParse(req.body ?? {});

    if (!body.success) {
      return res.status(400).json({
        error: "Invalid request body",
      });
    }

    const { query, history = [] } = body.data;

    // 🔒 Disable debug in production
    const debug =
      (body.data.debug ?? false) && ENV.ENABLE_DEBUG && ENV.NODE_ENV !== "production";

    // -----------------------------
    // Validate query
    // -----------------------------
    if (typeof query !== "string") {
      return res.status(400).json({
        error: "Query text is required",
      });
    }

    if (query.trim().length === 0) {
      return res.status(400).json({
        error: "Query text cannot be empty",
      });
    }

    const response = await answerQuery(query, { history, debug });

    return res.json(response);
  } catch (error) {
    console.error("Query API error:", error);
    return res.status(500).json({
      error: "Failed to process query",
    });
  }
});

export default router;
