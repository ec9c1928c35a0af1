import { Router, Request, Response } from "express";
import { z } from "zod";
import { getCardData } from "../services/card-data.service";
import {
  extractAmount,
  extractCards,
  extractCategory,
} from "../services/entity-extractor.service";
import {
  calculateRewards,
  renderCalculations,
} from "../services/reward-calculator.service";
import type { CardDataset, CardRecord, Category } from "../types";

const router = Router();

const calculateBodySchema = z.object({
  card: z.string().trim().min(1, "card is required"),
  amount: z.union([z.number(), z.string()]),
  category: z.string().optional(),
});

/**
 * Exact card name first, then whatever the card extractor recognises
 */
function resolveCard(reference: string, dataset: CardDataset): CardRecord | CardRecord[] | null {
  const exact = dataset.cards.get(reference);
  if (exact) return exact;

  const matched = Array.from(extractCards(reference, dataset))
    .map((name) => dataset.cards.get(name))
    .filter((card): card is CardRecord => card !== undefined);

  if (matched.length === 0) return null;
  return matched.length === 1 ? matched[0] : matched;
}

/**
 * POST /api/calculate
 * Body: { card, amount, category? }. `amount` may be a number or text such as "2.5L".
 */
router.post("/calculate", (req: Request, res: Response) => {
  try {
    const body = calculateBodySchema.safeParse(req.body ?? {});

    if (!body.success) {
      return res.status(400).json({
        error: body.error.issues[0]?.message ?? "Invalid request body",
      });
    }

    const dataset = getCardData();
    const card = resolveCard(body.data.card, dataset);

    if (card === null) {
      return res.status(400).json({
        error: `Unknown card: ${body.data.card}`,
      });
    }
    if (Array.isArray(card)) {
      return res.status(400).json({
        error: `Ambiguous card reference, matches: ${card.map((c) => c.name).join(", ")}`,
      });
    }

    const amount =
      typeof body.data.amount === "number"
        ? body.data.amount
        : extractAmount(body.data.amount);

    if (amount === null || !Number.isFinite(amount) || amount <= 0) {
      return res.status(400).json({
        error: "amount must be a positive spend amount",
      });
    }

    let category: Category | null = null;
    if (body.data.category !== undefined && body.data.category.trim().length > 0) {
      category = extractCategory(body.data.category);
      if (category === null) {
        return res.status(400).json({
          error: `Unknown spending category: ${body.data.category}`,
        });
      }
    }

    const calculation = calculateRewards(card, amount, category);
    console.log(`[CALC] ${card.name} ₹${amount} category=${category ?? "N/A"}`);

    return res.json({
      calculation,
      answer: renderCalculations([calculation], false),
    });
  } catch (error) {
    console.error("Calculate API error:", error);
    return res.status(500).json({
      error: "Failed to calculate rewards",
    });
  }
});

export default router;
