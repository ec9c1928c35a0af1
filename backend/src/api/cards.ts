import { Router, Request, Response } from "express";
import { getCardData } from "../services/card-data.service";

const router = Router();

/**
 * GET /api/cards
 * Lists every loaded card, and whether the reward calculator knows it.
 */
router.get("/", (_req: Request, res: Response) => {
    try {
        const dataset = getCardData();
        const cards = Array.from(dataset.cards.values());

        return res.status(200).json({
            cards: cards.map(card => ({
                name: card.name,
                bank: card.bank,
                cardId: card.cardId,
                calculatorSupported: card.cardId !== null
            })),
            count: cards.length
        });
    } catch (error) {
        console.error("Error fetching cards:", error);
        return res.status(500).json({
            error: "Failed to fetch card list"
        });
    }
});

export default router;
