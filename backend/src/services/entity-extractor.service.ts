/**
 * Entity extraction: card names, spend amount and spending category.
 * Pure functions over the query text (and the loaded card names).
 */

import {
    CARD_ABBREVIATIONS,
    CARD_NAME_STOPWORDS,
    CATEGORY_KEYWORDS,
    SHORTHAND_MULTIPLIERS,
} from "../config/constants";
import { findCardById } from "./card-data.service";
import type { CardDataset, Category, ExtractedEntities } from "../types";

/**
 * Word-boundary alternation over a keyword list ("gas station" matches any spacing)
 */
export function buildKeywordPattern(keywords: readonly string[]): RegExp {
    const alternatives = keywords.map((keyword) => keyword.replace(/\s+/g, "\\s+"));
    return new RegExp(`\\b(${alternatives.join("|")})\\b`, "i");
}

const SHORTHAND_PATTERN = new RegExp(
    `(\\d+(?:\\.\\d+)?)\\s*(${SHORTHAND_MULTIPLIERS.map(([suffix]) => suffix).join("|")})\\b`,
    "gi"
);

/**
 * Rewrite Indian amount shorthand to rupees:
 * "20k" -> "20000", "2.5L" -> "250000", "1.5 Cr" -> "15000000", "₹1,00,000" -> "₹100000"
 */
export function normalizeCurrencyShorthand(query: string): string {
    const withoutGrouping = query.replace(/(\d),(?=\d)/g, "$1");

    return withoutGrouping.replace(
        SHORTHAND_PATTERN,
        (match: string, amount: string, suffix: string) => {
            const entry = SHORTHAND_MULTIPLIERS.find(
                ([candidate]) => candidate === suffix.toLowerCase()
            );
            if (!entry) return match;
            return String(Math.round(parseFloat(amount) * entry[1]));
        }
    );
}

/**
 * Spend amount in rupees: the largest integer in the normalized query.
 * Two independent quantities in one question resolve to the larger one.
 */
export function extractAmount(query: string): number | null {
    const literals = normalizeCurrencyShorthand(query).match(/\d+/g);
    if (!literals) return null;

    return Math.max(...literals.map((literal) => parseInt(literal, 10)));
}

/**
 * First category in table order with a keyword in the query
 */
export function extractCategory(query: string): Category | null {
    for (const [category, keywords] of CATEGORY_KEYWORDS) {
        if (buildKeywordPattern(keywords).test(query)) {
            return category;
        }
    }
    return null;
}

/**
 * "ICICI Bank Emeralde Private Metal Credit Card" -> ["icici", "emeralde", "private", "metal"]
 */
export function cardNameKeywords(cardName: string): string[] {
    const stopwords: readonly string[] = CARD_NAME_STOPWORDS;
    return cardName
        .toLowerCase()
        .split(/\s+/)
        .map((word) => word.replace(/[^a-z0-9]/g, ""))
        .filter((word) => word.length > 3 && !stopwords.includes(word));
}

/**
 * Card names mentioned in the query. Empty when none is named,
 * which callers read as "every card is in scope".
 */
export function extractCards(query: string, dataset: CardDataset): Set<string> {
    const lower = query.toLowerCase();
    const matched = new Set<string>();

    for (const [abbreviation, cardId] of Object.entries(CARD_ABBREVIATIONS)) {
        if (!lower.includes(abbreviation)) continue;
        const card = findCardById(dataset, cardId);
        if (card) matched.add(card.name);
    }

    for (const card of dataset.cards.values()) {
        if (cardNameKeywords(card.name).some((keyword) => lower.includes(keyword))) {
            matched.add(card.name);
        }
    }

    return matched;
}

export function extractEntities(query: string, dataset: CardDataset): ExtractedEntities {
    return {
        cardNames: extractCards(query, dataset),
        spendAmount: extractAmount(query),
        category: extractCategory(query),
    };
}
