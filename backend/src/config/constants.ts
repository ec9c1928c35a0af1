/**
 * Shared constants for the card terms assistant
 */

import type { CardId, Category, SurchargeCategory } from "../types";

/**
 * Prefix of the user-facing message returned when every LLM provider fails
 */
export const APOLOGY_PREFIX =
    "I apologize, but I'm having trouble processing your request right now. Please try again.";

/**
 * Answer returned in place of any LLM reply that says the data lacks the answer
 */
export const NOT_FOUND_ANSWER = "The card data does not contain this information.";

/**
 * Phrases that indicate the LLM couldn't find an answer
 */
export const FALLBACK_PHRASES = [
    "not available in the card data",
    "i don't know",
    "cannot find",
    "no information",
] as const;

/**
 * Indian currency shorthand multipliers.
 * Alternatives are ordered longest first so "lakh" is not read as "l".
 */
export const SHORTHAND_MULTIPLIERS: ReadonlyArray<readonly [string, number]> = [
    ["crores", 10_000_000],
    ["crore", 10_000_000],
    ["cr", 10_000_000],
    ["lakhs", 100_000],
    ["lakh", 100_000],
    ["lacs", 100_000],
    ["lac", 100_000],
    ["l", 100_000],
    ["thousand", 1_000],
    ["k", 1_000],
];

/**
 * Short names users type for the calculator-backed cards
 */
export const CARD_ABBREVIATIONS: Readonly<Record<string, CardId>> = {
    epm: "icici_epm",
    atlas: "axis_atlas",
};

/**
 * Words never used as card-name keywords
 */
export const CARD_NAME_STOPWORDS = ["bank", "card", "credit"] as const;

/**
 * Spending categories carrying a bank surcharge, in intent precedence order
 */
export const SURCHARGE_CATEGORIES: readonly SurchargeCategory[] = [
    "utilities",
    "fuel",
    "rent",
    "education",
    "gaming",
    "wallet",
    "insurance",
    "government",
    "gold",
];

/**
 * Category keyword table. Keywords are matched on word boundaries and the
 * first category (in this order) with a matching keyword wins.
 */
export const CATEGORY_KEYWORDS: ReadonlyArray<readonly [Category, readonly string[]]> = [
    ["hotel", ["hotel", "hotels", "resort", "resorts"]],
    ["flight", ["flight", "flights", "airline", "airlines", "air ticket", "air tickets"]],
    ["travel", ["travel", "trip", "trips", "holiday", "vacation", "train", "irctc"]],
    ["dining", ["dining", "restaurant", "restaurants", "food", "eating out", "swiggy", "zomato"]],
    ["grocery", ["grocery", "groceries", "supermarket"]],
    ["fuel", ["fuel", "petrol", "diesel", "gas station"]],
    ["utilities", ["utility", "utilities", "electricity", "water bill", "bill payment", "bill payments"]],
    ["telecom", ["telecom", "mobile recharge", "broadband", "dth", "postpaid"]],
    ["rent", ["rent", "house rent"]],
    ["education", ["education", "school fees", "college fees", "tuition", "university"]],
    ["gaming", ["gaming", "game", "games"]],
    ["wallet", ["wallet", "wallets", "wallet load", "paytm", "phonepe"]],
    ["insurance", ["insurance"]],
    ["government", ["government", "govt", "tax", "taxes", "challan"]],
    ["gold", ["gold", "jewellery", "jewelry"]],
];

/**
 * Check if answer contains fallback phrases
 */
export function isAnswerNotFound(answer: string): boolean {
    if (!answer) return true;
    const lowerAnswer = answer.toLowerCase();
    return FALLBACK_PHRASES.some((phrase) => lowerAnswer.includes(phrase));
}
