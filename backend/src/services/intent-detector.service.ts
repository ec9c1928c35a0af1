/**
 * Query Intent Detection Service
 *
 * Maps a free-text card question to at most one intent.
 *
 * Uses deterministic pattern matching (regex) over an ordered rule table:
 * - Fast execution (no LLM calls)
 * - Predictable behavior: the first matching rule wins
 * - Easy testing: the precedence is exported as a literal list
 *
 * Stage order: fee waiver, lounge access, reward comparison, benefit-specific
 * rules, single spending categories, then the generic field fallback.
 */

import { CATEGORY_KEYWORDS, SURCHARGE_CATEGORIES } from "../config/constants";
import { buildKeywordPattern } from "./entity-extractor.service";
import type { Intent, SurchargeCategory } from "../types";

export type IntentStage =
    | "fee_waiver"
    | "lounge"
    | "reward_comparison"
    | "benefit"
    | "spending_category"
    | "field";

export interface IntentRule {
    intent: Intent;
    stage: IntentStage;
    patterns: readonly RegExp[];
}

/**
 * Top-level card field answering each field-scoped intent
 */
export const INTENT_FIELDS: Readonly<Partial<Record<Intent, string>>> = {
    annual_fee_reversal_spend_threshold: "fees",
    lounge_access: "lounge_access",
    welcome_benefits: "welcome_benefits",
    renewal_benefits: "renewal_benefits",
    milestone_benefits: "milestones",
    miles_transfer: "miles_transfer",
    reward_redemption: "reward_redemption",
    tier_structure: "tier_structure",
    insurance_cover: "insurance_cover",
    foreign_currency_markup: "fees",
    cash_withdrawal: "fees",
    late_payment: "fees",
    interest_rate: "fees",
    joining_fee: "fees",
    annual_fee: "fees",
    golf: "golf",
    dining_benefits: "dining_benefits",
    concierge: "concierge",
    eligibility: "eligibility",
};

function categoryRule(category: SurchargeCategory): IntentRule {
    const entry = CATEGORY_KEYWORDS.find(([name]) => name === category);
    return {
        intent: category,
        stage: "spending_category",
        patterns: entry ? [buildKeywordPattern(entry[1])] : [],
    };
}

export const INTENT_RULES: readonly IntentRule[] = [
    // ---------- fee waiver ----------
    {
        intent: "annual_fee_reversal_spend_threshold",
        stage: "fee_waiver",
        patterns: [
            // "spend to get the annual fee waived", "fee reversal threshold"
            /\bfees?\b.*\b(waive|waived|waiver|reversal|reversed|reverse|refund|refunded)\b/,
            // "waiver of joining fee"
            /\b(waive|waived|waiver|reversal|reversed|reverse)\b.*\bfees?\b/,
            /\bspend\b.*\b(avoid|save)\b.*\bfees?\b/,
        ],
    },

    // ---------- lounge ----------
    {
        intent: "lounge_access",
        stage: "lounge",
        patterns: [
            /\blounges?\b/,
            /\bpriority\s+pass\b/,
            /\bairport\s+(access|visits?)\b/,
        ],
    },

    // ---------- reward comparison ----------
    {
        intent: "reward_comparison",
        stage: "reward_comparison",
        patterns: [
            /\bcompar(e|ed|ing|ison)\b/,
            /\bvs\b|\bversus\b/,
            // "which card is better", "which one gives more miles"
            /\bwhich\s+(card|one)\b.*\b(better|best|more|higher)\b/,
            /\bbetter\b.*\b(rewards?|points|miles|card)\b/,
        ],
    },

    // ---------- benefit-specific ----------
    {
        intent: "welcome_benefits",
        stage: "benefit",
        patterns: [
            /\b(welcome|joining)\s+(benefits?|bonus|gifts?|vouchers?|offers?|rewards?)\b/,
            // "for paying joining fee, how many miles do I get" asks for the benefit
            /\bfor\s+paying\s+(the\s+)?joining\s+fee\b/,
            /\bwhen\s+i\s+(first\s+)?get\b/,
        ],
    },
    {
        intent: "renewal_benefits",
        stage: "benefit",
        patterns: [/\brenewal\s+(benefits?|bonus|vouchers?|rewards?)\b/],
    },
    {
        intent: "reward_calculation",
        stage: "benefit",
        patterns: [
            /\bhow\s+many\s+(reward\s+|edge\s+)?(points|miles)\b/,
            /\bif\s+i\s+spend\b/,
            /\bcalculat(e|ion)\b/,
            /\b(points|miles|rewards?)\s+(for|on)\s+(₹|rs\.?\s*|inr\s*)?\d/,
        ],
    },
    {
        intent: "milestone_benefits",
        stage: "benefit",
        patterns: [/\bmilestones?\b/],
    },
    {
        intent: "miles_transfer",
        stage: "benefit",
        patterns: [
            /\btransfer(s|red|ring)?\b.*\b(miles|points|partners?|airlines?|hotels?)\b/,
            /\b(miles|points)\b.*\btransfer/,
        ],
    },
    {
        intent: "reward_redemption",
        stage: "benefit",
        patterns: [/\bredeem(ing|ed)?\b/, /\bredemptions?\b/],
    },
    {
        intent: "tier_structure",
        stage: "benefit",
        patterns: [/\btiers?\b/, /\b(silver|platinum)\b/],
    },
    {
        intent: "accrual_exclusions",
        stage: "benefit",
        patterns: [
            /\bexclu(de|ded|des|sion|sions)\b/,
            /\b(don't|do\s+not|doesn't|does\s+not|won't|not)\s+earn\b/,
            /\bno\s+(rewards?|points|miles)\b/,
        ],
    },
    {
        intent: "reward_capping",
        stage: "benefit",
        patterns: [
            /\bcap(s|ped|ping)?\b/,
            /\b(maximum|max)\s+(reward\s+)?(points|miles|rewards?)\b/,
            /\blimit\s+on\s+(reward\s+)?(points|miles|rewards?)\b/,
        ],
    },
    {
        intent: "insurance_cover",
        stage: "benefit",
        patterns: [
            /\b(travel|air\s+accident|accident|lost\s+card|baggage)\s+(insurance|cover|coverage)\b/,
            /\b(lost\s+card\s+)?liability\b/,
            /\binsurance\s+(cover|coverage|benefits?)\b/,
        ],
    },

    // ---------- single spending category ----------
    ...SURCHARGE_CATEGORIES.map(categoryRule),

    // ---------- generic field fallback ----------
    {
        intent: "foreign_currency_markup",
        stage: "field",
        patterns: [
            /\bforex\b/,
            /\bforeign\s+(currency|transactions?|exchange)\b/,
            /\bmark-?\s?up\b/,
            /\binternational\s+(transactions?|spends?)\b/,
        ],
    },
    {
        intent: "cash_withdrawal",
        stage: "field",
        patterns: [/\bcash\s+(advance|withdrawals?)\b/, /\batm\b/],
    },
    {
        intent: "late_payment",
        stage: "field",
        patterns: [/\blate\s+(payment|fees?)\b/, /\boverdue\b/],
    },
    {
        intent: "interest_rate",
        stage: "field",
        patterns: [/\binterest\b/, /\bfinance\s+charges?\b/, /\bapr\b/],
    },
    {
        intent: "joining_fee",
        stage: "field",
        patterns: [/\bjoining\s+(fees?|charges?)\b/],
    },
    {
        intent: "annual_fee",
        stage: "field",
        patterns: [
            /\b(annual|renewal)\s+(fees?|charges?)\b/,
            /\bfees?\b/,
            /\bcharges?\b/,
            /\bcost\b/,
        ],
    },
    {
        intent: "golf",
        stage: "field",
        patterns: [/\bgolf\b/],
    },
    {
        intent: "dining_benefits",
        stage: "field",
        patterns: [
            /\bdining\s+(benefits?|offers?|programme|program|discounts?)\b/,
            /\bculinary\b/,
        ],
    },
    {
        intent: "concierge",
        stage: "field",
        patterns: [/\bconcierge\b/],
    },
    {
        intent: "eligibility",
        stage: "field",
        patterns: [
            /\beligib(le|ility)\b/,
            /\bminimum\s+income\b/,
            /\bwho\s+can\s+apply\b/,
        ],
    },
    {
        intent: "reward_rate",
        stage: "field",
        patterns: [
            /\b(reward|earn|earning)\s+rates?\b/,
            /\b(points|miles)\s+per\b/,
            /\brewards?\b/,
            /\bpoints\b/,
            /\bmiles\b/,
        ],
    },
];

/**
 * The literal precedence order, first entry wins
 */
export const INTENT_PRECEDENCE: readonly Intent[] = INTENT_RULES.map((rule) => rule.intent);

function findRule(normalized: string): IntentRule | null {
    for (const rule of INTENT_RULES) {
        if (rule.patterns.some((pattern) => pattern.test(normalized))) {
            return rule;
        }
    }
    return null;
}

/**
 * Detect the intent of a user query
 *
 * @returns the first matching intent in precedence order, or null for a
 * general question (callers fall back to a card-only context)
 */
export function detectQueryIntent(query: string): Intent | null {
    if (!query || typeof query !== "string") {
        return null;
    }

    const normalized = query.trim().toLowerCase();

    if (normalized.length === 0) {
        return null;
    }

    const rule = findRule(normalized);

    if (rule) {
        console.log(`[INTENT] ${rule.intent} (${rule.stage}): "${query}"`);
        return rule.intent;
    }

    console.log(`[INTENT] No intent matched: "${query}"`);
    return null;
}

/**
 * What a comparison question compares, when it is not only rewards:
 * the first card-field rule after the comparison stage that matches
 * ("which card has better lost card liability" -> insurance_cover)
 */
export function detectComparisonFocus(query: string): Intent | null {
    const normalized = query.trim().toLowerCase();
    const firstBenefitRule = INTENT_RULES.findIndex((rule) => rule.stage === "benefit");

    const rule = INTENT_RULES.slice(firstBenefitRule).find(
        (candidate) =>
            INTENT_FIELDS[candidate.intent] !== undefined &&
            candidate.patterns.some((pattern) => pattern.test(normalized))
    );

    return rule ? rule.intent : null;
}

/**
 * Stage of the rule that produced an intent
 */
export function getIntentStage(intent: Intent): IntentStage {
    const rule = INTENT_RULES.find((candidate) => candidate.intent === intent);
    return rule ? rule.stage : "field";
}

export function isSpendingCategoryIntent(
    intent: Intent | null
): intent is SurchargeCategory {
    return (
        intent !== null &&
        SURCHARGE_CATEGORIES.some((category) => category === intent)
    );
}
