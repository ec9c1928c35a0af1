/**
 * Follow-up question suggestions.
 *
 * Deterministic: intent templates, context clues from the extracted entities
 * and the conversation so far, scored and trimmed to the top three.
 */

import type { Category, ConversationExchange, Intent } from "../types";

type FollowupTopic =
    | "reward_calculation"
    | "feature_comparison"
    | "general_query"
    | "redemption_query"
    | "lounge_access"
    | "miles_transfer"
    | "fee_query";

export interface FollowupInput {
    query: string;
    intent: Intent | null;
    cards: string[];
    availableCards: string[];
    spendAmount: number | null;
    category: Category | null;
    history?: ConversationExchange[];
}

const MAX_FOLLOWUPS = 3;
const TEMPLATES_PER_TOPIC = 2;

const FOLLOWUP_TEMPLATES: Record<FollowupTopic, readonly string[]> = {
    reward_calculation: [
        "Would you like to compare this with the other card's rewards?",
        "Would you like to know about any spending caps for this category?",
        "Should I calculate the annual rewards for your typical spending pattern?",
    ],
    feature_comparison: [
        "Which specific feature matters most to you?",
        "Are you interested in the joining and annual fees comparison?",
        "Would you like to see a side-by-side benefits comparison?",
    ],
    general_query: [
        "Would you like more details about any specific aspect?",
        "Should I help you with a spending scenario calculation?",
        "Do you have questions about eligibility or application?",
    ],
    redemption_query: [
        "Would you like to know the best redemption options for maximum value?",
        "Should I explain the redemption process step-by-step?",
        "Do you want to know about any redemption restrictions or expiry?",
    ],
    lounge_access: [
        "Would you like to know about international lounge access?",
        "Are you interested in guest access policies?",
        "Do you want to compare lounge networks between cards?",
    ],
    miles_transfer: [
        "Would you like to know about transfer ratios to specific airlines?",
        "Are you interested in transfer time and fees?",
        "Do you want to calculate the value of transferred miles?",
    ],
    fee_query: [
        "Would you like to know about fee waiver conditions?",
        "Would you like to compare the fee vs benefits value?",
        "Are you interested in ways to offset the annual fee?",
    ],
};

const FEE_INTENTS: readonly Intent[] = [
    "annual_fee_reversal_spend_threshold",
    "joining_fee",
    "annual_fee",
    "foreign_currency_markup",
    "cash_withdrawal",
    "late_payment",
    "interest_rate",
];

const REWARD_INTENTS: readonly Intent[] = [
    "reward_calculation",
    "reward_rate",
    "reward_capping",
    "accrual_exclusions",
];

const TRAVEL_CATEGORIES: readonly Category[] = ["hotel", "flight", "travel"];

function topicFor(intent: Intent | null): FollowupTopic {
    if (intent === null) return "general_query";
    if (REWARD_INTENTS.includes(intent)) return "reward_calculation";
    if (FEE_INTENTS.includes(intent)) return "fee_query";

    switch (intent) {
        case "reward_comparison":
            return "feature_comparison";
        case "reward_redemption":
            return "redemption_query";
        case "lounge_access":
            return "lounge_access";
        case "miles_transfer":
            return "miles_transfer";
        default:
            return "general_query";
    }
}

function contextFollowups(input: FollowupInput): string[] {
    const followups: string[] = [];
    const lowerQuery = input.query.toLowerCase();

    if (input.cards.length === 1) {
        const other = input.availableCards.find((name) => name !== input.cards[0]);
        if (other) {
            followups.push(`Would you like to compare this with the ${other}?`);
        }
    } else if (input.cards.length === 0 && input.availableCards.length > 1) {
        followups.push(
            `Which card are you most interested in - ${input.availableCards.join(" or ")}?`
        );
    }

    if (input.spendAmount !== null) {
        if (input.spendAmount >= 100000) {
            followups.push(
                "For this spending level, would you like to know about tier benefits and milestone rewards?"
            );
        } else if (input.spendAmount >= 50000) {
            followups.push("Would you like to see how to maximize rewards for this spending amount?");
        } else {
            followups.push("Are you looking to understand rewards for regular monthly spending?");
        }
    }

    if (input.category !== null && TRAVEL_CATEGORIES.includes(input.category)) {
        followups.push(
            "Are you interested in travel insurance benefits?",
            "Would you like to know about airport lounge access?"
        );
    }
    if (input.category === "dining") {
        followups.push("Would you like to know about dining offers and discounts?");
    }
    if (input.category === "fuel") {
        followups.push("Would you like to know about fuel surcharge waivers?");
    }
    if (input.category === "education") {
        followups.push("Are you looking at education fee payment options?");
    }

    if (/\b(better|best|recommend)\b/.test(lowerQuery)) {
        followups.push("What's your primary use case - travel, dining, or general spending?");
    }
    if (/\bif\b/.test(lowerQuery)) {
        followups.push("Would you like me to calculate a few different spending scenarios?");
    }

    return followups;
}

function conversationFollowups(input: FollowupInput): string[] {
    const history = input.history ?? [];

    if (history.length === 0) {
        return ["Would you like to know about the application process and eligibility?"];
    }

    const followups = [
        "Since you're exploring multiple aspects, would you like a comprehensive card comparison?",
    ];
    const queries = [...history.map((exchange) => exchange.query), input.query].map((query) =>
        query.toLowerCase()
    );

    if (queries.some((query) => query.includes("fee")) && queries.some((query) => query.includes("reward"))) {
        followups.push("Would you like to see a cost-benefit analysis comparing both cards?");
    }
    if (queries.some((query) => query.includes("travel"))) {
        followups.push("Are you planning a specific trip? I can help optimize card benefits for your travel.");
    }

    return followups;
}

function scoreFollowup(followup: string, input: FollowupInput, topic: FollowupTopic): number {
    const lowerQuery = input.query.toLowerCase();
    const lowerFollowup = followup.toLowerCase();
    let score = 0;

    if (input.intent !== null && FOLLOWUP_TEMPLATES[topic].includes(followup)) {
        score += 10;
    }

    const queryWords = new Set(lowerQuery.split(/\s+/));
    const shared = new Set(lowerFollowup.split(/\s+/).filter((word) => queryWords.has(word)));
    score += shared.size * 2;

    if (lowerQuery.includes("compare") && lowerFollowup.includes("compar")) score += 5;
    if (lowerQuery.includes("reward") && lowerFollowup.includes("reward")) score += 5;
    if (lowerQuery.includes("fee") && lowerFollowup.includes("fee")) score += 5;

    if (followup.startsWith("Would you like more details")) score -= 2;

    if (["calculate", "compare", "explain", "help"].some((word) => lowerFollowup.includes(word))) {
        score += 3;
    }

    return score;
}

/**
 * Up to three follow-up questions, best first
 */
export function generateFollowups(input: FollowupInput): string[] {
    const topic = topicFor(input.intent);

    const candidates = Array.from(
        new Set([
            ...FOLLOWUP_TEMPLATES[topic].slice(0, TEMPLATES_PER_TOPIC),
            ...contextFollowups(input),
            ...conversationFollowups(input),
        ])
    );

    return candidates
        .map((followup, index) => ({ followup, index, score: scoreFollowup(followup, input, topic) }))
        .sort((a, b) => b.score - a.score || a.index - b.index)
        .slice(0, MAX_FOLLOWUPS)
        .map((entry) => entry.followup);
}
