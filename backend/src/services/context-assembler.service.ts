/**
 * Context Assembler
 *
 * Picks the subset of the card data a detected intent needs, so the text
 * handed to the LLM stays bounded whatever the size of the documents.
 */

import { INTENT_FIELDS, isSpendingCategoryIntent } from "./intent-detector.service";
import type {
    AssembledContext,
    CardDataset,
    CardRecord,
    ContextPolicy,
    ExtractedEntities,
    Intent,
} from "../types";

const REWARD_INTENTS: readonly Intent[] = [
    "reward_comparison",
    "reward_calculation",
    "reward_rate",
    "accrual_exclusions",
    "reward_capping",
];

/**
 * Bank-wide `common_terms` entry that goes with a fee intent
 */
const COMMON_TERM_FIELDS: Readonly<Partial<Record<Intent, string>>> = {
    foreign_currency_markup: "foreign_currency_markup",
    cash_withdrawal: "cash_withdrawal",
    late_payment: "late_payment_fees",
    interest_rate: "finance_charges",
};

// Never listed in the unscoped fallback: identity keys plus every field an intent owns
const CLAIMED_FIELDS = new Set<string>([
    "id",
    "name",
    "rewards",
    ...Object.values(INTENT_FIELDS).filter(
        (field): field is string => typeof field === "string"
    ),
]);

export function getContextPolicy(intent: Intent): ContextPolicy {
    if (REWARD_INTENTS.includes(intent)) {
        return { kind: "rewards" };
    }

    if (isSpendingCategoryIntent(intent)) {
        return { kind: "category", category: intent };
    }

    const field = INTENT_FIELDS[intent];
    if (!field) {
        throw new Error(`No context policy for intent: ${intent}`);
    }

    const commonTerm = COMMON_TERM_FIELDS[intent];
    return commonTerm ? { kind: "field", field, commonTerm } : { kind: "field", field };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick(source: Record<string, unknown>, keys: readonly string[]): Record<string, unknown> {
    const subset: Record<string, unknown> = {};
    for (const key of keys) {
        if (source[key] !== undefined) {
            subset[key] = source[key];
        }
    }
    return subset;
}

export function resolveCardScope(entities: ExtractedEntities, dataset: CardDataset): CardRecord[] {
    const named = Array.from(entities.cardNames)
        .map((name) => dataset.cards.get(name))
        .filter((card): card is CardRecord => card !== undefined);

    return named.length > 0 ? named : Array.from(dataset.cards.values());
}

function addCommonTerm(
    context: AssembledContext,
    bank: string,
    key: string,
    value: unknown
): void {
    if (value === undefined) return;
    const commonTerms = context.commonTerms ?? {};
    commonTerms[bank] = { ...(commonTerms[bank] ?? {}), [key]: value };
    context.commonTerms = commonTerms;
}

/**
 * Assemble the context subset for an intent and the extracted entities.
 * `focus` is a card-field intent a comparison is about; its field is
 * added next to the rewards block.
 */
export function assembleContext(
    intent: Intent | null,
    entities: ExtractedEntities,
    dataset: CardDataset,
    focus: Intent | null = null
): AssembledContext {
    const context: AssembledContext = { intent, cards: {} };

    if (intent === null) {
        if (entities.cardNames.size > 0) {
            // General question about named cards: card-only context
            for (const card of resolveCardScope(entities, dataset)) {
                context.cards[card.name] = { ...card.terms };
            }
            return context;
        }

        context.availableCards = Array.from(dataset.cards.keys());
        for (const card of dataset.cards.values()) {
            const unclaimed = Object.keys(card.terms).filter((key) => !CLAIMED_FIELDS.has(key));
            context.cards[card.name] = pick(card.terms, unclaimed);
        }
        return context;
    }

    const policy = getContextPolicy(intent);
    const focusPolicy = focus === null ? null : getContextPolicy(focus);

    for (const card of resolveCardScope(entities, dataset)) {
        switch (policy.kind) {
            case "rewards": {
                context.cards[card.name] = pick(card.terms, ["rewards"]);
                break;
            }
            case "category": {
                const rewards = card.terms.rewards;
                context.cards[card.name] = rewards
                    ? { rewards: pick(rewards, ["accrual_exclusions", "capping_per_statement_cycle"]) }
                    : {};

                const surcharges = dataset.commonTerms.get(card.bank)?.surcharge_fees;
                if (isRecord(surcharges)) {
                    addCommonTerm(context, card.bank, "surcharge_fees", pick(surcharges, [policy.category]));
                }
                break;
            }
            case "field": {
                context.cards[card.name] = pick(card.terms, [policy.field]);

                if (policy.commonTerm) {
                    const commonTerms = dataset.commonTerms.get(card.bank);
                    addCommonTerm(context, card.bank, policy.commonTerm, commonTerms?.[policy.commonTerm]);
                }
                break;
            }
        }

        if (focusPolicy?.kind === "field") {
            Object.assign(context.cards[card.name], pick(card.terms, [focusPolicy.field]));

            if (focusPolicy.commonTerm) {
                const commonTerms = dataset.commonTerms.get(card.bank);
                addCommonTerm(context, card.bank, focusPolicy.commonTerm, commonTerms?.[focusPolicy.commonTerm]);
            }
        }
    }

    return context;
}
