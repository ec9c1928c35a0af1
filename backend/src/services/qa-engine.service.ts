/**
 * Question answering loop:
 * classify + extract -> assemble context -> calculator or LLM -> text
 */

import { NOT_FOUND_ANSWER, isAnswerNotFound } from "../config/constants";
import { buildProviderPolicy, generateAnswer, type ProviderPolicy } from "../rag/llm";
import { getCardData } from "./card-data.service";
import { assembleContext, resolveCardScope } from "./context-assembler.service";
import { extractEntities } from "./entity-extractor.service";
import { generateFollowups } from "./followup.service";
import { detectComparisonFocus, detectQueryIntent } from "./intent-detector.service";
import { calculateRewards, renderCalculations } from "./reward-calculator.service";
import type {
    AnswerSource,
    CardDataset,
    ConversationExchange,
    ExtractedEntities,
    Intent,
    QueryResponse,
    RewardCalculation,
} from "../types";

export interface AnswerOptions {
    dataset?: CardDataset;
    policy?: ProviderPolicy;
    history?: ConversationExchange[];
    debug?: boolean;
}

export function normalizeQuery(input: string): string {
    return input.replace(/\s+/g, " ").trim();
}

/**
 * Numeric reward questions are answered by the calculator, not the LLM
 */
export function isCalculatorQuestion(intent: Intent | null, entities: ExtractedEntities): boolean {
    return (
        (intent === "reward_calculation" || intent === "reward_comparison") &&
        entities.spendAmount !== null &&
        entities.spendAmount > 0
    );
}

export async function answerQuery(
    query: string,
    options: AnswerOptions = {}
): Promise<QueryResponse> {
    const dataset = options.dataset ?? getCardData();
    const normalizedQuery = normalizeQuery(query);

    const intent = detectQueryIntent(normalizedQuery);
    const entities = extractEntities(normalizedQuery, dataset);
    const focus = intent === "reward_comparison" ? detectComparisonFocus(normalizedQuery) : null;
    const context = assembleContext(intent, entities, dataset, focus);

    console.log(
        `[QUERY] intent=${intent ?? "none"} focus=${focus ?? "none"} cards=${entities.cardNames.size} amount=${entities.spendAmount ?? "N/A"} category=${entities.category ?? "N/A"}`
    );

    let answer: string;
    let source: AnswerSource;
    let calculations: RewardCalculation[] = [];
    let policy: ProviderPolicy | null = null;

    if (isCalculatorQuestion(intent, entities) && entities.spendAmount !== null) {
        const spendAmount = entities.spendAmount;
        calculations = resolveCardScope(entities, dataset).map((card) =>
            calculateRewards(card, spendAmount, entities.category)
        );
        answer = renderCalculations(calculations, intent === "reward_comparison");
        source = "calculator";
    } else {
        policy = options.policy ?? buildProviderPolicy();
        answer = await generateAnswer(normalizedQuery, context, intent, {
            policy,
            history: options.history,
        });
        source = "llm";

        // One fixed wording for "not in the data", whatever the provider said
        if (isAnswerNotFound(answer)) {
            console.warn(`[QUERY] No answer found in card data for "${normalizedQuery}"`);
            answer = NOT_FOUND_ANSWER;
        }
    }

    const response: QueryResponse = {
        query: normalizedQuery,
        intent,
        cards: Array.from(entities.cardNames),
        spendAmount: entities.spendAmount,
        category: entities.category,
        answer,
        source,
        calculations,
        followups: generateFollowups({
            query: normalizedQuery,
            intent,
            cards: Array.from(entities.cardNames),
            availableCards: Array.from(dataset.cards.keys()),
            spendAmount: entities.spendAmount,
            category: entities.category,
            history: options.history,
        }),
    };

    if (options.debug) {
        response.debug = {
            context,
            providers: policy ? policy.providers.map((provider) => provider.name) : [],
        };
    }

    return response;
}
