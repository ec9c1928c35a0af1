/**
 * Shared TypeScript interfaces for the card terms assistant
 */

import type { CardTerms, CommonTerms } from "../services/card-data.service";

// ================= CARD DATA TYPES =================

/**
 * Cards with a hard-coded reward calculator
 */
export type CardId = "icici_epm" | "axis_atlas";

export interface CardRecord {
    name: string;
    bank: string;
    cardId: CardId | null;
    terms: CardTerms;
}

export interface CardDocument {
    bankName: string;
    commonTerms: CommonTerms | null;
    cards: CardRecord[];
}

export interface CardDataset {
    cards: Map<string, CardRecord>;
    commonTerms: Map<string, CommonTerms>;
    diagnostics: string[];
}

// ================= QUERY UNDERSTANDING TYPES =================

/**
 * Spending categories with a bank surcharge entry
 */
export type SurchargeCategory =
    | "utilities"
    | "fuel"
    | "rent"
    | "education"
    | "gaming"
    | "wallet"
    | "insurance"
    | "government"
    | "gold";

export type Category =
    | SurchargeCategory
    | "hotel"
    | "flight"
    | "travel"
    | "dining"
    | "grocery"
    | "telecom";

export type Intent =
    | "annual_fee_reversal_spend_threshold"
    | "lounge_access"
    | "reward_comparison"
    | "reward_calculation"
    | "welcome_benefits"
    | "renewal_benefits"
    | "milestone_benefits"
    | "miles_transfer"
    | "reward_redemption"
    | "tier_structure"
    | "accrual_exclusions"
    | "reward_capping"
    | "insurance_cover"
    | SurchargeCategory
    | "joining_fee"
    | "annual_fee"
    | "foreign_currency_markup"
    | "cash_withdrawal"
    | "late_payment"
    | "interest_rate"
    | "golf"
    | "dining_benefits"
    | "concierge"
    | "eligibility"
    | "reward_rate";

export interface ExtractedEntities {
    cardNames: Set<string>;
    spendAmount: number | null;
    category: Category | null;
}

// ================= CONTEXT TYPES =================

export type ContextPolicy =
    | { kind: "rewards" }
    | { kind: "category"; category: SurchargeCategory }
    | { kind: "field"; field: string; commonTerm?: string };

export interface AssembledContext {
    intent: Intent | null;
    cards: Record<string, Record<string, unknown>>;
    commonTerms?: Record<string, Record<string, unknown>>;
    availableCards?: string[];
}

// ================= REWARD CALCULATION TYPES =================

export type RewardUnit = "points" | "EDGE Miles";

/**
 * A card milestone whose annual spend threshold the spend reaches
 */
export interface MilestoneReached {
    key: string;
    threshold: number;
    description: string;
}

export interface RewardCalculationResult {
    kind: "result";
    card: string;
    cardId: CardId;
    spendAmount: number;
    earned: number;
    unit: RewardUnit;
    rateDescription: string;
    trace: string;
    category: Category | null;
    excluded: boolean;
    capApplied: boolean;
    milestones: MilestoneReached[];
}

export interface UnsupportedCalculation {
    kind: "unsupported";
    card: string;
    error: string;
}

export type RewardCalculation = RewardCalculationResult | UnsupportedCalculation;

// ================= ANSWER TYPES =================

export interface ConversationExchange {
    query: string;
    response: string;
}

export type AnswerSource = "calculator" | "llm";

export interface QueryResponse {
    query: string;
    intent: Intent | null;
    cards: string[];
    spendAmount: number | null;
    category: Category | null;
    answer: string;
    source: AnswerSource;
    calculations: RewardCalculation[];
    followups: string[];
    debug?: DebugInfo;
}

export interface DebugInfo {
    context: AssembledContext;
    providers: string[];
}
