// backend/src/rag/promptBuilder.ts

import type { AssembledContext, ConversationExchange, Intent } from "../types";

type PromptTemplate =
  | "rewards"
  | "exclusions"
  | "spending_category"
  | "fees"
  | "fee_waiver"
  | "welcome"
  | "milestones"
  | "travel"
  | "transfer"
  | "lifestyle"
  | "eligibility"
  | "general";

interface PromptBuilderInput {
  query: string;
  context: AssembledContext;
  history?: ConversationExchange[];
}

const MAX_HISTORY_EXCHANGES = 3;

const BASE_RULES = `
You are an expert advisor for Indian credit cards.

RULES:
- Answer ONLY from the card data provided with the question.
- Do NOT use external knowledge and do NOT guess.
- If the data does not cover the question, say the information is not available in the card data.
- Use Indian currency notation (₹, lakh, crore).
- Be concise: one or two sentences for simple questions, short sections for comparisons.
`.trim();

const TEMPLATES: Record<PromptTemplate, string> = {
  rewards: `
FOCUS: reward earning.
- Check the general rate and any category-specific rate before answering.
- Show every calculation step: Spend ÷ Spend Unit × Rate = Total.
- Apply monthly or statement-cycle caps where the data names them.
- When comparing cards, name the card that earns more.
`,
  exclusions: `
FOCUS: reward exclusions.
- Read "accrual_exclusions" for each card.
- A category not listed there earns the general rate.
- State clearly, per card, whether the category earns rewards.
`,
  spending_category: `
FOCUS: one spending category (utilities, fuel, rent, education, gaming, wallet, insurance, government, gold).
Answer BOTH parts in one response:
1. Fees: read "surcharge_fees" in the bank common terms, including any ₹ thresholds.
2. Rewards: whether the category is in "accrual_exclusions" and any statement-cycle cap.
`,
  fees: `
FOCUS: fees and charges.
- "joining fee" is the cost to get the card, "annual fee" the yearly renewal cost.
- Quote amounts exactly as written, with GST notes where present.
`,
  fee_waiver: `
FOCUS: annual fee waiver or reversal.
- State the spend threshold and the period it must be met in.
- Say whether the waiver applies to the joining fee, the annual fee, or both.
`,
  welcome: `
FOCUS: welcome and renewal benefits.
- "joining benefits" are what the cardholder RECEIVES, not the fee they pay.
- A question like "for paying the joining fee, how many miles do I get" asks for the welcome benefit.
`,
  milestones: `
FOCUS: milestone benefits.
- List each spend threshold with its benefit and period.
- A spend crossing several thresholds earns every benefit it crosses.
`,
  travel: `
FOCUS: travel benefits (lounge access, tiers, insurance cover).
- Separate domestic and international entitlements.
- Mention tier or spend conditions attached to a benefit.
`,
  transfer: `
FOCUS: transferring and redeeming rewards.
- Give transfer ratios, partner groups and any annual transfer limits.
- Mention redemption channels and their value per point or mile.
`,
  lifestyle: `
FOCUS: lifestyle benefits (golf, dining, concierge).
- Give counts, limits and how to use the benefit.
`,
  eligibility: `
FOCUS: eligibility.
- Give age, income and relationship criteria exactly as listed.
`,
  general: `
FOCUS: general question.
- If no card was named, mention which cards are available.
- Answer only what was asked.
`,
};

const INTENT_TEMPLATES: Record<Intent, PromptTemplate> = {
  annual_fee_reversal_spend_threshold: "fee_waiver",
  lounge_access: "travel",
  reward_comparison: "rewards",
  reward_calculation: "rewards",
  welcome_benefits: "welcome",
  renewal_benefits: "welcome",
  milestone_benefits: "milestones",
  miles_transfer: "transfer",
  reward_redemption: "transfer",
  tier_structure: "travel",
  accrual_exclusions: "exclusions",
  reward_capping: "rewards",
  insurance_cover: "travel",
  utilities: "spending_category",
  fuel: "spending_category",
  rent: "spending_category",
  education: "spending_category",
  gaming: "spending_category",
  wallet: "spending_category",
  insurance: "spending_category",
  government: "spending_category",
  gold: "spending_category",
  joining_fee: "fees",
  annual_fee: "fees",
  foreign_currency_markup: "fees",
  cash_withdrawal: "fees",
  late_payment: "fees",
  interest_rate: "fees",
  golf: "lifestyle",
  dining_benefits: "lifestyle",
  concierge: "lifestyle",
  eligibility: "eligibility",
  reward_rate: "rewards",
};

/**
 * System prompt for an intent (the general template when none was detected)
 */
export function buildSystemPrompt(intent: Intent | null): string {
  const template = intent === null ? "general" : INTENT_TEMPLATES[intent];
  return `${BASE_RULES}\n\n${TEMPLATES[template].trim()}`;
}

function formatHistory(history: ConversationExchange[] = []): string {
  const recent = history.slice(-MAX_HISTORY_EXCHANGES);
  if (recent.length === 0) return "";

  const lines = recent.flatMap((exchange) => [
    `User: ${exchange.query}`,
    `Assistant: ${exchange.response}`,
  ]);
  return `CONVERSATION CONTEXT:\n${lines.join("\n")}\n\n`;
}

/**
 * User prompt: serialized card data, recent conversation, question
 */
export function buildUserPrompt({
  query,
  context,
  history,
}: PromptBuilderInput): string {
  return `
CARD DATA:
${JSON.stringify(context, null, 2)}

${formatHistory(history)}QUESTION:
${query}

ANSWER:
`.trim();
}
