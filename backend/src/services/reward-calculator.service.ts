/**
 * Reward Calculator
 *
 * Issuer earning formulas for the two calculator-backed cards. Dispatch is by
 * the card id resolved at load time; any other card yields an "unsupported"
 * value rather than an exception.
 */

import { extractCategory, normalizeCurrencyShorthand } from "./entity-extractor.service";
import type {
    CardRecord,
    Category,
    MilestoneReached,
    RewardCalculation,
    RewardCalculationResult,
    RewardUnit,
} from "../types";

// Earning figures before the milestone step
type EarningResult = Omit<RewardCalculationResult, "milestones">;

// ================= ICICI EMERALDE PRIVATE METAL =================

interface IciciEpmRules {
    spendUnit: number;
    rate: number;
    unit: RewardUnit;
    rateDescription: string;
    excluded: readonly Category[];
    statementCycleCaps: Readonly<Partial<Record<Category, number>>>;
}

const ICICI_EPM: IciciEpmRules = {
    spendUnit: 200,
    rate: 6,
    unit: "points",
    rateDescription: "6 Reward Points per ₹200",
    excluded: ["government", "rent", "fuel"],
    // Points per statement cycle; a cap string in the card data overrides these
    statementCycleCaps: {
        utilities: 1000,
        grocery: 1000,
        insurance: 5000,
        education: 1000,
    },
};

// ================= AXIS BANK ATLAS =================

interface AxisAtlasRules {
    spendUnit: number;
    baseRate: number;
    travelRate: number;
    monthlyTravelCap: number;
    unit: RewardUnit;
    travelCategories: readonly Category[];
    excluded: readonly Category[];
}

const AXIS_ATLAS: AxisAtlasRules = {
    spendUnit: 100,
    baseRate: 2,
    travelRate: 5,
    monthlyTravelCap: 200000,
    unit: "EDGE Miles",
    travelCategories: ["hotel", "flight", "travel"],
    excluded: [
        "gold",
        "rent",
        "wallet",
        "insurance",
        "fuel",
        "government",
        "utilities",
        "telecom",
    ],
};

/**
 * "1,000 Reward Points per statement cycle" -> 1000
 */
export function parseCapPoints(capText: string): number | null {
    const match = capText.match(/([\d,]+)\s*(?:reward\s+)?(?:points?|miles?)/i);
    if (!match) return null;
    const value = parseInt(match[1].replace(/,/g, ""), 10);
    return Number.isNaN(value) ? null : value;
}

/**
 * Categories named by the card's own `accrual_exclusions` strings
 */
function dataExclusions(card: CardRecord): Category[] {
    const exclusions = card.terms.rewards?.accrual_exclusions ?? [];
    return exclusions
        .map((entry) => extractCategory(entry))
        .filter((category): category is Category => category !== null);
}

function isExcluded(
    card: CardRecord,
    category: Category | null,
    fixed: readonly Category[]
): boolean {
    if (category === null) return false;
    return fixed.includes(category) || dataExclusions(card).includes(category);
}

function excludedResult(
    card: CardRecord,
    base: Omit<EarningResult, "earned" | "trace" | "excluded" | "capApplied">,
    category: Category
): EarningResult {
    return {
        ...base,
        earned: 0,
        trace: `${category} spends are excluded from reward accrual on ${card.name}: 0 ${base.unit}`,
        excluded: true,
        capApplied: false,
    };
}

function statementCycleCap(card: CardRecord, category: Category | null): number | null {
    if (category === null) return null;

    const capText = card.terms.rewards?.capping_per_statement_cycle?.[category];
    if (capText) {
        const parsed = parseCapPoints(capText);
        if (parsed !== null) return parsed;
    }
    return ICICI_EPM.statementCycleCaps[category] ?? null;
}

function calculateIciciEpm(
    card: CardRecord,
    spendAmount: number,
    category: Category | null
): EarningResult {
    const base = {
        kind: "result" as const,
        card: card.name,
        cardId: "icici_epm" as const,
        spendAmount,
        unit: ICICI_EPM.unit,
        rateDescription: ICICI_EPM.rateDescription,
        category,
    };

    if (category !== null && isExcluded(card, category, ICICI_EPM.excluded)) {
        return excludedResult(card, base, category);
    }

    const raw = Math.floor(spendAmount / ICICI_EPM.spendUnit) * ICICI_EPM.rate;
    let trace = `₹${spendAmount} ÷ ${ICICI_EPM.spendUnit} × ${ICICI_EPM.rate} = ${raw} points`;

    const cap = statementCycleCap(card, category);
    if (cap !== null && raw > cap) {
        trace += `; capped at ${cap} points per statement cycle for ${category}`;
        return { ...base, earned: cap, trace, excluded: false, capApplied: true };
    }

    return { ...base, earned: raw, trace, excluded: false, capApplied: false };
}

function calculateAxisAtlas(
    card: CardRecord,
    spendAmount: number,
    category: Category | null
): EarningResult {
    const { spendUnit, baseRate, travelRate, monthlyTravelCap, unit } = AXIS_ATLAS;
    const isTravel = category !== null && AXIS_ATLAS.travelCategories.includes(category);

    const base = {
        kind: "result" as const,
        card: card.name,
        cardId: "axis_atlas" as const,
        spendAmount,
        unit,
        rateDescription: isTravel
            ? `${travelRate} EDGE Miles per ₹${spendUnit} on travel up to ₹${monthlyTravelCap} per month, ${baseRate} EDGE Miles per ₹${spendUnit} beyond`
            : `${baseRate} EDGE Miles per ₹${spendUnit}`,
        category,
    };

    if (category !== null && isExcluded(card, category, AXIS_ATLAS.excluded)) {
        return excludedResult(card, base, category);
    }

    if (!isTravel) {
        const miles = Math.floor(spendAmount / spendUnit) * baseRate;
        return {
            ...base,
            earned: miles,
            trace: `₹${spendAmount} ÷ ${spendUnit} × ${baseRate} = ${miles} ${unit}`,
            excluded: false,
            capApplied: false,
        };
    }

    const accelerated = Math.min(spendAmount, monthlyTravelCap);
    const excess = spendAmount - accelerated;
    const acceleratedMiles = Math.floor(accelerated / spendUnit) * travelRate;

    if (excess === 0) {
        return {
            ...base,
            earned: acceleratedMiles,
            trace: `₹${spendAmount} ÷ ${spendUnit} × ${travelRate} = ${acceleratedMiles} ${unit}`,
            excluded: false,
            capApplied: false,
        };
    }

    const excessMiles = Math.floor(excess / spendUnit) * baseRate;
    const total = acceleratedMiles + excessMiles;
    const trace =
        `₹${accelerated} ÷ ${spendUnit} × ${travelRate} = ${acceleratedMiles} ${unit} (up to ₹${monthlyTravelCap} monthly travel cap)` +
        ` + ₹${excess} ÷ ${spendUnit} × ${baseRate} = ${excessMiles} ${unit} (beyond cap)` +
        ` = ${acceleratedMiles} + ${excessMiles} = ${total} ${unit}`;

    return { ...base, earned: total, trace, excluded: false, capApplied: true };
}

// ================= MILESTONES =================

// "₹4,00,000 annual spend"
const SPEND_THRESHOLD_PATTERN = /₹\s?([\d,]+)\s+(?:annual\s+|yearly\s+)?spends?\b/i;

/**
 * Annual spend a milestone asks for, from its description or else its key
 * ("spend_7_5_lakh" -> 750000)
 */
export function parseMilestoneThreshold(key: string, description: string): number | null {
    const match = description.match(SPEND_THRESHOLD_PATTERN);
    if (match) {
        return parseInt(match[1].replace(/,/g, ""), 10);
    }

    const keyMatch = key.match(/^spend_(\d+(?:_\d+)?)_([a-z]+)$/i);
    if (!keyMatch) return null;

    const normalized = normalizeCurrencyShorthand(`${keyMatch[1].replace("_", ".")}${keyMatch[2]}`);
    return /^\d+$/.test(normalized) ? parseInt(normalized, 10) : null;
}

function milestoneEntries(card: CardRecord): Array<[string, string]> {
    const milestones = card.terms.milestones;

    if (Array.isArray(milestones)) {
        return milestones
            .filter((entry): entry is string => typeof entry === "string")
            .map((entry, index): [string, string] => [`milestone_${index + 1}`, entry]);
    }
    if (typeof milestones === "object" && milestones !== null) {
        return Object.entries(milestones).filter(
            (entry): entry is [string, string] => typeof entry[1] === "string"
        );
    }
    return [];
}

/**
 * Milestones whose threshold the spend meets, lowest threshold first
 */
export function milestonesReached(card: CardRecord, spendAmount: number): MilestoneReached[] {
    return milestoneEntries(card)
        .map(([key, description]) => ({
            key,
            description,
            threshold: parseMilestoneThreshold(key, description),
        }))
        .filter(
            (milestone): milestone is MilestoneReached =>
                milestone.threshold !== null && spendAmount >= milestone.threshold
        )
        .sort((a, b) => a.threshold - b.threshold);
}

function withMilestones(card: CardRecord, result: EarningResult): RewardCalculationResult {
    return {
        ...result,
        milestones: result.excluded ? [] : milestonesReached(card, result.spendAmount),
    };
}

/**
 * Rewards for one spend on one card
 */
export function calculateRewards(
    card: CardRecord,
    spendAmount: number,
    category: Category | null
): RewardCalculation {
    switch (card.cardId) {
        case "icici_epm":
            return withMilestones(card, calculateIciciEpm(card, spendAmount, category));
        case "axis_atlas":
            return withMilestones(card, calculateAxisAtlas(card, spendAmount, category));
        case null:
            console.warn(`[CALC] No reward calculator for ${card.name}`);
            return {
                kind: "unsupported",
                card: card.name,
                error: `Reward calculation is not supported for ${card.name}.`,
            };
    }
}

/**
 * Markdown summary of calculator results; names a winner when comparing
 */
export function renderCalculations(
    calculations: RewardCalculation[],
    comparing: boolean
): string {
    const lines: string[] = [];

    for (const calculation of calculations) {
        if (calculation.kind === "unsupported") {
            lines.push(`**${calculation.card}**: ${calculation.error}`);
            continue;
        }
        lines.push(
            `**${calculation.card}**: ${calculation.earned} ${calculation.unit} (${calculation.rateDescription})`,
            `Calculation: ${calculation.trace}`
        );
        if (calculation.milestones.length > 0) {
            lines.push(
                `Milestones reached: ${calculation.milestones
                    .map((milestone) => milestone.description)
                    .join("; ")}`
            );
        }
    }

    const results = calculations.filter(
        (calculation): calculation is RewardCalculationResult => calculation.kind === "result"
    );

    if (comparing && results.length > 1) {
        const best = Math.max(...results.map((result) => result.earned));
        const leaders = results.filter((result) => result.earned === best);
        lines.push(
            leaders.length === 1
                ? `Winner: ${leaders[0].card} with ${leaders[0].earned} ${leaders[0].unit}.`
                : `It's a tie at ${best} for ${leaders.map((leader) => leader.card).join(" and ")}.`
        );
    }

    return lines.join("\n");
}
